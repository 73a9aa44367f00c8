/**
 * SQL Export Models
 * Rows and options for the Typecho import script
 */

import type { PostStatus, PostType } from '../models.js';
import type { Relationship, Term } from './terms.js';

/**
 * How relative image links are handled
 */
export type AssetMode = 'keep' | 'prefix';

/**
 * MathJax underscore normalization
 * - keep: leave math untouched
 * - underscore: `\_` -> `_`
 * - escaped: `_` -> `\_`
 */
export type MathUnderscoreMode = 'keep' | 'underscore' | 'escaped';

/**
 * Text encodings the output file can be written in
 */
export type OutputEncoding = 'utf8' | 'utf16le' | 'latin1' | 'ascii';

/**
 * Options for the SQL export
 */
export interface SqlExportOptions {
  tablePrefix: string;
  authorId: number;
  cidStart: number;
  midStart: number;
  truncate: boolean; // Clear contents/metas/relationships first
}

/**
 * Row of the contents table
 */
export interface ContentRow {
  cid: number;
  title: string;
  slug: string;
  created: number; // Unix seconds
  modified: number; // Unix seconds
  text: string;
  authorId: number;
  type: PostType;
  status: PostStatus;
}

/**
 * Export output
 */
export interface SqlExportResult {
  sql: string;
  contents: ContentRow[];
  terms: Term[];
  relationships: Relationship[];
  nextCid: number; // AUTO_INCREMENT for contents
  nextMid: number; // AUTO_INCREMENT for metas
}

/**
 * Marker Typecho looks for before rendering content as Markdown
 */
export const MARKDOWN_MARKER = '<!--markdown-->';

/**
 * Separator between excerpt and full text
 */
export const MORE_MARKER = '<!--more-->';
