/**
 * Front Matter Models
 * Metadata block at the head of a Hexo post
 */

/**
 * Any value a front matter block can carry once parsed
 */
export type FrontMatterValue =
  | string
  | number
  | boolean
  | null
  | Date
  | FrontMatterValue[]
  | { [key: string]: FrontMatterValue };

export type FrontMatter = Record<string, FrontMatterValue>;

/**
 * Result of splitting a document into metadata and body
 */
export interface ParsedDocument {
  meta: FrontMatter;
  body: string;
  hasFrontMatter: boolean;
}

/**
 * Parser strategies for the text between the delimiters
 */
export type FrontMatterStrategy = 'best-effort' | 'minimal';
