/**
 * SQL Export Service
 * Turns assembled posts into a Typecho (MySQL/MariaDB) import script
 */

import type { ContentRow, Post, SqlExportOptions, SqlExportResult } from '../models.js';
import { MARKDOWN_MARKER, MORE_MARKER, isPostStatus } from '../models.js';
import { toUnixTimestamp } from './dates.js';
import { TermsService } from './terms.service.js';
import { dedupe, normalizeTablePrefix, sqlQuote } from './text.js';

const CONTENT_COLUMNS =
  '(`cid`,`title`,`slug`,`created`,`modified`,`text`,`order`,`authorId`,`template`,`type`,`status`,`password`,`commentsNum`,`allowComment`,`allowPing`,`allowFeed`,`parent`)';
const META_COLUMNS = '(`mid`,`name`,`slug`,`type`,`description`,`count`,`order`,`parent`)';

const DEFAULT_OPTIONS: SqlExportOptions = {
  tablePrefix: 'typecho_',
  authorId: 1,
  cidStart: 1,
  midStart: 1,
  truncate: false,
};

/**
 * Merge excerpt and body the way Typecho stores them: excerpt, more tag,
 * body. A body that already has a more tag is kept as it is and the
 * excerpt is dropped.
 */
export function composeText(content: string, excerpt: string): string {
  const body = content.trim();
  const summary = excerpt.trim();

  let merged: string;
  if (!summary || body.includes(MORE_MARKER)) {
    merged = body;
  } else if (!body) {
    merged = summary;
  } else {
    merged = `${summary}\n\n${MORE_MARKER}\n\n${body}`;
  }

  return merged.startsWith(MARKDOWN_MARKER) ? merged : MARKDOWN_MARKER + merged;
}

/**
 * SQL Export Service
 */
export class SqlExportService {
  private options: SqlExportOptions;

  constructor(options: Partial<SqlExportOptions> = {}) {
    const merged = { ...DEFAULT_OPTIONS, ...options };
    this.options = {
      ...merged,
      tablePrefix: normalizeTablePrefix(merged.tablePrefix),
      authorId: Math.max(merged.authorId, 1),
      cidStart: Math.max(merged.cidStart, 1),
      midStart: Math.max(merged.midStart, 1),
    };
  }

  get tablePrefix(): string {
    return this.options.tablePrefix;
  }

  /**
   * Assign ids, collect terms and render the import script
   */
  export(posts: Post[]): SqlExportResult {
    const terms = new TermsService(this.options.midStart);
    const contents: ContentRow[] = [];
    let nextCid = this.options.cidStart;

    for (const post of posts) {
      const cid = nextCid++;
      contents.push(this.toContentRow(cid, post));
      terms.attachAll(cid, dedupe(post.categories), dedupe(post.tags));
    }

    const termList = terms.getTerms();
    const relationships = terms.getRelationships();
    const nextMid = terms.peekNextMid();

    const sql = this.render(contents, termList, relationships, nextCid, nextMid);
    const stats = terms.getStats();
    console.log(
      `[Export] ${contents.length} contents, ${stats.categories} categories, ${stats.tags} tags, ${stats.relationships} relationships`
    );

    return { sql, contents, terms: termList, relationships, nextCid, nextMid };
  }

  private toContentRow(cid: number, post: Post): ContentRow {
    return {
      cid,
      title: post.title,
      slug: post.slug,
      created: toUnixTimestamp(post.date),
      modified: toUnixTimestamp(post.updated),
      text: composeText(post.content, post.excerpt),
      authorId: this.options.authorId,
      type: post.type === 'page' ? 'page' : 'post',
      status: isPostStatus(post.status) ? post.status : 'publish',
    };
  }

  private render(
    contents: ContentRow[],
    terms: SqlExportResult['terms'],
    relationships: SqlExportResult['relationships'],
    nextCid: number,
    nextMid: number
  ): string {
    const prefix = this.options.tablePrefix;
    const lines: string[] = [
      '-- Generated by typecho-migrate',
      '-- Import target: Typecho (MySQL/MariaDB)',
      'SET NAMES utf8mb4;',
      'START TRANSACTION;',
    ];

    if (this.options.truncate) {
      lines.push(
        `DELETE FROM \`${prefix}relationships\`;`,
        `DELETE FROM \`${prefix}metas\`;`,
        `DELETE FROM \`${prefix}contents\`;`
      );
    }

    lines.push('', '-- Contents');
    for (const row of contents) {
      const values = [
        row.cid,
        sqlQuote(row.title),
        sqlQuote(row.slug),
        row.created,
        row.modified,
        sqlQuote(row.text),
        0,
        row.authorId,
        'NULL',
        sqlQuote(row.type),
        sqlQuote(row.status),
        'NULL',
        0,
        "'1'",
        "'1'",
        "'1'",
        0,
      ];
      lines.push(`INSERT INTO \`${prefix}contents\` ${CONTENT_COLUMNS} VALUES (${values.join(',')});`);
    }

    lines.push('', '-- Metas (categories/tags)');
    for (const term of terms) {
      const values = [term.mid, sqlQuote(term.name), sqlQuote(term.slug), sqlQuote(term.kind), "''", term.count, 0, 0];
      lines.push(`INSERT INTO \`${prefix}metas\` ${META_COLUMNS} VALUES (${values.join(',')});`);
    }

    lines.push('', '-- Relationships');
    for (const { cid, mid } of relationships) {
      lines.push(`INSERT INTO \`${prefix}relationships\` (\`cid\`,\`mid\`) VALUES (${cid},${mid});`);
    }

    lines.push(
      '',
      `ALTER TABLE \`${prefix}contents\` AUTO_INCREMENT = ${Math.max(nextCid, 1)};`,
      `ALTER TABLE \`${prefix}metas\` AUTO_INCREMENT = ${Math.max(nextMid, 1)};`,
      'COMMIT;',
      ''
    );

    return lines.join('\n');
  }
}

export function createSqlExportService(options?: Partial<SqlExportOptions>): SqlExportService {
  return new SqlExportService(options);
}
