/**
 * SQL Export Service Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SqlExportService, composeText, createSqlExportService } from '../src/services/sql-export.service.js';
import type { Post } from '../src/models.js';

const CONTENT_COLUMNS =
  '(`cid`,`title`,`slug`,`created`,`modified`,`text`,`order`,`authorId`,`template`,`type`,`status`,`password`,`commentsNum`,`allowComment`,`allowPing`,`allowFeed`,`parent`)';
const META_COLUMNS = '(`mid`,`name`,`slug`,`type`,`description`,`count`,`order`,`parent`)';

function makePost(overrides: Partial<Post> = {}): Post {
  const date = new Date('2024-01-02T00:00:00Z');
  return {
    sourcePath: '/blog/_posts/post.md',
    title: 'Post',
    slug: 'post',
    date,
    updated: date,
    author: 'admin',
    content: 'Body',
    excerpt: '',
    categories: [],
    tags: [],
    status: 'publish',
    type: 'post',
    assetDirName: null,
    rewrittenImageLinks: 0,
    ...overrides,
  };
}

describe('composeText', () => {
  it('should mark the body as markdown', () => {
    expect(composeText('Body', '')).toBe('<!--markdown-->Body');
    expect(composeText('<!--markdown-->Body', '')).toBe('<!--markdown-->Body');
  });

  it('should put the excerpt before a more tag', () => {
    expect(composeText('Body', ' Summary ')).toBe('<!--markdown-->Summary\n\n<!--more-->\n\nBody');
  });

  it('should drop the excerpt when the body has its own more tag', () => {
    expect(composeText('Intro<!--more-->Rest', 'Summary')).toBe('<!--markdown-->Intro<!--more-->Rest');
  });

  it('should use the excerpt alone for an empty body', () => {
    expect(composeText('  ', 'Summary')).toBe('<!--markdown-->Summary');
  });
});

describe('SqlExportService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should render the full import script', () => {
    const service = new SqlExportService({ tablePrefix: 'blog', authorId: 3, cidStart: 5, midStart: 7, truncate: true });
    const result = service.export([
      makePost({ title: "It's", slug: 'its', content: 'Body\nline', categories: ['Tech'], tags: ['a', 'a ', ' b'] }),
    ]);

    expect(result.sql).toBe(
      [
        '-- Generated by typecho-migrate',
        '-- Import target: Typecho (MySQL/MariaDB)',
        'SET NAMES utf8mb4;',
        'START TRANSACTION;',
        'DELETE FROM `blog_relationships`;',
        'DELETE FROM `blog_metas`;',
        'DELETE FROM `blog_contents`;',
        '',
        '-- Contents',
        `INSERT INTO \`blog_contents\` ${CONTENT_COLUMNS} VALUES (5,'It\\'s','its',1704153600,1704153600,'<!--markdown-->Body\\nline',0,3,NULL,'post','publish',NULL,0,'1','1','1',0);`,
        '',
        '-- Metas (categories/tags)',
        `INSERT INTO \`blog_metas\` ${META_COLUMNS} VALUES (7,'Tech','tech','category','',1,0,0);`,
        `INSERT INTO \`blog_metas\` ${META_COLUMNS} VALUES (8,'a','a','tag','',1,0,0);`,
        `INSERT INTO \`blog_metas\` ${META_COLUMNS} VALUES (9,'b','b','tag','',1,0,0);`,
        '',
        '-- Relationships',
        'INSERT INTO `blog_relationships` (`cid`,`mid`) VALUES (5,7);',
        'INSERT INTO `blog_relationships` (`cid`,`mid`) VALUES (5,8);',
        'INSERT INTO `blog_relationships` (`cid`,`mid`) VALUES (5,9);',
        '',
        'ALTER TABLE `blog_contents` AUTO_INCREMENT = 6;',
        'ALTER TABLE `blog_metas` AUTO_INCREMENT = 10;',
        'COMMIT;',
        '',
      ].join('\n')
    );
    expect(result.nextCid).toBe(6);
    expect(result.nextMid).toBe(10);
  });

  it('should reset auto increments to the start values without rows', () => {
    const result = createSqlExportService({ cidStart: 40, midStart: 9 }).export([]);

    expect(result.contents).toEqual([]);
    expect(result.sql).toContain('ALTER TABLE `typecho_contents` AUTO_INCREMENT = 40;\n');
    expect(result.sql).toContain('ALTER TABLE `typecho_metas` AUTO_INCREMENT = 9;\n');
    expect(result.sql).not.toContain('DELETE FROM');
  });

  it('should assign ids in post order and count each term per post', () => {
    const result = createSqlExportService().export([
      makePost({ title: 'First', tags: ['a', 'a', 'b'] }),
      makePost({ title: 'Second', categories: ['Life'], tags: ['b'] }),
    ]);

    expect(result.contents.map((row) => [row.cid, row.title])).toEqual([
      [1, 'First'],
      [2, 'Second'],
    ]);
    expect(result.terms.map((term) => [term.mid, term.kind, term.name, term.count])).toEqual([
      [1, 'tag', 'a', 1],
      [2, 'tag', 'b', 2],
      [3, 'category', 'Life', 1],
    ]);
    expect(result.relationships).toEqual([
      { cid: 1, mid: 1 },
      { cid: 1, mid: 2 },
      { cid: 2, mid: 3 },
      { cid: 2, mid: 2 },
    ]);
  });

  it('should keep page type, status and timestamps', () => {
    const result = createSqlExportService().export([
      makePost({
        type: 'page',
        status: 'hidden',
        date: new Date(1_600_000_000_900),
        updated: new Date(1_700_000_000_000),
      }),
    ]);

    expect(result.contents[0]).toMatchObject({
      type: 'page',
      status: 'hidden',
      created: 1_600_000_000,
      modified: 1_700_000_000,
      authorId: 1,
    });
  });

  it('should clamp ids and normalize the table prefix', () => {
    const service = new SqlExportService({ tablePrefix: '', authorId: 0, cidStart: -3, midStart: 0 });
    const result = service.export([makePost({ tags: ['x'] })]);

    expect(service.tablePrefix).toBe('typecho_');
    expect(result.contents[0].cid).toBe(1);
    expect(result.contents[0].authorId).toBe(1);
    expect(result.terms[0].mid).toBe(1);
  });

  it('should log a summary line', () => {
    createSqlExportService().export([makePost({ categories: ['c'], tags: ['t'] })]);

    expect(console.log).toHaveBeenCalledWith('[Export] 1 contents, 1 categories, 1 tags, 2 relationships');
  });
});
