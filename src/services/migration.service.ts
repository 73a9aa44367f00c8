/**
 * Migration Service
 *
 * One offline run: locate the posts folder, assemble every post in memory,
 * render the SQL and write the output file once at the end. Any failure
 * before the write leaves no output behind.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { MigrationConfig, RawMigrationConfig } from '../config.js';
import { resolveConfig } from '../config.js';
import { MigrationError } from '../errors.js';
import type { OutputEncoding, Post, Relationship, Term } from '../models.js';
import { PostsService } from './posts.service.js';
import { SqlExportService } from './sql-export.service.js';

export interface MigrationSummary {
  config: MigrationConfig;
  sourceDir: string;
  outputPath: string;
  posts: Post[];
  warnings: string[];
  skipped: number;
  matchedAssetDirs: number;
  rewrittenLinks: number;
  terms: Term[];
  relationships: Relationship[];
  sql: string;
}

export interface MigrationRunOptions {
  env?: NodeJS.ProcessEnv;
  now?: Date;
}

function hasTopLevelMarkdown(dir: string): boolean {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .some((entry) => entry.isFile() && /\.(md|markdown)$/i.test(entry.name));
}

/**
 * A Hexo `source` root is swapped for its `_posts` folder when it holds
 * no markdown of its own
 */
export function locateSourceDir(source: string): string {
  const sourceDir = path.resolve(source);
  const postsDir = path.join(sourceDir, '_posts');

  if (
    path.basename(sourceDir).toLowerCase() !== '_posts' &&
    fs.existsSync(postsDir) &&
    fs.statSync(postsDir).isDirectory() &&
    !hasTopLevelMarkdown(sourceDir)
  ) {
    return postsDir;
  }

  if (!fs.existsSync(sourceDir) || !fs.statSync(sourceDir).isDirectory()) {
    throw new MigrationError(`Source directory does not exist: ${sourceDir}`, 'SOURCE_NOT_FOUND');
  }

  return sourceDir;
}

/**
 * Fail on the first character the output encoding cannot hold.
 * Node would otherwise write a truncated byte in its place.
 */
export function assertEncodable(text: string, encoding: OutputEncoding): void {
  if (Buffer.from(text, encoding).toString(encoding) === text) return;

  let offset = 0;
  for (const char of text) {
    if (Buffer.from(char, encoding).toString(encoding) !== char) {
      const codePoint = (char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0');
      throw new MigrationError(
        `Cannot encode "${char}" (U+${codePoint}) at offset ${offset} as ${encoding}`,
        'UNENCODABLE_OUTPUT'
      );
    }
    offset += char.length;
  }
}

/**
 * Run a migration from a validated configuration
 */
export function migrate(config: MigrationConfig, options: Pick<MigrationRunOptions, 'now'> = {}): MigrationSummary {
  const sourceDir = locateSourceDir(config.source);
  const outputPath = path.resolve(config.output);

  console.log(`[Migrate] Reading posts from ${sourceDir}`);

  const postsService = new PostsService({
    sourceDir,
    defaultAuthor: config.author,
    includeDrafts: config.includeDrafts,
    assetMode: config.assetMode,
    assetUrlPrefix: config.assetUrlPrefix,
    mathUnderscoreMode: config.mathUnderscoreMode,
    now: options.now,
  });
  const { posts, warnings, skipped } = postsService.collectPosts();

  const exporter = new SqlExportService({
    tablePrefix: config.tablePrefix,
    authorId: config.authorId,
    cidStart: config.cidStart,
    midStart: config.midStart,
    truncate: config.truncate,
  });
  const result = exporter.export(posts);
  assertEncodable(result.sql, config.encoding);

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, result.sql, { encoding: config.encoding });

  console.log(`[Migrate] Wrote ${outputPath}`);

  return {
    config,
    sourceDir,
    outputPath,
    posts,
    warnings,
    skipped,
    matchedAssetDirs: posts.filter((post) => post.assetDirName).length,
    rewrittenLinks: posts.reduce((sum, post) => sum + post.rewrittenImageLinks, 0),
    terms: result.terms,
    relationships: result.relationships,
    sql: result.sql,
  };
}

/**
 * Validate raw options, then migrate
 */
export function runMigration(input: RawMigrationConfig = {}, options: MigrationRunOptions = {}): MigrationSummary {
  const config = resolveConfig(input, options.env);
  return migrate(config, { now: options.now });
}
