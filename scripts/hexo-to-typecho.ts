#!/usr/bin/env node
/**
 * Convert Hexo posts to a Typecho SQL import file
 *
 * Usage:
 *   tsx scripts/hexo-to-typecho.ts --source ./source/_posts --output ./typecho_import.sql --truncate
 */

import { parseArgs } from 'node:util';
import type { RawMigrationConfig } from '../src/config.js';
import { isMigrationError } from '../src/errors.js';
import { runMigration, type MigrationSummary } from '../src/services/migration.service.js';

const MAX_LISTED_WARNINGS = 20;

function printUsage(): void {
  console.log(
    `
Convert Hexo posts to Typecho SQL import statements.

Usage:
  hexo-to-typecho [options]

Options:
  -s, --source <dir>              Hexo post directory (default: source/_posts)
  -o, --output <file>             Output SQL path (default: typecho_import.sql)
      --table-prefix <prefix>     Typecho table prefix (default: typecho_)
      --author <name>             Author when front matter has none (default: admin)
      --author-id <id>            Typecho authorId for imported posts (default: 1)
      --include-drafts            Include draft/unpublished posts
      --truncate                  Clear contents/metas/relationships before import
      --cid-start <n>             First cid for generated contents (default: 1)
      --mid-start <n>             First mid for generated metas (default: 1)
      --asset-mode <keep|prefix>  Keep image links or rewrite them by asset prefix (default: prefix)
      --asset-url-prefix <url>    URL prefix for asset folders (default: /hexo-assets)
      --math-underscore-mode <keep|underscore|escaped>
                                  MathJax underscore style (default: keep)
      --encoding <name>           Output encoding: utf8, utf16le, latin1, ascii (default: utf8)
  -h, --help                      Show this help
`.trim()
  );
}

function toInteger(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function parseCliArgs(args: string[]): RawMigrationConfig | null {
  const { values } = parseArgs({
    args,
    options: {
      source: { type: 'string', short: 's' },
      output: { type: 'string', short: 'o' },
      'table-prefix': { type: 'string' },
      author: { type: 'string' },
      'author-id': { type: 'string' },
      'include-drafts': { type: 'boolean', default: false },
      truncate: { type: 'boolean', default: false },
      'cid-start': { type: 'string' },
      'mid-start': { type: 'string' },
      'asset-mode': { type: 'string' },
      'asset-url-prefix': { type: 'string' },
      'math-underscore-mode': { type: 'string' },
      encoding: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  if (values.help) return null;

  return {
    source: values.source,
    output: values.output,
    tablePrefix: values['table-prefix'],
    author: values.author,
    authorId: toInteger(values['author-id']),
    includeDrafts: values['include-drafts'],
    truncate: values.truncate,
    cidStart: toInteger(values['cid-start']),
    midStart: toInteger(values['mid-start']),
    assetMode: values['asset-mode'],
    mathUnderscoreMode: values['math-underscore-mode'],
    assetUrlPrefix: values['asset-url-prefix'],
    encoding: values.encoding,
  };
}

function printSummary(summary: MigrationSummary): void {
  const total = summary.posts.length;

  console.log('\n' + '='.repeat(60));
  console.log(`Converted ${total} posts.`);
  console.log(`Output SQL: ${summary.outputPath}`);
  console.log(`Matched asset folders: ${summary.matchedAssetDirs}/${total}`);
  if (summary.config.assetMode === 'prefix') {
    console.log(`Rewritten image links: ${summary.rewrittenLinks}`);
  }
  console.log(`Terms: ${summary.terms.length}, relationships: ${summary.relationships.length}`);

  if (summary.warnings.length > 0) {
    console.warn(`Warning: ${summary.warnings.length} posts have relative image links but no matched asset folder.`);
    for (const warning of summary.warnings.slice(0, MAX_LISTED_WARNINGS)) {
      console.warn(`  - ${warning}`);
    }
    if (summary.warnings.length > MAX_LISTED_WARNINGS) {
      console.warn(`  ... and ${summary.warnings.length - MAX_LISTED_WARNINGS} more`);
    }
  }

  if (total === 0) {
    console.warn('Warning: no posts found. Check --source path.');
  }
  console.log('='.repeat(60));
}

function main(): number {
  let input: RawMigrationConfig | null;
  try {
    input = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    printUsage();
    return 1;
  }

  if (input === null) {
    printUsage();
    return 0;
  }

  try {
    const summary = runMigration(input);
    printSummary(summary);
    return 0;
  } catch (error) {
    if (isMigrationError(error)) {
      console.error(error.message);
      return error.exitCode;
    }
    console.error('Fatal error:', error);
    return 1;
  }
}

process.exitCode = main();
