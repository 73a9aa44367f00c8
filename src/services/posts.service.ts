/**
 * Posts Service
 *
 * Builds one Post per markdown file under the Hexo posts folder:
 * front matter, math underscore normalization, image link rewriting,
 * draft filtering and date ordering.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { AssetMode, FrontMatter, FrontMatterValue, MathUnderscoreMode, Post, PostStatus } from '../models.js';
import { isPostStatus } from '../models.js';
import { AssetResolver } from './asset-resolver.js';
import { parsePostDate } from './dates.js';
import { FrontMatterParser, normalizeList } from './front-matter.js';
import { hasRelativeImageLinks, rewriteImageLinks } from './link-rewriter.js';
import { normalizeMathUnderscores } from './math-normalizer.js';
import { slugify } from './text.js';

const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown']);
const PLACEHOLDER_STEMS = new Set(['index', 'readme']);
const BOM = '\uFEFF';

/**
 * Posts Service Configuration
 */
export interface PostsServiceConfig {
  sourceDir: string;
  defaultAuthor: string;
  includeDrafts: boolean;
  assetMode: AssetMode;
  assetUrlPrefix: string;
  mathUnderscoreMode: MathUnderscoreMode;
  now?: Date; // Fallback for missing dates; defaults to construction time
  parser?: FrontMatterParser;
  resolver?: AssetResolver;
}

export interface AssembledPost {
  post: Post;
  warning: string | null;
}

export interface CollectedPosts {
  posts: Post[];
  warnings: string[];
  skipped: number;
}

/**
 * Status from explicit `status` text, then `draft` / `published` flags
 */
export function normalizeStatus(meta: FrontMatter): PostStatus {
  const raw = meta.status;
  const status = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
  if (isPostStatus(status)) return status;

  if (meta.draft === true) return 'draft';
  if (meta.published === false) return 'draft';
  return 'publish';
}

/**
 * Compare paths segment by segment, so `a/b.md` sorts before `a-b.md`
 */
export function comparePaths(a: string, b: string): number {
  const left = a.split(path.sep);
  const right = b.split(path.sep);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    if (left[i] !== right[i]) return left[i] < right[i] ? -1 : 1;
  }
  return left.length - right.length;
}

/**
 * Every .md / .markdown file below a directory, in path order
 */
export function listMarkdownFiles(dir: string): string[] {
  const files: string[] = [];

  const walk = (current: string): void => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const fullPath = path.join(current, entry.name);
      const stat = entry.isSymbolicLink() ? fs.statSync(fullPath) : entry;

      if (stat.isDirectory()) {
        walk(fullPath);
      } else if (stat.isFile() && MARKDOWN_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) {
        files.push(fullPath);
      }
    }
  };

  walk(dir);
  return files.sort(comparePaths);
}

function textField(meta: FrontMatter, key: string): string {
  const value: FrontMatterValue | undefined = meta[key];
  if (value === null || value === undefined || value === false || value === '' || value === 0) return '';
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.length > 0 ? JSON.stringify(value) : '';
  if (typeof value === 'object') return Object.keys(value).length > 0 ? JSON.stringify(value) : '';
  return String(value);
}

/**
 * Posts Service
 */
export class PostsService {
  private config: PostsServiceConfig;
  private sourceDir: string;
  private now: Date;
  private parser: FrontMatterParser;
  private resolver: AssetResolver | null;

  constructor(config: PostsServiceConfig) {
    this.config = config;
    this.sourceDir = path.resolve(config.sourceDir);
    this.now = config.now ?? new Date();
    this.parser = config.parser ?? new FrontMatterParser();
    this.resolver = config.resolver ?? null;
  }

  /**
   * Title/slug fallback: file name, or the folder name for an
   * index/readme file inside its own folder
   */
  defaultPostStem(filePath: string): string {
    const absolute = path.resolve(filePath);
    const stem = path.basename(absolute, path.extname(absolute));
    const parent = path.dirname(absolute);

    if (parent !== this.sourceDir && PLACEHOLDER_STEMS.has(stem.toLowerCase())) {
      return path.basename(parent);
    }
    return stem;
  }

  /**
   * Build a post from raw file text
   */
  assemblePost(filePath: string, raw: string): AssembledPost {
    const text = raw.startsWith(BOM) ? raw.slice(BOM.length) : raw;
    const { meta, body } = this.parser.split(text.replace(/\r\n?/g, '\n'));

    const defaultStem = this.defaultPostStem(filePath);
    const title = textField(meta, 'title') || defaultStem;
    const slug = textField(meta, 'slug').trim() || defaultStem;
    const author = textField(meta, 'author').trim() || this.config.defaultAuthor;
    const date = parsePostDate(meta.date, this.now);
    const updated = parsePostDate(meta.updated, date);
    const excerpt = (textField(meta, 'excerpt') || textField(meta, 'description')).trim();
    const layout = (textField(meta, 'layout') || 'post').trim().toLowerCase();

    const assetDirName = this.getResolver().resolve(filePath);
    const normalizedBody = normalizeMathUnderscores(body.trim(), this.config.mathUnderscoreMode);
    const { content, rewritten } = rewriteImageLinks(normalizedBody, {
      assetDirName,
      assetMode: this.config.assetMode,
      assetUrlPrefix: this.config.assetUrlPrefix,
    });

    let warning: string | null = null;
    if (this.config.assetMode === 'prefix' && !assetDirName && hasRelativeImageLinks(normalizedBody)) {
      warning = `${path.basename(filePath)} has relative images but no matched asset folder.`;
    }

    const post: Post = {
      sourcePath: filePath,
      title,
      slug: slugify(slug),
      date,
      updated,
      author,
      content,
      excerpt,
      categories: normalizeList(meta.categories),
      tags: normalizeList(meta.tags),
      status: normalizeStatus(meta),
      type: layout === 'page' ? 'page' : 'post',
      assetDirName,
      rewrittenImageLinks: rewritten,
    };

    return { post, warning };
  }

  /**
   * Read and build a post from disk
   */
  readPost(filePath: string): AssembledPost {
    return this.assemblePost(filePath, fs.readFileSync(filePath, 'utf8'));
  }

  /**
   * Collect every publishable post, oldest first
   */
  collectPosts(): CollectedPosts {
    const posts: Post[] = [];
    const warnings: string[] = [];
    let skipped = 0;

    for (const filePath of listMarkdownFiles(this.sourceDir)) {
      const { post, warning } = this.readPost(filePath);

      if (post.status !== 'publish' && !this.config.includeDrafts) {
        skipped++;
        continue;
      }

      posts.push(post);
      if (warning) warnings.push(warning);
    }

    // Array#sort is stable: equal dates keep path order
    posts.sort((a, b) => a.date.getTime() - b.date.getTime());

    console.log(`[Posts] Collected ${posts.length} posts (${skipped} skipped as non-publish)`);
    return { posts, warnings, skipped };
  }

  private getResolver(): AssetResolver {
    if (!this.resolver) {
      this.resolver = AssetResolver.fromDirectory(this.sourceDir);
    }
    return this.resolver;
  }
}

export function createPostsService(config: PostsServiceConfig): PostsService {
  return new PostsService(config);
}
