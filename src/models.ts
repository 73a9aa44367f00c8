export type PostStatus = 'publish' | 'draft' | 'private' | 'hidden' | 'waiting';
export type PostType = 'post' | 'page';

export * from './models/front-matter.js';
export * from './models/terms.js';
export * from './models/export.js';

/**
 * Statuses Typecho accepts for a content row
 */
export const POST_STATUSES: readonly PostStatus[] = ['publish', 'draft', 'private', 'hidden', 'waiting'];

export function isPostStatus(value: string): value is PostStatus {
  return POST_STATUSES.some((status) => status === value);
}

/**
 * A Hexo post after front matter parsing and body rewriting
 */
export interface Post {
  sourcePath: string;
  title: string;
  slug: string; // Always non-empty and URL-safe
  date: Date;
  updated: Date;
  author: string;
  content: string;
  excerpt: string;
  categories: string[]; // Ordered, deduplicated
  tags: string[]; // Ordered, deduplicated
  status: PostStatus;
  type: PostType;
  assetDirName: string | null; // Sibling asset folder, when one matched
  rewrittenImageLinks: number;
}
