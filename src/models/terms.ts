/**
 * Term Models
 * Categories and tags shared by imported posts
 */

export type TermKind = 'category' | 'tag';

/**
 * Category or tag, written as a Typecho meta row
 */
export interface Term {
  mid: number;
  name: string;
  slug: string; // URL-friendly identifier
  kind: TermKind;
  count: number; // Number of posts referencing this term
}

/**
 * Post term association (many-to-many)
 */
export interface Relationship {
  cid: number;
  mid: number;
}

/**
 * Term stats
 */
export interface TermStats {
  totalTerms: number;
  categories: number;
  tags: number;
  relationships: number;
  mostUsed: Array<{ term: Term; count: number }>;
}
