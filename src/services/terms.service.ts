/**
 * Terms Service
 * Deduplicates categories and tags and tracks post relationships
 */

import type { Relationship, Term, TermKind, TermStats } from '../models/terms.js';
import { slugify } from './text.js';

/**
 * Terms Service
 */
export class TermsService {
  private nextMid: number;

  // Keyed by kind + name; insertion order is mid order
  private terms = new Map<string, Term>();
  private relationships: Relationship[] = [];
  private relationKeys = new Set<string>();

  constructor(midStart = 1) {
    this.nextMid = Math.max(midStart, 1);
  }

  // ==================== TERMS ====================

  /**
   * Get a term, creating it with the next mid on first sight
   */
  getOrCreateTerm(kind: TermKind, name: string): Term {
    const key = this.termKey(kind, name);
    const existing = this.terms.get(key);
    if (existing) return existing;

    const term: Term = {
      mid: this.nextMid++,
      name,
      slug: slugify(name),
      kind,
      count: 0,
    };

    this.terms.set(key, term);
    return term;
  }

  getTerm(kind: TermKind, name: string): Term | undefined {
    return this.terms.get(this.termKey(kind, name));
  }

  /**
   * All terms ordered by mid
   */
  getTerms(kind?: TermKind): Term[] {
    const all = Array.from(this.terms.values()).sort((a, b) => a.mid - b.mid);
    return kind ? all.filter((t) => t.kind === kind) : all;
  }

  /**
   * Next free mid (AUTO_INCREMENT value for metas)
   */
  peekNextMid(): number {
    return this.nextMid;
  }

  // ==================== RELATIONSHIPS ====================

  /**
   * Attach a term to a post. A post counts once per term even when
   * the same name is attached twice.
   */
  attach(cid: number, kind: TermKind, name: string): Term {
    const term = this.getOrCreateTerm(kind, name);
    const key = `${cid}:${term.mid}`;

    if (!this.relationKeys.has(key)) {
      this.relationKeys.add(key);
      this.relationships.push({ cid, mid: term.mid });
      term.count++;
    }

    return term;
  }

  /**
   * Attach a post's categories then tags, each in its own order
   */
  attachAll(cid: number, categories: string[], tags: string[]): Term[] {
    return [
      ...categories.map((name) => this.attach(cid, 'category', name)),
      ...tags.map((name) => this.attach(cid, 'tag', name)),
    ];
  }

  /**
   * Relationships in discovery order
   */
  getRelationships(): Relationship[] {
    return [...this.relationships];
  }

  // ==================== STATS ====================

  getStats(limit = 10): TermStats {
    const all = this.getTerms();
    const mostUsed = [...all]
      .sort((a, b) => b.count - a.count || a.mid - b.mid)
      .slice(0, limit)
      .map((term) => ({ term, count: term.count }));

    return {
      totalTerms: all.length,
      categories: all.filter((t) => t.kind === 'category').length,
      tags: all.filter((t) => t.kind === 'tag').length,
      relationships: this.relationships.length,
      mostUsed,
    };
  }

  private termKey(kind: TermKind, name: string): string {
    return `${kind}:${name}`;
  }
}

export function createTermsService(midStart?: number): TermsService {
  return new TermsService(midStart);
}
