import { describe, it, expect, beforeEach } from 'vitest';
import { TermsService, createTermsService } from '../src/services/terms.service.js';

describe('TermsService', () => {
  let service: TermsService;

  beforeEach(() => {
    service = createTermsService(10);
  });

  describe('Terms', () => {
    it('should create a term with the next mid', () => {
      const term = service.getOrCreateTerm('category', 'Machine Learning');

      expect(term).toEqual({ mid: 10, name: 'Machine Learning', slug: 'machine-learning', kind: 'category', count: 0 });
      expect(service.peekNextMid()).toBe(11);
    });

    it('should reuse a term with the same kind and name', () => {
      const first = service.getOrCreateTerm('tag', 'js');
      const second = service.getOrCreateTerm('tag', 'js');

      expect(second).toBe(first);
      expect(service.getTerms()).toHaveLength(1);
    });

    it('should keep categories and tags apart but share one counter', () => {
      const category = service.getOrCreateTerm('category', 'notes');
      const tag = service.getOrCreateTerm('tag', 'notes');

      expect(category.mid).toBe(10);
      expect(tag.mid).toBe(11);
      expect(service.getTerms('tag')).toEqual([tag]);
    });

    it('should treat names case-sensitively', () => {
      service.getOrCreateTerm('tag', 'Go');
      service.getOrCreateTerm('tag', 'go');

      expect(service.getTerms().map((t) => t.name)).toEqual(['Go', 'go']);
    });

    it('should find existing terms', () => {
      service.getOrCreateTerm('tag', 'x');

      expect(service.getTerm('tag', 'x')?.mid).toBe(10);
      expect(service.getTerm('category', 'x')).toBeUndefined();
    });

    it('should clamp the starting mid', () => {
      expect(createTermsService(0).getOrCreateTerm('tag', 'a').mid).toBe(1);
    });
  });

  describe('Relationships', () => {
    it('should attach a term once per post', () => {
      service.attach(1, 'tag', 'a');
      service.attach(1, 'tag', 'a');
      service.attach(2, 'tag', 'a');

      expect(service.getRelationships()).toEqual([
        { cid: 1, mid: 10 },
        { cid: 2, mid: 10 },
      ]);
      expect(service.getTerm('tag', 'a')?.count).toBe(2);
    });

    it('should attach categories before tags', () => {
      const terms = service.attachAll(5, ['Life'], ['b', 'a']);

      expect(terms.map((t) => [t.kind, t.name, t.mid])).toEqual([
        ['category', 'Life', 10],
        ['tag', 'b', 11],
        ['tag', 'a', 12],
      ]);
    });

    it('should number terms by first appearance across posts', () => {
      service.attachAll(1, ['c1'], ['t1']);
      service.attachAll(2, ['c2'], ['t1', 't2']);

      expect(service.getTerms().map((t) => `${t.mid}:${t.name}:${t.count}`)).toEqual([
        '10:c1:1',
        '11:t1:2',
        '12:c2:1',
        '13:t2:1',
      ]);
    });
  });

  describe('Stats', () => {
    it('should summarize terms', () => {
      service.attachAll(1, ['c'], ['popular', 'rare']);
      service.attachAll(2, [], ['popular']);

      const stats = service.getStats(2);

      expect(stats.totalTerms).toBe(3);
      expect(stats.categories).toBe(1);
      expect(stats.tags).toBe(2);
      expect(stats.relationships).toBe(4);
      expect(stats.mostUsed.map((entry) => [entry.term.name, entry.count])).toEqual([
        ['popular', 2],
        ['c', 1],
      ]);
    });
  });
});
