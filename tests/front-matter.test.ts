import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fc from 'fast-check';
import {
  BestEffortYamlParser,
  FrontMatterParser,
  MinimalYamlParser,
  createStructuredTextParser,
  normalizeList,
  parseScalar,
} from '../src/services/front-matter.js';

describe('FrontMatterParser', () => {
  let parser: FrontMatterParser;

  beforeEach(() => {
    parser = new FrontMatterParser();
  });

  describe('split', () => {
    it('should return text without a delimiter verbatim', () => {
      const text = 'Just a body\n---\nnot front matter\n';
      const doc = parser.split(text);

      expect(doc.meta).toEqual({});
      expect(doc.body).toBe(text);
      expect(doc.hasFrontMatter).toBe(false);
    });

    it('should keep the whole text when the block is never closed', () => {
      const text = '---\ntitle: Broken\n\nBody text';
      const doc = parser.split(text);

      expect(doc.meta).toEqual({});
      expect(doc.body).toBe(text);
      expect(doc.hasFrontMatter).toBe(false);
    });

    it('should split metadata and strip leading blank lines from the body', () => {
      const doc = parser.split('---\ntitle: Hello\ntags: [a, a, b]\n---\n\n\nFirst line\n\nSecond');

      expect(doc.meta).toEqual({ title: 'Hello', tags: ['a', 'a', 'b'] });
      expect(doc.body).toBe('First line\n\nSecond');
      expect(doc.hasFrontMatter).toBe(true);
    });

    it('should accept CRLF line endings', () => {
      const doc = parser.split('---\r\ntitle: Hi\r\n---\r\n\r\nBody\r\n');

      expect(doc.meta).toEqual({ title: 'Hi' });
      expect(doc.body).toBe('Body\n');
    });

    it('should keep date strings as text', () => {
      const doc = parser.split('---\ndate: 2024-01-02 10:30:00\n---\n');

      expect(doc.meta.date).toBe('2024-01-02 10:30:00');
    });

    it('should allow an empty block', () => {
      const doc = parser.split('---\n---\nBody');

      expect(doc.meta).toEqual({});
      expect(doc.body).toBe('Body');
      expect(doc.hasFrontMatter).toBe(true);
    });

    it('should return any text without a leading delimiter unchanged', () => {
      fc.assert(
        fc.property(fc.string(), (body) => {
          fc.pre(!body.replace(/\r\n?/g, '\n').split('\n')[0].trim().startsWith('---'));
          const doc = parser.split(body);
          return doc.body === body && Object.keys(doc.meta).length === 0;
        })
      );
    });
  });

  it('should report the selected strategy', () => {
    expect(new FrontMatterParser().strategy).toBe('best-effort');
    expect(new FrontMatterParser(createStructuredTextParser('minimal')).strategy).toBe('minimal');
  });
});

describe('MinimalYamlParser', () => {
  let parser: MinimalYamlParser;

  beforeEach(() => {
    parser = new MinimalYamlParser();
  });

  it('should read scalars', () => {
    const meta = parser.parse(
      ['title: "Hello: World"', 'draft: TRUE', 'views: 12', 'ratio: 1.5', 'cover: ~', 'author: jane'].join('\n')
    );

    expect(meta).toEqual({
      title: 'Hello: World',
      draft: true,
      views: 12,
      ratio: 1.5,
      cover: null,
      author: 'jane',
    });
  });

  it('should read block lists', () => {
    const meta = parser.parse('tags:\n  - alpha\n  - "beta"\ncategories:\n- notes');

    expect(meta).toEqual({ tags: ['alpha', 'beta'], categories: ['notes'] });
  });

  it('should read inline bracket lists', () => {
    expect(parser.parse('tags: [a, b, c]')).toEqual({ tags: ['a', 'b', 'c'] });
    expect(parser.parse('tags: []')).toEqual({ tags: [] });
  });

  it('should read comma lists only for tags and categories', () => {
    const meta = parser.parse('tags: x, y\ncategories: Life, Work\ntitle: One, Two');

    expect(meta).toEqual({ tags: ['x', 'y'], categories: ['Life', 'Work'], title: 'One, Two' });
  });

  it('should stop a list at a stray line', () => {
    const meta = parser.parse('tags:\n- a\nthis line is not yaml\n- b');

    expect(meta).toEqual({ tags: ['a'] });
  });

  it('should skip comments and blank lines', () => {
    expect(parser.parse('# heading\n\ntitle: Hi')).toEqual({ title: 'Hi' });
  });
});

describe('BestEffortYamlParser', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should use the full YAML engine for nested values', () => {
    const meta = new BestEffortYamlParser().parse('categories:\n  - name: Tech\n  - [Life, Notes]');

    expect(meta).toEqual({ categories: [{ name: 'Tech' }, ['Life', 'Notes']] });
  });

  it('should fall back to the minimal parser when YAML is malformed', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    // Duplicate keys are rejected by the engine
    const meta = new BestEffortYamlParser().parse('title: One\ntitle: Two\ntags: a, b');

    expect(meta).toEqual({ title: 'Two', tags: ['a', 'b'] });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should fall back when the block is not a mapping', () => {
    expect(new BestEffortYamlParser().parse('- a\n- b')).toEqual({});
  });
});

describe('parseScalar', () => {
  it('should unwrap quotes without coercing the text', () => {
    expect(parseScalar('"true"')).toBe('true');
    expect(parseScalar("'42'")).toBe('42');
  });

  it('should coerce literals', () => {
    expect(parseScalar('False')).toBe(false);
    expect(parseScalar('None')).toBeNull();
    expect(parseScalar('-7')).toBe(-7);
    expect(parseScalar('3.25')).toBe(3.25);
    expect(parseScalar('1.2.3')).toBe('1.2.3');
    expect(parseScalar('   ')).toBe('');
  });
});

describe('normalizeList', () => {
  it('should wrap a single scalar', () => {
    expect(normalizeList('  Tech  ')).toEqual(['Tech']);
    expect(normalizeList(2024)).toEqual(['2024']);
  });

  it('should split an inline list string', () => {
    expect(normalizeList('[a, "b", a]')).toEqual(['a', 'b']);
    expect(normalizeList('[]')).toEqual([]);
  });

  it('should read the name field of a mapping', () => {
    expect(normalizeList({ name: ' Tech ' })).toEqual(['Tech']);
  });

  it('should flatten nested lists in first-seen order', () => {
    expect(normalizeList([{ name: 'x' }, ['y', ' x '], 'z', null, ''])).toEqual(['x', 'y', 'z']);
  });

  it('should collect mapping values without a name field', () => {
    expect(normalizeList({ first: 'p', second: ['q', 'p'] })).toEqual(['p', 'q']);
  });

  it('should treat missing values as empty', () => {
    expect(normalizeList(undefined)).toEqual([]);
    expect(normalizeList(null)).toEqual([]);
  });
});
