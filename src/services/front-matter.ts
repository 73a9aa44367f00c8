/**
 * Front Matter Parser
 *
 * Splits a Hexo post into its metadata block and body. The text between
 * the `---` delimiters is handed to a StructuredTextParser picked once at
 * construction: the best-effort strategy tries the `yaml` engine and falls
 * back to the minimal subset parser, the minimal strategy never touches it.
 */

import YAML from 'yaml';
import type { FrontMatter, FrontMatterStrategy, FrontMatterValue, ParsedDocument } from '../models.js';
import { dedupe } from './text.js';

export const FRONT_MATTER_BOUNDARY = '---';

const KEY_VALUE_RE = /^([A-Za-z0-9_-]+):(?:\s*(.*))?$/;
const LIST_ITEM_RE = /^\s*-\s*(.+?)\s*$/;
const INTEGER_RE = /^-?\d+$/;
const DECIMAL_RE = /^-?\d+\.\d+$/;
const NEWLINE_RE = /\r\n?/g;
const LEADING_NEWLINES_RE = /^\n+/;
const EDGE_QUOTES_RE = /^['"]+|['"]+$/g;

/** Keys whose comma-separated inline values are read as lists. */
const INLINE_LIST_KEYS = new Set(['tags', 'categories']);

/**
 * Turns front matter text into key/value metadata
 */
export interface StructuredTextParser {
  readonly strategy: FrontMatterStrategy;
  parse(text: string): FrontMatter;
}

/**
 * Minimal YAML subset: `key: value`, `key:` + `- item` lines,
 * `[a, b]` inline lists and comma lists for tags/categories
 */
export class MinimalYamlParser implements StructuredTextParser {
  readonly strategy = 'minimal' as const;

  parse(text: string): FrontMatter {
    const data: FrontMatter = {};
    let currentKey: string | null = null;

    for (const rawLine of text.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith('#')) continue;

      const listMatch = LIST_ITEM_RE.exec(rawLine);
      if (listMatch && currentKey) {
        const existing = data[currentKey];
        const items: FrontMatterValue[] = Array.isArray(existing) ? existing : normalizeList(existing);
        items.push(parseScalar(listMatch[1]));
        data[currentKey] = items;
        continue;
      }

      const keyMatch = KEY_VALUE_RE.exec(line);
      if (!keyMatch) {
        // A stray line ends the previous key's list
        currentKey = null;
        continue;
      }

      const key = keyMatch[1];
      const valueRaw = (keyMatch[2] ?? '').trim();
      currentKey = key;

      if (valueRaw === '') {
        data[key] = [];
        continue;
      }

      if (valueRaw.startsWith('[') && valueRaw.endsWith(']')) {
        const inside = valueRaw.slice(1, -1).trim();
        data[key] = inside ? inside.split(',').map((part) => parseScalar(part)) : [];
        continue;
      }

      if (INLINE_LIST_KEYS.has(key) && valueRaw.includes(',')) {
        data[key] = valueRaw
          .split(',')
          .filter((part) => part.trim())
          .map((part) => parseScalar(part));
        continue;
      }

      data[key] = parseScalar(valueRaw);
    }

    return data;
  }
}

/**
 * Full YAML first, minimal subset when the engine rejects the block
 */
export class BestEffortYamlParser implements StructuredTextParser {
  readonly strategy = 'best-effort' as const;
  private fallback = new MinimalYamlParser();

  parse(text: string): FrontMatter {
    try {
      const loaded: unknown = YAML.parse(text);
      if (isMapping(loaded)) {
        return toFrontMatter(loaded);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[FrontMatter] YAML engine rejected block, using minimal parser: ${message}`);
    }

    return this.fallback.parse(text);
  }
}

export function createStructuredTextParser(strategy: FrontMatterStrategy = 'best-effort'): StructuredTextParser {
  return strategy === 'minimal' ? new MinimalYamlParser() : new BestEffortYamlParser();
}

/**
 * Front Matter Parser
 */
export class FrontMatterParser {
  constructor(private parser: StructuredTextParser = createStructuredTextParser()) {}

  get strategy(): FrontMatterStrategy {
    return this.parser.strategy;
  }

  /**
   * Split a document into metadata and body.
   * Without a complete delimiter pair the text comes back untouched.
   */
  split(text: string): ParsedDocument {
    const normalized = text.replace(NEWLINE_RE, '\n');
    const lines = normalized.split('\n');

    if (lines[0].trim() !== FRONT_MATTER_BOUNDARY) {
      return { meta: {}, body: text, hasFrontMatter: false };
    }

    let endIndex = -1;
    for (let i = 1; i < lines.length; i++) {
      if (lines[i].trim() === FRONT_MATTER_BOUNDARY) {
        endIndex = i;
        break;
      }
    }

    if (endIndex === -1) {
      return { meta: {}, body: text, hasFrontMatter: false };
    }

    const frontText = lines.slice(1, endIndex).join('\n');
    const body = lines.slice(endIndex + 1).join('\n').replace(LEADING_NEWLINES_RE, '');

    return { meta: this.parser.parse(frontText), body, hasFrontMatter: true };
  }
}

/**
 * Coerce a scalar: booleans, nulls and numbers. A quoted value unwraps to
 * text and is never coerced, so `"true"` stays the string `true`, the way
 * the YAML engine reads it.
 */
export function parseScalar(value: string): FrontMatterValue {
  const text = value.trim();
  if (!text) return '';

  const first = text[0];
  if (text.length >= 2 && (first === '"' || first === "'") && text[text.length - 1] === first) {
    return text.slice(1, -1);
  }

  const lowered = text.toLowerCase();
  if (lowered === 'true') return true;
  if (lowered === 'false') return false;
  if (lowered === 'null' || lowered === 'none' || lowered === '~') return null;

  if (INTEGER_RE.test(text) || DECIMAL_RE.test(text)) {
    const parsed = Number(text);
    if (Number.isFinite(parsed)) return parsed;
  }

  return text;
}

/**
 * Flatten a categories/tags value into ordered, unique, trimmed names.
 * Accepts a scalar, an inline list string, a `{ name }` mapping or
 * nested lists of any of these.
 */
export function normalizeList(value: FrontMatterValue | undefined): string[] {
  if (value === null || value === undefined) return [];

  if (typeof value === 'string') {
    const stripped = value.trim();
    if (!stripped) return [];

    if (stripped.startsWith('[') && stripped.endsWith(']')) {
      const inner = stripped.slice(1, -1).trim();
      if (!inner) return [];
      return dedupe(
        inner
          .split(',')
          .map((part) => part.trim())
          .filter(Boolean)
          .map((part) => part.replace(EDGE_QUOTES_RE, ''))
      );
    }

    return [stripped];
  }

  if (value instanceof Date) {
    return [value.toISOString()];
  }

  if (Array.isArray(value)) {
    return dedupe(value.flatMap((item) => normalizeList(item)));
  }

  if (typeof value === 'object') {
    if ('name' in value) {
      return normalizeList(value.name);
    }
    return dedupe(Object.values(value).flatMap((item) => normalizeList(item)));
  }

  return dedupe([String(value)]);
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function toFrontMatter(record: Record<string, unknown>): FrontMatter {
  const out: FrontMatter = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = toFrontMatterValue(value);
  }
  return out;
}

function toFrontMatterValue(value: unknown): FrontMatterValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  if (Array.isArray(value)) return value.map((item: unknown) => toFrontMatterValue(item));
  if (isMapping(value)) return toFrontMatter(value);
  return String(value);
}
