/**
 * Math Normalizer
 *
 * Rewrites underscore escaping inside MathJax regions only. The document
 * is held as a list of segments: plain text plus protected spans (fenced
 * code, inline code, math). Each pass only scans the text segments, and
 * joining the segments gives the document back, so no placeholder string
 * is ever written into the text.
 */

import type { MathUnderscoreMode } from '../models.js';

export type SegmentKind = 'text' | 'fence' | 'code' | 'math';

export interface Segment {
  kind: SegmentKind;
  text: string;
}

const LINE_RE = /[^\n]*\n|[^\n]+/g;
const FENCE_OPEN_RE = /^[ \t]*(`{3,}|~{3,})/;

const DISPLAY_DOLLAR_RE = /(?<!\\)\$\$([\s\S]+?)(?<!\\)\$\$/g;
const BRACKET_MATH_RE = /\\\[([\s\S]+?)\\\]/g;
const PAREN_MATH_RE = /\\\(([\s\S]+?)\\\)/g;
const INLINE_DOLLAR_RE = /(?<!\\)\$(?!\$)(.+?)(?<!\\)\$/g;

const MATH_DELIMITERS: ReadonlyArray<{ pattern: RegExp; open: string; close: string }> = [
  { pattern: DISPLAY_DOLLAR_RE, open: '$$', close: '$$' },
  { pattern: BRACKET_MATH_RE, open: '\\[', close: '\\]' },
  { pattern: PAREN_MATH_RE, open: '\\(', close: '\\)' },
];

function pushText(segments: Segment[], text: string): void {
  if (!text) return;
  const last = segments[segments.length - 1];
  if (last && last.kind === 'text') {
    last.text += text;
  } else {
    segments.push({ kind: 'text', text });
  }
}

/**
 * Protect fenced code blocks. A fence closes on a line holding at least
 * as many of the same fence character; an unterminated fence stays text.
 */
export function maskFencedCodeBlocks(text: string): Segment[] {
  const segments: Segment[] = [];
  let fence: { closer: RegExp; lines: string[] } | null = null;

  for (const line of text.match(LINE_RE) ?? []) {
    if (!fence) {
      const open = FENCE_OPEN_RE.exec(line);
      if (open) {
        const marker = open[1];
        fence = {
          closer: new RegExp(`^[ \\t]*${marker[0]}{${marker.length},}[ \\t]*\\r?\\n?$`),
          lines: [line],
        };
        continue;
      }
      pushText(segments, line);
      continue;
    }

    fence.lines.push(line);
    if (fence.closer.test(line)) {
      segments.push({ kind: 'fence', text: fence.lines.join('') });
      fence = null;
    }
  }

  if (fence) {
    pushText(segments, fence.lines.join(''));
  }

  return segments;
}

function countBackticks(text: string, start: number): number {
  let end = start;
  while (end < text.length && text[end] === '`') end++;
  return end - start;
}

function splitInlineCode(text: string): Segment[] {
  const segments: Segment[] = [];
  let i = 0;
  let plainStart = 0;

  while (i < text.length) {
    if (text[i] !== '`') {
      i++;
      continue;
    }

    const ticks = countBackticks(text, i);
    let close = -1;
    let j = i + ticks;
    while (j < text.length) {
      if (text[j] !== '`') {
        j++;
        continue;
      }
      const run = countBackticks(text, j);
      if (run === ticks) {
        close = j;
        break;
      }
      j += run;
    }

    if (close === -1) {
      // Unterminated run is literal text
      i += ticks;
      continue;
    }

    pushText(segments, text.slice(plainStart, i));
    segments.push({ kind: 'code', text: text.slice(i, close + ticks) });
    i = close + ticks;
    plainStart = i;
  }

  pushText(segments, text.slice(plainStart));
  return segments;
}

/**
 * Protect inline code spans: a backtick run closed by the next run of
 * the same length
 */
export function maskInlineCodeSpans(segments: Segment[]): Segment[] {
  return segments.flatMap((segment) => (segment.kind === 'text' ? splitInlineCode(segment.text) : [segment]));
}

/**
 * Fenced blocks then inline code spans
 */
export function maskCode(text: string): Segment[] {
  return maskInlineCodeSpans(maskFencedCodeBlocks(text));
}

export function restoreSegments(segments: Segment[]): string {
  return segments.map((segment) => segment.text).join('');
}

/**
 * An underscore is escaped when an odd number of backslashes precede it
 */
export function isEscapedAt(text: string, index: number): boolean {
  let backslashes = 0;
  for (let pos = index - 1; pos >= 0 && text[pos] === '\\'; pos--) {
    backslashes++;
  }
  return backslashes % 2 === 1;
}

export function escapeMathUnderscores(text: string): string {
  let out = '';
  for (let i = 0; i < text.length; i++) {
    out += text[i] === '_' && !isEscapedAt(text, i) ? '\\_' : text[i];
  }
  return out;
}

export function unescapeMathUnderscores(text: string): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    if (text[i] === '\\' && text[i + 1] === '_' && !isEscapedAt(text, i)) {
      out += '_';
      i += 2;
      continue;
    }
    out += text[i];
    i++;
  }
  return out;
}

export function normalizeMathSegment(text: string, mode: MathUnderscoreMode): string {
  if (mode === 'underscore') return unescapeMathUnderscores(text);
  if (mode === 'escaped') return escapeMathUnderscores(text);
  return text;
}

function protectMath(segments: Segment[], pattern: RegExp, render: (inner: string) => string): Segment[] {
  return segments.flatMap((segment) => {
    if (segment.kind !== 'text') return [segment];

    const out: Segment[] = [];
    let last = 0;
    for (const match of segment.text.matchAll(pattern)) {
      const start = match.index ?? 0;
      pushText(out, segment.text.slice(last, start));
      out.push({ kind: 'math', text: render(match[1]) });
      last = start + match[0].length;
    }
    pushText(out, segment.text.slice(last));
    return out;
  });
}

/**
 * Normalize math underscores, leaving code and non-math text untouched.
 *
 * Passes: fenced code, inline code, then `$$..$$`, `\[..\]`, `\(..\)`
 * regions, and finally single-dollar inline math rewritten in place.
 * Math regions never span a protected code segment.
 */
export function normalizeMathUnderscores(markdown: string, mode: MathUnderscoreMode): string {
  if (mode === 'keep' || !markdown) return markdown;

  let segments = maskCode(markdown);

  for (const { pattern, open, close } of MATH_DELIMITERS) {
    segments = protectMath(segments, pattern, (inner) => `${open}${normalizeMathSegment(inner, mode)}${close}`);
  }

  segments = segments.map((segment): Segment =>
    segment.kind === 'text'
      ? {
          kind: 'text',
          text: segment.text.replace(
            INLINE_DOLLAR_RE,
            (_whole: string, inner: string) => `$${normalizeMathSegment(inner, mode)}$`
          ),
        }
      : segment
  );

  return restoreSegments(segments);
}
