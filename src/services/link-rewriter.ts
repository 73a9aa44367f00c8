/**
 * Link Rewriter
 *
 * Points relative image links (`![alt](img.png)` and `<img src="img.png">`)
 * at the published asset folder: `<prefix>/<asset dir>/<path>`.
 */

import type { AssetMode } from '../models.js';
import { normalizeAssetMatchKey } from './asset-resolver.js';

const MARKDOWN_IMAGE_RE = /(!\[[^\]]*]\()([^)\n]+)(\))/g;
const HTML_IMG_SRC_RE = /(<img\b[^>]*?\bsrc\s*=\s*)(["'])(.+?)(\2)/gi;
const SCHEME_RE = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;
const SCHEME_URL_RE = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;
const SPECIAL_SCHEMES = ['mailto:', 'data:', 'javascript:', 'tel:'];
const TARGET_TITLE_RE = /^(\S+)\s+([\s\S]*)$/;
const RESERVED_IN_COMPONENT_RE = /[!'()*]/g;

export interface LinkRewriteOptions {
  assetDirName: string | null;
  assetMode: AssetMode;
  assetUrlPrefix: string;
}

export interface LinkRewriteResult {
  content: string;
  rewritten: number;
}

export interface MarkdownTarget {
  url: string;
  tail: string; // Title part, with its leading space
  wrapped: boolean; // URL was written as <url>
}

/**
 * Relative links are the only ones rewritten: absolute paths, anchors,
 * protocol-relative URLs and anything with a scheme stay as they are.
 */
export function isRelativeUrl(url: string): boolean {
  const target = url.trim();
  if (!target) return false;

  if (target.startsWith('/') || target.startsWith('#')) return false;

  const lower = target.toLowerCase();
  if (SPECIAL_SCHEMES.some((scheme) => lower.startsWith(scheme))) return false;

  return !SCHEME_RE.test(target);
}

/**
 * Split `path?query#hash` into the path and the verbatim suffix
 */
export function splitUrlAndSuffix(url: string): [string, string] {
  let index = url.length;
  const queryIndex = url.indexOf('?');
  const hashIndex = url.indexOf('#');
  if (queryIndex !== -1) index = Math.min(index, queryIndex);
  if (hashIndex !== -1) index = Math.min(index, hashIndex);
  return [url.slice(0, index), url.slice(index)];
}

/**
 * Percent-encode one path segment, leaving only `A-Z a-z 0-9 - _ . ~`
 */
export function encodePathSegment(segment: string): string {
  return encodeURIComponent(segment).replace(
    RESERVED_IN_COMPONENT_RE,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Join path segments onto the asset URL prefix
 */
export function joinUrlPrefix(prefix: string, segments: string[]): string {
  const clean = prefix.trim();

  if (SCHEME_URL_RE.test(clean) || clean.startsWith('//')) {
    const base = clean.replace(/\/+$/, '');
    const encodedPath = segments.filter(Boolean).map(encodePathSegment).join('/');
    return encodedPath ? `${base}/${encodedPath}` : base;
  }

  const leadingSlash = clean.startsWith('/');
  const prefixSegments = clean.split('/').filter(Boolean);
  const encoded = [...prefixSegments, ...segments].filter(Boolean).map(encodePathSegment).join('/');

  return leadingSlash ? `/${encoded}` : encoded;
}

/**
 * Rewrite one relative URL, or null when it must stay untouched
 */
export function rewriteRelativeAssetUrl(url: string, assetDirName: string, assetUrlPrefix: string): string | null {
  if (!isRelativeUrl(url)) return null;

  const [pathPart, suffix] = splitUrlAndSuffix(url.trim());
  let normalizedPath = pathPart.replace(/\\/g, '/');
  while (normalizedPath.startsWith('./')) {
    normalizedPath = normalizedPath.slice(2);
  }
  if (normalizedPath.startsWith('../')) return null;

  const segments = normalizedPath.split('/').filter((segment) => segment && segment !== '.');
  if (segments.length === 0) return null;

  const targetSegments =
    normalizeAssetMatchKey(segments[0]) === normalizeAssetMatchKey(assetDirName)
      ? segments
      : [assetDirName, ...segments];

  const rewritten = joinUrlPrefix(assetUrlPrefix, targetSegments);
  if (!rewritten) return null;
  return rewritten + suffix;
}

/**
 * Split the `(...)` part of a markdown image into URL and title
 */
export function splitMarkdownTarget(rawTarget: string): MarkdownTarget {
  const text = rawTarget.trim();
  if (!text) return { url: '', tail: '', wrapped: false };

  if (text.startsWith('<')) {
    const closeIndex = text.indexOf('>');
    if (closeIndex !== -1) {
      return { url: text.slice(1, closeIndex).trim(), tail: text.slice(closeIndex + 1), wrapped: true };
    }
  }

  const titled = TARGET_TITLE_RE.exec(text);
  if (!titled) return { url: text, tail: '', wrapped: false };
  return { url: titled[1], tail: ` ${titled[2]}`, wrapped: false };
}

/**
 * Whether the content references any relative image
 */
export function hasRelativeImageLinks(content: string): boolean {
  for (const match of content.matchAll(MARKDOWN_IMAGE_RE)) {
    const { url } = splitMarkdownTarget(match[2]);
    if (url && isRelativeUrl(url)) return true;
  }

  for (const match of content.matchAll(HTML_IMG_SRC_RE)) {
    if (isRelativeUrl(match[3])) return true;
  }

  return false;
}

/**
 * Rewrite every relative image link of a post body
 */
export function rewriteImageLinks(content: string, options: LinkRewriteOptions): LinkRewriteResult {
  const { assetDirName, assetMode, assetUrlPrefix } = options;
  if (assetMode !== 'prefix' || !assetDirName) {
    return { content, rewritten: 0 };
  }

  let rewritten = 0;

  const withMarkdown = content.replace(
    MARKDOWN_IMAGE_RE,
    (whole: string, open: string, rawTarget: string, close: string) => {
      const { url, tail, wrapped } = splitMarkdownTarget(rawTarget);
      if (!url) return whole;

      const next = rewriteRelativeAssetUrl(url, assetDirName, assetUrlPrefix);
      if (next === null) return whole;

      rewritten++;
      const target = wrapped ? `<${next}>${tail}` : `${next}${tail}`;
      return `${open}${target}${close}`;
    }
  );

  const withHtml = withMarkdown.replace(
    HTML_IMG_SRC_RE,
    (whole: string, open: string, quote: string, url: string, close: string) => {
      const next = rewriteRelativeAssetUrl(url, assetDirName, assetUrlPrefix);
      if (next === null) return whole;

      rewritten++;
      return `${open}${quote}${next}${close}`;
    }
  );

  return { content: withHtml, rewritten };
}
