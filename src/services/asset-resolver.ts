/**
 * Asset Resolver
 *
 * Matches a Hexo post to the folder holding its images. Handles the
 * `post.md` + `post/` layout, exported folders carrying a
 * `_YYYYMMDD_HHMMSS` suffix, and posts already living inside their folder.
 */

import fs from 'node:fs';
import path from 'node:path';

const TIMESTAMP_SUFFIX_RE = /_[0-9]{8}_[0-9]{6}$/;
const SEPARATORS_RE = /[\s_-]+/gu;
const NON_WORD_RE = /[^\p{L}\p{M}\p{N}_]+/gu;

/**
 * Drop a trailing `_<8 digits>_<6 digits>` export timestamp
 */
export function stripAssetSuffix(name: string): string {
  return name.replace(TIMESTAMP_SUFFIX_RE, '');
}

/**
 * Key for fuzzy folder matching: no timestamp suffix, lowercase,
 * no separators or punctuation
 */
export function normalizeAssetMatchKey(name: string): string {
  return stripAssetSuffix(name).toLowerCase().replace(SEPARATORS_RE, '').replace(NON_WORD_RE, '');
}

/**
 * Pick the asset folder for a file stem among candidate folder names.
 *
 * Order: exact name, single `stem_` prefix match, single normalized match.
 * When several candidates remain the lexicographically first prefix match
 * wins, then the first normalized match. The tie-break is a compatibility
 * policy, kept stable so repeated runs give the same answer.
 */
export function matchAssetDir(stem: string, dirNames: Iterable<string>): string | null {
  const names = [...dirNames];

  if (names.includes(stem)) {
    return stem;
  }

  const prefixMatches = names.filter((name) => name.startsWith(`${stem}_`)).sort();
  if (prefixMatches.length === 1) {
    return prefixMatches[0];
  }

  const stemKey = normalizeAssetMatchKey(stem);
  const normalizedMatches = names.filter((name) => normalizeAssetMatchKey(name) === stemKey).sort();
  if (normalizedMatches.length === 1) {
    return normalizedMatches[0];
  }

  if (prefixMatches.length > 0) return prefixMatches[0];
  if (normalizedMatches.length > 0) return normalizedMatches[0];
  return null;
}

/**
 * Asset Resolver
 */
export class AssetResolver {
  private sourceDir: string;
  private dirNames: ReadonlySet<string>;

  constructor(sourceDir: string, dirNames: Iterable<string>) {
    this.sourceDir = path.resolve(sourceDir);
    this.dirNames = new Set(dirNames);
  }

  /**
   * Build a resolver from the immediate subdirectories of the posts folder
   */
  static fromDirectory(sourceDir: string): AssetResolver {
    const names = fs
      .readdirSync(sourceDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name);

    return new AssetResolver(sourceDir, names);
  }

  get candidates(): string[] {
    return [...this.dirNames].sort();
  }

  /**
   * Resolve the asset folder name for a markdown file.
   * A file nested in a subdirectory uses that directory without searching.
   */
  resolve(markdownPath: string): string | null {
    const absolute = path.resolve(markdownPath);
    const parent = path.dirname(absolute);

    if (parent !== this.sourceDir) {
      return path.basename(parent);
    }

    const stem = path.basename(absolute, path.extname(absolute));
    return matchAssetDir(stem, this.dirNames);
  }
}
