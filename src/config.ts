import { z } from 'zod';
import type { OutputEncoding } from './models.js';
import { MigrationError } from './errors.js';
import { DEFAULT_TABLE_PREFIX, normalizeTablePrefix } from './services/text.js';

const ENCODINGS = new Map<string, OutputEncoding>([
  ['utf8', 'utf8'],
  ['utf-8', 'utf8'],
  ['utf16le', 'utf16le'],
  ['utf-16le', 'utf16le'],
  ['latin1', 'latin1'],
  ['ascii', 'ascii'],
]);

/**
 * Migration configuration schema
 */
export const migrationConfigSchema = z.object({
  source: z.string().min(1).default('source/_posts'),
  output: z.string().min(1).default('typecho_import.sql'),
  tablePrefix: z.string().default(DEFAULT_TABLE_PREFIX).transform(normalizeTablePrefix),
  author: z.string().default('admin'),
  authorId: z.number().int().positive().default(1),
  includeDrafts: z.boolean().default(false),
  truncate: z.boolean().default(false),
  cidStart: z.number().int().default(1),
  midStart: z.number().int().default(1),
  assetMode: z.enum(['keep', 'prefix']).default('prefix'),
  assetUrlPrefix: z.string().default('/hexo-assets'),
  mathUnderscoreMode: z.enum(['keep', 'underscore', 'escaped']).default('keep'),
  encoding: z
    .string()
    .default('utf8')
    .transform((value, ctx) => {
      const encoding = ENCODINGS.get(value.trim().toLowerCase());
      if (!encoding) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported encoding: ${value}` });
        return z.NEVER;
      }
      return encoding;
    }),
});

export type MigrationConfigInput = z.input<typeof migrationConfigSchema>;
export type MigrationConfig = z.output<typeof migrationConfigSchema>;

/**
 * Unvalidated options, as they come from flags or callers
 */
export type RawMigrationConfig = { [K in keyof MigrationConfigInput]?: unknown };

/**
 * Validate a configuration and fill in defaults.
 * Environment variables stand in for a few options left unset.
 */
export function resolveConfig(input: RawMigrationConfig = {}, env: NodeJS.ProcessEnv = process.env): MigrationConfig {
  const result = migrationConfigSchema.safeParse({
    ...input,
    tablePrefix: input.tablePrefix ?? env.TYPECHO_TABLE_PREFIX,
    assetUrlPrefix: input.assetUrlPrefix ?? env.HEXO_ASSET_URL_PREFIX,
    author: input.author ?? env.HEXO_AUTHOR,
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new MigrationError(`Invalid configuration: ${issues.join('; ')}`, 'INVALID_CONFIG');
  }

  return result.data;
}
