export * from './models.js';
export * from './errors.js';
export * from './config.js';
export * from './services/text.js';
export * from './services/dates.js';
export * from './services/front-matter.js';
export * from './services/asset-resolver.js';
export * from './services/link-rewriter.js';
export * from './services/math-normalizer.js';
export * from './services/terms.service.js';
export * from './services/posts.service.js';
export * from './services/sql-export.service.js';
export * from './services/migration.service.js';
