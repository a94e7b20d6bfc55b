export { runIngest } from './ingest.js';
export type { IngestDependencies } from './ingest.js';

// Configuration
export { buildIngestConfig, normalizePatterns, parseSize } from './config/builder.js';

// Selection
export { collectEntries } from './core/walker.js';
export type { CollectOptions } from './core/walker.js';
export { matchesExclude, matchesInclude, patternMatches } from './core/patterns.js';
export { loadIgnoreScope, ScopeChain } from './core/ignore-scope.js';
export type { IgnoreScope, ScopeVerdict } from './core/ignore-scope.js';
export { isBinaryFile } from './core/binary.js';
export { DirectoryFilter, FileFilter } from './core/filter.js';
export type { Candidate, FilterRule } from './core/filter.js';

// Output
export { buildTree, orderEntries, renderTree } from './formatters/tree.js';
export { formatCount, formatSummary } from './formatters/summary.js';
export { countLines, normalizeContent, packageEntries } from './output/packager.js';
export type { PackageOptions } from './output/packager.js';
export { createConsoleLogger, silentLogger } from './output/logger.js';
export type { IngestLogger, SkipEvent } from './output/logger.js';
export { createTokenCounter, TiktokenCounter, WhitespaceCounter } from './core/tokens.js';
export type { TokenCounter } from './core/tokens.js';

// Errors
export {
  EmptySelectionError,
  FileReadError,
  IngestError,
  InvalidPathError,
  NotFoundError,
} from './core/errors.js';
export type { IngestErrorCode } from './core/errors.js';

export type * from './types/index.js';
