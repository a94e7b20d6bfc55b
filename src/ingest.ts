import type { IngestOptions, IngestResult } from './types/index.js';
import { buildIngestConfig } from './config/builder.js';
import { EmptySelectionError } from './core/errors.js';
import { createTokenCounter, type TokenCounter } from './core/tokens.js';
import { collectEntries } from './core/walker.js';
import { silentLogger, type IngestLogger } from './output/logger.js';
import { packageEntries } from './output/packager.js';

export interface IngestDependencies {
  tokenCounter?: TokenCounter | undefined;
  logger?: IngestLogger | undefined;
  signal?: AbortSignal | undefined;
}

/**
 * One ingest run: select files under `options.inputPath` and write the
 * tree plus their contents to `options.outputPath`.
 *
 * Throws NotFoundError or InvalidPathError for a bad root and
 * EmptySelectionError when the filters leave nothing; in those cases no
 * output file is created.
 */
export function runIngest(options: IngestOptions, deps: IngestDependencies = {}): IngestResult {
  const config = buildIngestConfig(options);
  const logger = deps.logger ?? silentLogger;

  const entries = collectEntries(config, { logger });
  if (entries.length === 0) {
    throw new EmptySelectionError(options.inputPath);
  }

  deps.signal?.throwIfAborted();

  return packageEntries(config, entries, {
    tokenCounter: deps.tokenCounter ?? createTokenCounter(),
    logger,
    signal: deps.signal,
  });
}
