import { homedir } from 'node:os';
import { resolve } from 'node:path';
import type { IngestConfig, IngestOptions } from '../types/index.js';
import { Defaults } from '../constants/defaults.js';

export function parseSize(sizeStr: string): number | undefined {
  if (!sizeStr) return undefined;

  const normalized = sizeStr.trim().toLowerCase();
  if (normalized === '0') return undefined;

  const multipliers: Record<string, number> = {
    k: 1024,
    m: 1024 ** 2,
    g: 1024 ** 3,
  };

  const lastChar = normalized.slice(-1);
  const multiplier = multipliers[lastChar];
  if (multiplier !== undefined) {
    const num = parseFloat(normalized.slice(0, -1));
    if (!isNaN(num)) {
      return Math.floor(num * multiplier);
    }
  }

  const num = parseInt(normalized, 10);
  return isNaN(num) ? undefined : num;
}

export function normalizePatterns(patterns: readonly string[] | undefined, defaultAll: boolean): string[] {
  const normalized = (patterns ?? []).map((p) => p.trim()).filter((p) => p !== '');
  if (normalized.length === 0 && defaultAll) {
    return [...Defaults.INCLUDE_PATTERNS];
  }
  return normalized;
}

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

export function buildIngestConfig(options: IngestOptions): IngestConfig {
  if (options.maxFileSizeBytes !== undefined && (!Number.isFinite(options.maxFileSizeBytes) || options.maxFileSizeBytes < 0)) {
    throw new RangeError(`maxFileSizeBytes must be a non-negative number, got ${options.maxFileSizeBytes}`);
  }

  return Object.freeze({
    inputPath: resolve(expandHome(options.inputPath)),
    outputPath: resolve(expandHome(options.outputPath)),
    includePatterns: Object.freeze(normalizePatterns(options.includePatterns, true)),
    excludePatterns: Object.freeze(normalizePatterns(options.excludePatterns, false)),
    respectIgnoreFiles: options.respectIgnoreFiles ?? true,
    ignoreFileNames: Object.freeze([...(options.ignoreFileNames ?? Defaults.IGNORE_FILE_NAMES)]),
    maxFileSizeBytes: options.maxFileSizeBytes,
    skipBinaryFiles: options.skipBinaryFiles ?? true,
  });
}
