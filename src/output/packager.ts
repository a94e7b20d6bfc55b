import { closeSync, mkdirSync, openSync, readFileSync, statSync, writeSync } from 'node:fs';
import { basename, dirname } from 'node:path';
import type { FileEntry, IngestConfig, IngestResult, ReadFailure } from '../types/index.js';
import { FILE_LABEL, FILE_SEPARATOR, TREE_HEADING } from '../constants/defaults.js';
import { FileReadError } from '../core/errors.js';
import type { TokenCounter } from '../core/tokens.js';
import { orderEntries, renderTree } from '../formatters/tree.js';
import { silentLogger, type IngestLogger } from './logger.js';

export interface PackageOptions {
  tokenCounter: TokenCounter;
  logger?: IngestLogger | undefined;
  /** Checked between files; an aborted run leaves a partial file and throws. */
  signal?: AbortSignal | undefined;
}

/** Trailing newlines collapse to exactly one. */
export function normalizeContent(content: string): string {
  return `${content.replace(/\n+$/, '')}\n`;
}

export function countLines(content: string): number {
  let count = 0;
  for (const char of content) {
    if (char === '\n') count++;
  }
  return count;
}

export function formatFileHeader(displayName: string): string {
  return `${FILE_SEPARATOR}\n${FILE_LABEL}${displayName}\n${FILE_SEPARATOR}\n`;
}

export function rootDisplayName(inputPath: string): string {
  return basename(inputPath) || inputPath;
}

/** Appends to an open descriptor and counts tokens of exactly what was written. */
class ArtifactWriter {
  private tokens = 0;

  constructor(
    private readonly fd: number,
    private readonly tokenCounter: TokenCounter
  ) {}

  write(text: string): void {
    writeSync(this.fd, text);
    this.tokens += this.tokenCounter.count(text);
  }

  get tokenCount(): number {
    return this.tokens;
  }
}

/**
 * Streams the tree and every entry's content to `config.outputPath`. Only
 * one file body is held in memory at a time.
 */
export function packageEntries(
  config: IngestConfig,
  entries: readonly FileEntry[],
  options: PackageOptions
): IngestResult {
  const logger = options.logger ?? silentLogger;
  const isDirectory = statSync(config.inputPath).isDirectory();
  const ordered = orderEntries(entries);

  const files: string[] = [];
  const lineCounts = new Map<string, number>();
  const readFailures: ReadFailure[] = [];

  mkdirSync(dirname(config.outputPath), { recursive: true });
  const fd = openSync(config.outputPath, 'w');
  const writer = new ArtifactWriter(fd, options.tokenCounter);

  try {
    const treeLines = renderTree(rootDisplayName(config.inputPath), ordered, isDirectory);
    writer.write(`${TREE_HEADING}\n${treeLines.join('\n')}\n\n`);

    for (const entry of ordered) {
      options.signal?.throwIfAborted();

      const displayName = entry.relativePath;
      files.push(displayName);

      let content: string;
      try {
        content = normalizeContent(readFileSync(entry.absolutePath).toString('utf-8'));
      } catch (error) {
        const failure = new FileReadError(displayName, error);
        logger.readFailed(displayName, failure.message);
        readFailures.push({ file: displayName, message: failure.message });
        lineCounts.set(displayName, 0);
        writer.write(formatFileHeader(displayName));
        writer.write(`[${failure.message}]\n`);
        writer.write('\n');
        continue;
      }

      writer.write(formatFileHeader(displayName));
      writer.write(content);
      writer.write('\n');
      lineCounts.set(displayName, countLines(content));
    }
  } finally {
    closeSync(fd);
  }

  return {
    outputPath: config.outputPath,
    isDirectory,
    files,
    // fromEntries defines own keys, so a file named __proto__ keeps its count
    fileLineCounts: Object.fromEntries(lineCounts),
    tokenCount: writer.tokenCount,
    readFailures,
  };
}
