import chalk from 'chalk';
import type { SkipReason } from '../types/index.js';

export interface SkipEvent {
  path: string;
  isDirectory: boolean;
  reason: SkipReason;
  detail: string;
}

export interface IngestLogger {
  skip(event: SkipEvent): void;
  unreadableDirectory(path: string, message: string): void;
  unreadableIgnoreFile(directory: string, message: string): void;
  readFailed(file: string, message: string): void;
}

export const silentLogger: IngestLogger = {
  skip() {},
  unreadableDirectory() {},
  unreadableIgnoreFile() {},
  readFailed() {},
};

export interface ConsoleLoggerOptions {
  verbose: boolean;
  write?: ((line: string) => void) | undefined;
}

/** Writes to stderr so stdout stays clean for the summary. */
export function createConsoleLogger(options: ConsoleLoggerOptions): IngestLogger {
  const write = options.write ?? ((line: string) => console.error(line));

  return {
    skip(event) {
      if (!options.verbose) return;
      const kind = event.isDirectory ? 'DIRECTORY' : 'FILE';
      write(chalk.dim(`SKIP ${kind} [${event.reason}] ${event.detail}: ${event.path}`));
    },
    unreadableDirectory(path, message) {
      write(chalk.yellow(`⚠️ Cannot list directory ${path}: ${message}`));
    },
    unreadableIgnoreFile(directory, message) {
      write(chalk.yellow(`⚠️ Cannot read ignore file in ${directory}: ${message}`));
    },
    readFailed(file, message) {
      write(chalk.yellow(`⚠️ ${file}: ${message}`));
    },
  };
}
