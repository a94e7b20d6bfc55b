import { Command, CommanderError, Option } from 'commander';
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import chalk from 'chalk';
import ora from 'ora';

import type { TokenizerKind } from './types/index.js';
import { parseSize } from './config/builder.js';
import { Defaults } from './constants/defaults.js';
import { describeError, EmptySelectionError, IngestError } from './core/errors.js';
import { createTokenCounter } from './core/tokens.js';
import { formatSummary } from './formatters/summary.js';
import { runIngest } from './ingest.js';
import { createConsoleLogger } from './output/logger.js';

const VERSION = '1.0.0';

interface CliOptions {
  output: string;
  include: string[];
  exclude: string[];
  gitignore: boolean;
  maxSize: string;
  includeBinary: boolean;
  tokenizer: TokenizerKind;
  verbose: boolean;
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function buildProgram(io: CliIO, onRun: (inputPath: string, opts: CliOptions) => void): Command {
  return new Command()
    .name('tree-ingest')
    .description('Pack a directory tree and the contents of its files into one text file for LLM context')
    .version(VERSION)
    .argument('<path>', 'File or directory to ingest')
    .requiredOption('-o, --output <file>', 'Write the packed context to this file')
    .option('--include <pattern...>', 'Glob or substring a file must match', [...Defaults.INCLUDE_PATTERNS])
    .option('--exclude <pattern...>', 'Glob or substring that excludes a file or prunes a directory', [])
    .option('--no-gitignore', 'Do not apply .gitignore rules')
    .option('--max-size <size>', 'Skip files larger than this (e.g. 512k, 2M; 0 disables)', Defaults.CLI_MAX_SIZE)
    .option('--include-binary', 'Keep files that look binary', false)
    .addOption(
      new Option('--tokenizer <kind>', 'Token estimate strategy')
        .choices(['tiktoken', 'whitespace'])
        .default(Defaults.TOKENIZER)
    )
    .option('-v, --verbose', 'Log every skipped file and directory', false)
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    })
    .exitOverride()
    .action(onRun);
}

/** Parses `argv` and runs one ingest; resolves to the process exit code. */
export async function runCli(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
  let exitCode = 0;

  const program = buildProgram(io, (inputPath, opts) => {
    const spinner = ora({ text: 'Collecting files...', isEnabled: opts.verbose ? false : undefined, stream: process.stderr }).start();
    try {
      const result = runIngest(
        {
          inputPath,
          outputPath: opts.output,
          includePatterns: opts.include,
          excludePatterns: opts.exclude,
          respectIgnoreFiles: opts.gitignore,
          maxFileSizeBytes: parseSize(opts.maxSize),
          skipBinaryFiles: !opts.includeBinary,
        },
        {
          tokenCounter: createTokenCounter(opts.tokenizer),
          logger: createConsoleLogger({ verbose: opts.verbose, write: io.err }),
        }
      );
      spinner.succeed(`Packed ${result.files.length} file(s)`);
      io.out(formatSummary(result, inputPath));
      if (result.readFailures.length > 0) {
        io.err(chalk.yellow(`⚠️ ${result.readFailures.length} file(s) could not be read; see markers in the output`));
      }
    } catch (error) {
      spinner.fail('Ingest failed');
      io.err(chalk.red(`❌ Error: ${describeError(error)}`));
      if (error instanceof EmptySelectionError) {
        io.err(chalk.dim('   Try loosening --include/--exclude, or pass --no-gitignore.'));
      }
      if (!(error instanceof IngestError)) {
        io.err(chalk.dim(error instanceof Error && error.stack ? error.stack : String(error)));
      }
      exitCode = 1;
    }
  });

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    // commander has already printed usage errors, help and version
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(chalk.red(`❌ Error: ${describeError(error)}`));
      process.exitCode = 1;
    }
  );
}
