import { readdirSync, statSync, type Dirent, type Stats } from 'node:fs';
import { basename, join } from 'node:path';
import type { FileEntry, IngestConfig } from '../types/index.js';
import { silentLogger, type IngestLogger } from '../output/logger.js';
import { describeError, InvalidPathError, NotFoundError } from './errors.js';
import { DirectoryFilter, FileFilter, type Candidate } from './filter.js';
import { loadIgnoreScope, ScopeChain } from './ignore-scope.js';
import { compareNames, joinRelative } from './paths.js';

export interface CollectOptions {
  logger?: IngestLogger | undefined;
}

type ChildKind = 'directory' | 'file' | 'symlinked-directory' | 'other';

/**
 * Collects the files selected by `config`, in case-insensitive name order.
 * Excluded or ignored directories are pruned before they are listed.
 */
export function collectEntries(config: IngestConfig, options: CollectOptions = {}): FileEntry[] {
  const logger = options.logger ?? silentLogger;
  const root = config.inputPath;
  const stat = statSync(root, { throwIfNoEntry: false });

  if (!stat) {
    throw new NotFoundError(root);
  }

  if (stat.isFile()) {
    return collectSingleFile(config, logger);
  }

  if (!stat.isDirectory()) {
    throw new InvalidPathError(root);
  }

  const walker = new TreeWalker(config, logger);
  walker.walk(root, '', ScopeChain.EMPTY);
  return walker.entries;
}

function collectSingleFile(config: IngestConfig, logger: IngestLogger): FileEntry[] {
  const candidate: Candidate = {
    absolutePath: config.inputPath,
    relativePath: basename(config.inputPath),
    scopes: ScopeChain.EMPTY,
  };
  const result = new FileFilter(config, { keepIgnoreFiles: true }).shouldInclude(candidate);
  if (!result.passes) {
    logger.skip({ path: candidate.absolutePath, isDirectory: false, reason: result.reason, detail: result.detail });
    return [];
  }
  return [{ absolutePath: candidate.absolutePath, relativePath: candidate.relativePath }];
}

class TreeWalker {
  readonly entries: FileEntry[] = [];
  private readonly fileFilter: FileFilter;
  private readonly directoryFilter: DirectoryFilter;

  constructor(
    private readonly config: IngestConfig,
    private readonly logger: IngestLogger
  ) {
    this.fileFilter = new FileFilter(config);
    this.directoryFilter = new DirectoryFilter(config);
  }

  walk(directory: string, relativeDir: string, inherited: ScopeChain): void {
    const scopes = this.config.respectIgnoreFiles ? this.enterScope(directory, relativeDir, inherited) : inherited;

    let children: Dirent[];
    try {
      children = readdirSync(directory, { withFileTypes: true });
    } catch (error) {
      this.logger.unreadableDirectory(directory, describeError(error));
      return;
    }
    children.sort((a, b) => compareNames(a.name, b.name));

    for (const child of children) {
      const candidate: Candidate = {
        absolutePath: join(directory, child.name),
        relativePath: joinRelative(relativeDir, child.name),
        scopes,
      };

      switch (classify(child, candidate.absolutePath)) {
        case 'directory': {
          const result = this.directoryFilter.shouldDescend(candidate);
          if (!result.passes) {
            this.logger.skip({ path: candidate.absolutePath, isDirectory: true, reason: result.reason, detail: result.detail });
            break;
          }
          this.walk(candidate.absolutePath, candidate.relativePath, scopes);
          break;
        }
        case 'file': {
          const result = this.fileFilter.shouldInclude(candidate);
          if (!result.passes) {
            this.logger.skip({ path: candidate.absolutePath, isDirectory: false, reason: result.reason, detail: result.detail });
            break;
          }
          this.entries.push({ absolutePath: candidate.absolutePath, relativePath: candidate.relativePath });
          break;
        }
        case 'symlinked-directory':
        case 'other':
          break;
      }
    }
  }

  private enterScope(directory: string, relativeDir: string, inherited: ScopeChain): ScopeChain {
    try {
      return inherited.extend(loadIgnoreScope(directory, relativeDir, this.config.ignoreFileNames));
    } catch (error) {
      this.logger.unreadableIgnoreFile(directory, describeError(error));
      return inherited;
    }
  }
}

// Symlinked directories are never entered; symlinked files are read through.
function classify(child: Dirent, absPath: string): ChildKind {
  if (child.isDirectory()) return 'directory';
  if (child.isFile()) return 'file';
  if (!child.isSymbolicLink()) return 'other';

  let target: Stats | undefined;
  try {
    target = statSync(absPath, { throwIfNoEntry: false });
  } catch {
    // link loop or unreadable target: same as a dangling link
    return 'other';
  }
  if (target?.isDirectory()) return 'symlinked-directory';
  if (target?.isFile()) return 'file';
  return 'other';
}
