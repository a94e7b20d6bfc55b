import { statSync } from 'node:fs';
import { basename } from 'node:path';
import type { FilterResult, IngestConfig } from '../types/index.js';
import { isBinaryFile } from './binary.js';
import { describeError } from './errors.js';
import { matchesExclude, matchesInclude } from './patterns.js';
import type { ScopeChain } from './ignore-scope.js';

export interface Candidate {
  absolutePath: string;
  relativePath: string;
  scopes: ScopeChain;
}

export interface FilterRule {
  check(candidate: Candidate, config: IngestConfig): FilterResult;
}

const PASS: FilterResult = { passes: true };

class ExcludeRule implements FilterRule {
  check(candidate: Candidate, config: IngestConfig): FilterResult {
    if (matchesExclude(candidate.relativePath, config.excludePatterns)) {
      return { passes: false, reason: 'excluded', detail: 'Matches exclude patterns' };
    }
    return PASS;
  }
}

class IgnoreScopeRule implements FilterRule {
  constructor(private readonly isDirectory: boolean) {}

  check(candidate: Candidate, config: IngestConfig): FilterResult {
    if (!config.respectIgnoreFiles) return PASS;
    if (candidate.scopes.isIgnored(candidate.relativePath, this.isDirectory)) {
      return { passes: false, reason: 'ignored', detail: 'Matched ignore file rules' };
    }
    return PASS;
  }
}

class IgnoreFileRule implements FilterRule {
  check(candidate: Candidate, config: IngestConfig): FilterResult {
    if (!config.respectIgnoreFiles) return PASS;
    const name = basename(candidate.absolutePath);
    if (config.ignoreFileNames.includes(name)) {
      return { passes: false, reason: 'ignore-file', detail: `Ignore rules file: ${name}` };
    }
    return PASS;
  }
}

class OutputArtifactRule implements FilterRule {
  check(candidate: Candidate, config: IngestConfig): FilterResult {
    if (candidate.absolutePath === config.outputPath) {
      return { passes: false, reason: 'output-artifact', detail: 'Is the output file' };
    }
    return PASS;
  }
}

class SizeRule implements FilterRule {
  check(candidate: Candidate, config: IngestConfig): FilterResult {
    if (config.maxFileSizeBytes === undefined) return PASS;
    try {
      const { size } = statSync(candidate.absolutePath);
      if (size > config.maxFileSizeBytes) {
        return {
          passes: false,
          reason: 'too-large',
          detail: `Too large: ${size.toLocaleString()} > ${config.maxFileSizeBytes.toLocaleString()} bytes`,
        };
      }
    } catch (error) {
      return { passes: false, reason: 'unreadable', detail: `Cannot stat file: ${describeError(error)}` };
    }
    return PASS;
  }
}

class BinaryRule implements FilterRule {
  check(candidate: Candidate, config: IngestConfig): FilterResult {
    if (!config.skipBinaryFiles) return PASS;
    try {
      if (isBinaryFile(candidate.absolutePath)) {
        return { passes: false, reason: 'binary', detail: 'Binary file' };
      }
    } catch (error) {
      return { passes: false, reason: 'unreadable', detail: `Cannot read file: ${describeError(error)}` };
    }
    return PASS;
  }
}

class IncludeRule implements FilterRule {
  check(candidate: Candidate, config: IngestConfig): FilterResult {
    if (!matchesInclude(candidate.relativePath, config.includePatterns)) {
      return { passes: false, reason: 'not-included', detail: 'No include pattern matched' };
    }
    return PASS;
  }
}

function runRules(rules: readonly FilterRule[], candidate: Candidate, config: IngestConfig): FilterResult {
  for (const rule of rules) {
    const result = rule.check(candidate, config);
    if (!result.passes) {
      return result;
    }
  }
  return PASS;
}

export interface FileFilterOptions {
  /** Leave ignore files selectable; a single-file root has no scope to consume them into. */
  keepIgnoreFiles?: boolean;
}

/** Cheap, name-based checks run before the ones that touch the file. */
export class FileFilter {
  private readonly rules: FilterRule[];

  constructor(
    private readonly config: IngestConfig,
    options: FileFilterOptions = {}
  ) {
    this.rules = [
      new ExcludeRule(),
      new IgnoreScopeRule(false),
      ...(options.keepIgnoreFiles ? [] : [new IgnoreFileRule()]),
      new OutputArtifactRule(),
      new SizeRule(),
      new BinaryRule(),
      new IncludeRule(),
    ];
  }

  shouldInclude(candidate: Candidate): FilterResult {
    return runRules(this.rules, candidate, this.config);
  }
}

/** Decides whether a directory is descended into at all. */
export class DirectoryFilter {
  private readonly rules: FilterRule[] = [new ExcludeRule(), new IgnoreScopeRule(true)];

  constructor(private readonly config: IngestConfig) {}

  shouldDescend(candidate: Candidate): FilterResult {
    return runRules(this.rules, candidate, this.config);
  }
}
