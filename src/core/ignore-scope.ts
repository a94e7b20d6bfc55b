import { readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';

export type ScopeVerdict = 'ignored' | 'kept' | 'unmatched';

/** Rules from the ignore files of one directory, applying to that directory and below. */
export interface IgnoreScope {
  /** Root-relative directory the rules are anchored at; '' for the root. */
  base: string;
  sources: string[];
  matcher: Ignore;
}

export function hasRules(content: string): boolean {
  return content.split(/\r?\n/).some((line) => {
    const trimmed = line.trim();
    return trimmed !== '' && !trimmed.startsWith('#');
  });
}

/**
 * Compiles the ignore files found in `directory`. Returns null when none
 * exist or none contributes a rule.
 */
export function loadIgnoreScope(
  directory: string,
  base: string,
  fileNames: readonly string[]
): IgnoreScope | null {
  const sources: string[] = [];
  const contents: string[] = [];

  for (const fileName of fileNames) {
    const source = join(directory, fileName);
    if (!isRegularFile(source)) continue;

    const content = readFileSync(source, 'utf-8');
    if (!hasRules(content)) continue;

    sources.push(source);
    contents.push(content);
  }

  if (contents.length === 0) {
    return null;
  }

  const matcher = ignore({ ignorecase: false, allowRelativePaths: true });
  for (const content of contents) {
    matcher.add(content);
  }
  return { base, sources, matcher };
}

function isRegularFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

function scopedPath(relativePath: string, base: string): string | null {
  if (base === '') return relativePath;
  const prefix = `${base}/`;
  return relativePath.startsWith(prefix) ? relativePath.slice(prefix.length) : null;
}

/**
 * Ordered ignore scopes, root-most first. Immutable: descending into a
 * directory extends a copy, so sibling subtrees never see each other's rules.
 */
export class ScopeChain {
  static readonly EMPTY = new ScopeChain([]);

  private constructor(private readonly scopes: readonly IgnoreScope[]) {}

  get size(): number {
    return this.scopes.length;
  }

  extend(scope: IgnoreScope | null): ScopeChain {
    return scope ? new ScopeChain([...this.scopes, scope]) : this;
  }

  /**
   * Within a scope the last matching rule decides; a deeper scope overrides
   * shallower ones only when one of its rules matches.
   */
  verdict(relativePath: string, isDirectory: boolean): ScopeVerdict {
    let verdict: ScopeVerdict = 'unmatched';

    for (const scope of this.scopes) {
      const scoped = scopedPath(relativePath, scope.base);
      if (!scoped) continue;

      const target = isDirectory ? `${scoped}/` : scoped;
      const { ignored, unignored } = scope.matcher.test(target);
      if (ignored) {
        verdict = 'ignored';
      } else if (unignored) {
        verdict = 'kept';
      }
    }

    return verdict;
  }

  isIgnored(relativePath: string, isDirectory: boolean): boolean {
    return this.verdict(relativePath, isDirectory) === 'ignored';
  }
}
