import { minimatch, type MinimatchOptions } from 'minimatch';

// Shell-style globbing only: braces, extglobs, `!` and `#` are literal characters.
const GLOB_OPTIONS: MinimatchOptions = {
  dot: true,
  nobrace: true,
  noext: true,
  nonegate: true,
  nocomment: true,
};

// Stands in for `/` so the whole relative path is a single glob segment.
const FLAT_SEPARATOR = '\u0000';

/**
 * A pattern matches when it globs the whole relative path or occurs in it
 * verbatim. `*` and `?` match across `/`, so `src/*` selects `src/pkg/a.py`
 * and `*.py` selects Python files at any depth.
 *
 * The substring fallback is deliberately looser than glob semantics: a bare
 * `build` excludes `build/` and `src/build/` alike, but it also excludes
 * `rebuild.ts`. Keep it; callers depend on it.
 */
export function patternMatches(path: string, pattern: string): boolean {
  return globMatches(path, pattern) || path.includes(pattern);
}

export function matchesInclude(path: string, patterns: readonly string[]): boolean {
  if (patterns.length === 0) return true;
  return patterns.some((pattern) => patternMatches(path, pattern));
}

export function matchesExclude(path: string, patterns: readonly string[]): boolean {
  if (patterns.length === 0) return false;
  return patterns.some((pattern) => patternMatches(path, pattern));
}

function globMatches(path: string, pattern: string): boolean {
  try {
    return minimatch(flatten(path), flatten(pattern), GLOB_OPTIONS);
  } catch (error) {
    // minimatch rejects some patterns outright (e.g. over its length limit)
    if (error instanceof TypeError) return false;
    throw error;
  }
}

function flatten(value: string): string {
  return value.split('/').join(FLAT_SEPARATOR);
}
