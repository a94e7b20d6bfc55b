import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { hasRules, loadIgnoreScope, ScopeChain } from '../../../src/core/ignore-scope.js';
import { createFixture, writeFiles } from '../../helpers/fixture.js';

const GITIGNORE = ['.gitignore'];

describe('loadIgnoreScope', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = createFixture('scope');
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  it('returns null when there is no ignore file', () => {
    expect(loadIgnoreScope(fixture, '', GITIGNORE)).toBeNull();
  });

  it('returns null for an ignore file with only comments and blanks', () => {
    writeFiles(fixture, { '.gitignore': '# nothing here\n\n   \n' });
    expect(loadIgnoreScope(fixture, '', GITIGNORE)).toBeNull();
  });

  it('anchors the scope at the given base', () => {
    writeFiles(fixture, { '.gitignore': '*.log\n' });
    const scope = loadIgnoreScope(fixture, 'sub', GITIGNORE);
    expect(scope?.base).toBe('sub');
    expect(scope?.sources).toEqual([join(fixture, '.gitignore')]);
  });

  it('combines several ignore file names in order', () => {
    writeFiles(fixture, { '.gitignore': '*.log\n', '.ignore': '!keep.log\n' });
    const scope = loadIgnoreScope(fixture, '', ['.gitignore', '.ignore']);
    const chain = ScopeChain.EMPTY.extend(scope);
    expect(chain.verdict('keep.log', false)).toBe('kept');
    expect(chain.verdict('drop.log', false)).toBe('ignored');
  });
});

describe('hasRules', () => {
  it('detects at least one rule line', () => {
    expect(hasRules('# comment\n*.log\n')).toBe(true);
    expect(hasRules('# comment\r\n\r\n')).toBe(false);
  });
});

describe('ScopeChain', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = createFixture('chain');
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  function scopeFrom(base: string, rules: string) {
    const dir = join(fixture, base || 'root');
    writeFiles(dir, { '.gitignore': rules });
    return loadIgnoreScope(dir, base, GITIGNORE);
  }

  it('leaves unmatched paths unmatched', () => {
    const chain = ScopeChain.EMPTY.extend(scopeFrom('', '*.log\n'));
    expect(chain.verdict('app.py', false)).toBe('unmatched');
    expect(chain.isIgnored('app.py', false)).toBe(false);
  });

  it('lets a child scope un-ignore what a parent ignores', () => {
    const chain = ScopeChain.EMPTY.extend(scopeFrom('', '*.log\n')).extend(scopeFrom('sub', '!debug.log\n'));

    expect(chain.verdict('sub/debug.log', false)).toBe('kept');
    expect(chain.verdict('sub/other.log', false)).toBe('ignored');
  });

  it('does not apply a scope outside its directory', () => {
    const chain = ScopeChain.EMPTY.extend(scopeFrom('', '*.log\n')).extend(scopeFrom('sub', '!debug.log\n'));
    expect(chain.verdict('other/debug.log', false)).toBe('ignored');
    expect(chain.verdict('subway/debug.log', false)).toBe('ignored');
  });

  it('lets the last matching rule within a scope win', () => {
    const chain = ScopeChain.EMPTY.extend(scopeFrom('', '*.log\n!important.log\n'));
    expect(chain.verdict('important.log', false)).toBe('kept');
    expect(chain.verdict('noise.log', false)).toBe('ignored');
  });

  it('applies directory-only rules to directories only', () => {
    const chain = ScopeChain.EMPTY.extend(scopeFrom('', 'build/\n'));
    expect(chain.verdict('build', true)).toBe('ignored');
    expect(chain.verdict('build', false)).toBe('unmatched');
  });

  it('evaluates anchored rules relative to the scope directory', () => {
    const chain = ScopeChain.EMPTY.extend(scopeFrom('sub', '/root.txt\n'));
    expect(chain.verdict('sub/root.txt', false)).toBe('ignored');
    expect(chain.verdict('sub/deep/root.txt', false)).toBe('unmatched');
    expect(chain.verdict('root.txt', false)).toBe('unmatched');
  });

  it('does not change when extended with no scope', () => {
    expect(ScopeChain.EMPTY.extend(null)).toBe(ScopeChain.EMPTY);
    expect(ScopeChain.EMPTY.size).toBe(0);
  });
});
