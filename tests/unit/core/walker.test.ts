import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync, symlinkSync } from 'node:fs';
import { join } from 'node:path';
import { buildIngestConfig } from '../../../src/config/builder.js';
import { InvalidPathError, NotFoundError } from '../../../src/core/errors.js';
import { collectEntries } from '../../../src/core/walker.js';
import type { IngestLogger, SkipEvent } from '../../../src/output/logger.js';
import type { IngestOptions } from '../../../src/types/index.js';
import { createFixture, writeFiles } from '../../helpers/fixture.js';

function recordingLogger(): IngestLogger & { skips: SkipEvent[] } {
  const skips: SkipEvent[] = [];
  return {
    skips,
    skip: (event) => skips.push(event),
    unreadableDirectory: () => {},
    unreadableIgnoreFile: () => {},
    readFailed: () => {},
  };
}

describe('collectEntries', () => {
  let fixture: string;
  let outDir: string;

  const collect = (options: Partial<IngestOptions> = {}, logger?: IngestLogger) =>
    collectEntries(
      buildIngestConfig({ inputPath: fixture, outputPath: join(outDir, 'context.txt'), ...options }),
      { logger }
    ).map((entry) => entry.relativePath);

  beforeEach(() => {
    fixture = createFixture('walk');
    outDir = createFixture('walk-out');
    writeFiles(fixture, {
      'a.py': 'print("a")\n',
      'B.txt': 'b\n',
      'c.md': '# c\n',
      'node_modules/pkg/index.js': 'module.exports = {};\n',
      'src/main.py': 'main()\n',
      'src/util/helper.py': 'def helper(): pass\n',
    });
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
    rmSync(outDir, { recursive: true, force: true });
  });

  it('walks in case-insensitive name order', () => {
    expect(collect()).toEqual([
      'a.py',
      'B.txt',
      'c.md',
      'node_modules/pkg/index.js',
      'src/main.py',
      'src/util/helper.py',
    ]);
  });

  it('keeps every path under the root with forward slashes', () => {
    const entries = collectEntries(buildIngestConfig({ inputPath: fixture, outputPath: join(outDir, 'o.txt') }));
    for (const entry of entries) {
      expect(entry.relativePath.startsWith('..')).toBe(false);
      expect(entry.relativePath.includes('\\')).toBe(false);
      expect(join(fixture, entry.relativePath)).toBe(entry.absolutePath);
    }
    expect(new Set(entries.map((e) => e.relativePath)).size).toBe(entries.length);
  });

  it('applies include patterns to files only', () => {
    expect(collect({ includePatterns: ['*.py'] })).toEqual(['a.py', 'src/main.py', 'src/util/helper.py']);
  });

  it('prunes an excluded directory even when its files match the include patterns', () => {
    const logger = recordingLogger();
    expect(collect({ includePatterns: ['*.js'], excludePatterns: ['node_modules'] }, logger)).toEqual([]);

    const pruned = logger.skips.filter((s) => s.isDirectory);
    expect(pruned).toEqual([
      {
        path: join(fixture, 'node_modules'),
        isDirectory: true,
        reason: 'excluded',
        detail: 'Matches exclude patterns',
      },
    ]);
    expect(logger.skips.some((s) => s.path.includes(join('node_modules', 'pkg')))).toBe(false);
  });

  it('prunes directories ignored by .gitignore', () => {
    writeFiles(fixture, { '.gitignore': 'build/\n', 'build/out.js': 'compiled\n' });
    const paths = collect();
    expect(paths.some((p) => p.startsWith('build/'))).toBe(false);
    expect(paths).not.toContain('.gitignore');
  });

  it('reads everything, ignore files included, when ignore files are not respected', () => {
    writeFiles(fixture, { '.gitignore': 'build/\n', 'build/out.js': 'compiled\n' });
    const paths = collect({ respectIgnoreFiles: false });
    expect(paths).toContain('build/out.js');
    expect(paths).toContain('.gitignore');
  });

  it('lets a nested .gitignore un-ignore a file', () => {
    rmSync(fixture, { recursive: true, force: true });
    fixture = createFixture('walk-nested');
    writeFiles(fixture, {
      '.gitignore': '*.log\n',
      'top.log': 'top\n',
      'app/.gitignore': '!debug.log\n',
      'app/debug.log': 'debug\n',
      'app/other.log': 'other\n',
      'app/main.py': 'main()\n',
    });
    expect(collect()).toEqual(['app/debug.log', 'app/main.py']);
  });

  it('does not leak a subdirectory scope into its siblings', () => {
    writeFiles(fixture, {
      'one/.gitignore': '*.py\n',
      'one/x.py': 'x\n',
      'two/y.py': 'y\n',
    });
    const paths = collect();
    expect(paths).not.toContain('one/x.py');
    expect(paths).toContain('two/y.py');
  });

  it('keeps a file of exactly the size limit and drops one byte more', () => {
    writeFiles(fixture, { 'limit/exact.txt': 'x'.repeat(10), 'limit/over.txt': 'x'.repeat(11) });
    const paths = collect({ includePatterns: ['limit/'], maxFileSizeBytes: 10 });
    expect(paths).toEqual(['limit/exact.txt']);
  });

  it('skips binary files unless asked to keep them', () => {
    writeFiles(fixture, { 'blob.dat': Buffer.from([0x41, 0x00, 0x42]) });
    expect(collect()).not.toContain('blob.dat');
    expect(collect({ skipBinaryFiles: false })).toContain('blob.dat');
  });

  it('never selects the output file', () => {
    writeFiles(fixture, { 'context.txt': 'previous run\n' });
    const entries = collectEntries(
      buildIngestConfig({ inputPath: fixture, outputPath: join(fixture, 'context.txt') })
    ).map((e) => e.relativePath);
    expect(entries).not.toContain('context.txt');
  });

  it('collects a single-file root by its name', () => {
    const entries = collectEntries(
      buildIngestConfig({ inputPath: join(fixture, 'src', 'main.py'), outputPath: join(outDir, 'o.txt') })
    );
    expect(entries).toEqual([{ absolutePath: join(fixture, 'src', 'main.py'), relativePath: 'main.py' }]);
  });

  it('selects an ignore file given directly as the root', () => {
    writeFiles(fixture, { '.gitignore': 'dist/\n' });
    const entries = collectEntries(
      buildIngestConfig({ inputPath: join(fixture, '.gitignore'), outputPath: join(outDir, 'o.txt') })
    );
    expect(entries).toEqual([{ absolutePath: join(fixture, '.gitignore'), relativePath: '.gitignore' }]);
  });

  it('returns nothing when a single-file root is filtered out', () => {
    const entries = collectEntries(
      buildIngestConfig({
        inputPath: join(fixture, 'a.py'),
        outputPath: join(outDir, 'o.txt'),
        includePatterns: ['*.md'],
      })
    );
    expect(entries).toEqual([]);
  });

  it('throws NotFoundError for a missing root', () => {
    const config = buildIngestConfig({ inputPath: join(fixture, 'missing'), outputPath: join(outDir, 'o.txt') });
    expect(() => collectEntries(config)).toThrow(NotFoundError);
  });

  it('throws InvalidPathError for a device root', () => {
    if (process.platform === 'win32') return;
    const config = buildIngestConfig({ inputPath: '/dev/null', outputPath: join(outDir, 'o.txt') });
    expect(() => collectEntries(config)).toThrow(InvalidPathError);
  });

  it('never enters a symlinked directory', () => {
    if (process.platform === 'win32') return;
    symlinkSync(join(fixture, 'src'), join(fixture, 'linked'), 'dir');
    symlinkSync(join(fixture, 'a.py'), join(fixture, 'alias.py'));
    const paths = collect();
    expect(paths.some((p) => p.startsWith('linked/'))).toBe(false);
    expect(paths).toContain('alias.py');
  });
});
