import { basename } from 'node:path';
import type { IngestResult } from '../types/index.js';

const UNITS: Array<[number, string]> = [
  [1e9, 'B'],
  [1e6, 'M'],
  [1e3, 'k'],
];

/** 1234 → "1.2k", 5300000 → "5.3M"; values under 1000 print as integers. */
export function formatCount(n: number, precision = 1): string {
  const abs = Math.abs(n);
  const index = UNITS.findIndex(([size]) => abs >= size);
  if (index !== -1) {
    return withUnit(n, index, precision);
  }
  const rounded = Math.round(n);
  return Math.abs(rounded) >= 1000 ? withUnit(n, UNITS.length - 1, precision) : String(rounded);
}

// Moves up a unit when rounding lands on 1000 (999_960 → "1M", not "1000k").
function withUnit(n: number, index: number, precision: number): string {
  const unit = UNITS[index];
  if (!unit) return String(Math.round(n));
  const [size, suffix] = unit;
  const scaled = (n / size).toFixed(precision);
  if (index > 0 && Math.abs(Number(scaled)) >= 1000) {
    return withUnit(n, index - 1, precision);
  }
  return `${scaled.replace(/\.0+$/, '')}${suffix}`;
}

export function formatSummary(result: IngestResult, inputPath: string): string {
  const lines: string[] = [`Analysis complete! Output written to: ${result.outputPath}`, '', 'Summary:'];

  lines.push(`Directory: ${inputPath}`);
  if (result.isDirectory) {
    lines.push(`Files analyzed: ${result.files.length.toLocaleString()}`);
  } else {
    const fileLabel = result.files[0] ?? basename(inputPath);
    lines.push(`File: ${fileLabel}`);
    lines.push(`Lines: ${result.fileLineCounts[fileLabel] ?? 0}`);
  }

  if (result.readFailures.length > 0) {
    lines.push(`Unreadable files: ${result.readFailures.length}`);
  }

  lines.push('');
  lines.push(`Estimated tokens: ${formatCount(result.tokenCount)}`);
  return lines.join('\n');
}
