export function joinRelative(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name;
}

/**
 * Case-insensitive order, falling back to the raw names so `A.txt` and
 * `a.txt` still sort the same way on every platform.
 */
export function compareNames(a: string, b: string): number {
  const lowerA = a.toLowerCase();
  const lowerB = b.toLowerCase();
  if (lowerA !== lowerB) return lowerA < lowerB ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
