const SIZE_PREFIXES = ['', 'k', 'M', 'G', 'T', 'P'];

/**
 * Decimal (powers of 1000) size, one digit after the point: "25.2 MB".
 */
export function formatSize(value: number, unit = 'B'): string {
  let n = 0;
  let scaled = value;
  while (scaled > 1000 && n < SIZE_PREFIXES.length - 1) {
    scaled /= 1000;
    n++;
  }
  return `${Math.round(scaled * 10) / 10} ${SIZE_PREFIXES[n]}${unit}`;
}
