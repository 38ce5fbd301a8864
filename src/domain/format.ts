const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/**
 * Human-readable size in binary units, one decimal, truncated (never rounded up).
 *
 * formatSize(1536) === '1.5 KB'
 */
export function formatSize(bytes: number): string {
  let value = Number.isFinite(bytes) && bytes > 0 ? bytes : 0;
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < SIZE_UNITS.length - 1) {
    value /= 1024;
    unitIndex++;
  }
  const truncated = Math.floor(value * 10) / 10;
  return `${truncated.toFixed(1)} ${SIZE_UNITS[unitIndex]}`;
}

/** Multiplier of a unit label produced by formatSize. */
export function unitFactor(unit: string): number {
  const index = SIZE_UNITS.findIndex((u) => u === unit);
  return index < 0 ? Number.NaN : 1024 ** index;
}

const pad2 = (n: number) => String(n).padStart(2, '0');

/**
 * `MM-DD  HH:mm` in local time (two spaces between date and time).
 */
export function formatDate(date: Date): string {
  return `${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}  ${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}
