const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/** 1536 -> "1.5 KB" */
export function humanBytes(n: number): string {
  if (n < 0) return '0 B';
  let value = n;
  for (const unit of UNITS) {
    if (value < 1024 || unit === 'TB') {
      return unit === 'B' ? `${Math.trunc(value)} B` : `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} TB`;
}
