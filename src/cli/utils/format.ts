/**
 * Human-readable formatting for CLI output.
 */

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/** Format a byte count with 1024-based units, e.g. 1536 -> "1.5 KB". */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  const label = BYTE_UNITS[unit] ?? 'B';
  return unit === 0 ? `${value} ${label}` : `${value.toFixed(1)} ${label}`;
}

/** Format elapsed milliseconds, e.g. 83000 -> "1m 23s". */
export function formatDuration(ms: number): string {
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const whole = Math.floor(totalSeconds);
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const seconds = whole % 60;
  if (hours > 0) {
    return `${hours}h ${minutes}m`;
  }
  return `${minutes}m ${seconds}s`;
}
