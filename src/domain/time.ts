const SECOND = 1_000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const MONTH = 30 * DAY;
const YEAR = 365 * DAY;

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/**
 * Human readable duration, e.g. `"3 secs"`, `"1 hour"`.
 *
 * With `fine` set, sub-second deltas are printed as `"N ms"`.
 * Negative deltas yield `"in the future"`.
 */
export function humanFormattedTimedelta(deltaMs: number, fine = false): string {
  if (deltaMs < 0) return 'in the future';
  const seconds = Math.floor(deltaMs / SECOND);
  if (fine && seconds === 0) return `${Math.floor(deltaMs)} ms`;
  if (deltaMs < MINUTE) return plural(seconds, 'sec');
  if (deltaMs < HOUR) return plural(Math.floor(deltaMs / MINUTE), 'min');
  if (deltaMs < DAY) return plural(Math.floor(deltaMs / HOUR), 'hour');
  if (deltaMs < MONTH) return plural(Math.floor(deltaMs / DAY), 'day');
  if (deltaMs < YEAR) return plural(Math.floor(deltaMs / MONTH), 'month');
  return plural(Math.floor(deltaMs / YEAR), 'year');
}

/** Duration between two timestamps with millisecond granularity. */
export function formatDuration(startMs: number, endMs: number): string {
  return humanFormattedTimedelta(endMs - startMs, true);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** `YYYY-MM-DD HH:MM:SS.mmm` in UTC. */
export function formatDate(epochMs: number): string {
  const d = new Date(epochMs);
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}.` +
    pad(d.getUTCMilliseconds(), 3)
  );
}
