/**
 * UTC stamp formatting/parsing and abortable waits.
 */

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * `YYYYMMDD_HHMMSS` (or `YYYYMMDD_HHMMSS_mmm`) in UTC.
 */
export function formatUtcStamp(date: Date, withMillis = false): string {
  const stamp =
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return withMillis ? `${stamp}_${pad(date.getUTCMilliseconds(), 3)}` : stamp;
}

const EMBEDDED_PATTERNS: RegExp[] = [
  // 20251015_123456, 20251015T123456, optional _789 / .789 millis
  /(?<!\d)(\d{4})(\d{2})(\d{2})[_T](\d{2})(\d{2})(\d{2})(?:[_.](\d{3})(?!\d))?/,
  // 2025-10-15_12-34-56, 2025-10-15T12:34:56
  /(?<!\d)(\d{4})-(\d{2})-(\d{2})[_T ](\d{2})[-:](\d{2})[-:](\d{2})(?:[_.](\d{3})(?!\d))?/,
];

/**
 * Extract the date/time recorders embed in file names. Stamps are UTC.
 * Returns null when the name carries no valid stamp.
 */
export function parseEmbeddedTimestamp(name: string): Date | null {
  for (const pattern of EMBEDDED_PATTERNS) {
    const match = pattern.exec(name);
    if (!match) {
      continue;
    }

    const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
    const millis = match[7] ? Number(match[7]) : 0;
    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));

    // Date.UTC rolls 2025-13-40 over silently; reject anything that moved
    if (
      date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day ||
      date.getUTCHours() !== hour ||
      date.getUTCMinutes() !== minute ||
      date.getUTCSeconds() !== second
    ) {
      continue;
    }
    return date;
  }
  return null;
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function elapsedSeconds(start: Date, end: Date): number {
  return Math.max(0, (end.getTime() - start.getTime()) / 1000);
}
