/**
 * Marketplace timestamps are ISO strings, sometimes with a space instead of
 * `T` and often without an offset. Those without one are taken as UTC.
 */
export function parseMarketTimestamp(value: string): number {
  const normalized = value.trim().replace(' ', 'T');
  if (/^\d{4}-\d{2}-\d{2}$/.test(normalized)) {
    return Date.parse(normalized);
  }
  const hasOffset = /(Z|[+-]\d{2}:?\d{2})$/i.test(normalized);
  return Date.parse(hasOffset ? normalized : `${normalized}Z`);
}

/**
 * Fractional-second digits past the millisecond, right-padded so that
 * "5" and "500000" compare equal
 */
export function subMillisecondDigits(value: string, width: number): string {
  const match = /\d{2}:\d{2}:\d{2}\.\d{3}(\d*)/.exec(value);
  return (match ? match[1] : '').padEnd(width, '0');
}
