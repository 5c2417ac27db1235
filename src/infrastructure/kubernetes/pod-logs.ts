/**
 * Log lines as returned by the API server with `timestamps=true`: `<RFC3339 timestamp> <line>`
 */

export type LogLine = [Date, string];

export function parseTimestampedLog(text: string): LogLine[] {
  const lines: LogLine[] = [];

  for (const raw of text.split('\n')) {
    if (raw === '') {
      continue;
    }
    const separator = raw.indexOf(' ');
    const timestamp = new Date(separator < 0 ? raw : raw.slice(0, separator));
    if (Number.isNaN(timestamp.getTime())) {
      continue;
    }
    lines.push([timestamp, separator < 0 ? '' : raw.slice(separator + 1)]);
  }

  return lines;
}

/**
 * Lines logged at or after `from`, at most `limit` of them, oldest first
 */
export function selectLogLines(lines: readonly LogLine[], from: Date | undefined, limit: number): LogLine[] {
  return lines
    .filter(([timestamp]) => from === undefined || timestamp.getTime() >= from.getTime())
    .slice(0, Math.max(0, limit));
}

/**
 * Seconds to ask the API server for so that `from` is covered; the server takes whole seconds
 */
export const sinceSeconds = (from: Date | undefined, now: Date = new Date()): number | undefined =>
  from === undefined ? undefined : Math.max(1, Math.ceil((now.getTime() - from.getTime()) / 1000));
