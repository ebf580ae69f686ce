/**
 * Append-only destination for security-relevant events. Implementations must
 * write each line whole and durably before returning.
 */
export interface LogSink {
  record(line: string): void;
}

export function formatUtcTimestamp(date: Date): string {
  // 2006-01-02T15:04:05.000Z -> 2006-01-02 15:04:05 UTC
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}
