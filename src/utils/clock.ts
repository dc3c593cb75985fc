export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** `YYYY-MM-DD HH:MM:SS` in UTC, the format SQLite's datetime('now') produces. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function minutesBefore(date: Date, minutes: number): Date {
  return new Date(date.getTime() - minutes * 60_000);
}
