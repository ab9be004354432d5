/**
 * Date helpers for values coming back from the Neon driver and external APIs.
 *
 * The Neon driver may hand back timestamp columns as Date objects or ISO
 * strings depending on the runtime, and the Google APIs send ISO strings.
 */

/** Convert a date-ish value (Date | string | null) to a Date, or null. */
export function toDateSafe(value: unknown): Date | null {
  if (value == null || value === "") return null;
  if (value instanceof Date) return isNaN(value.getTime()) ? null : value;
  const d = new Date(String(value));
  if (isNaN(d.getTime())) return null;
  return d;
}

const pad = (n: number) => String(n).padStart(2, "0");

/** `yyyy-MM-dd` in UTC */
export function formatIsoDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/** `yyyy-MM-dd HH:mm:ss UTC`, the marker written back to the spreadsheet */
export function formatUtcStamp(date: Date): string {
  return (
    `${formatIsoDate(date)} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} UTC`
  );
}
