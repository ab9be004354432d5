// A fractional part on the seconds is accepted and dropped
const HOURS_MINUTES_SECONDS = /^(\d{1,2}):(\d{2}):(\d{2})(?:\.\d+)?$/;
const MINUTES_SECONDS = /^(\d{1,2}):(\d{2})(?:\.\d+)?$/;
const BARE_SECONDS = /^(\d+)(?:\.\d+)?$/;

/**
 * Parse a model-supplied start time into whole seconds.
 * Accepts HH:MM:SS, MM:SS and bare seconds, each with optional fractional
 * seconds; anything else is 0.
 */
export function parseTimestamp(value: string | null | undefined): number {
  const input = (value ?? "").trim();

  let match = input.match(HOURS_MINUTES_SECONDS);
  if (match) {
    return Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3]);
  }

  match = input.match(MINUTES_SECONDS);
  if (match) {
    return Number(match[1]) * 60 + Number(match[2]);
  }

  match = input.match(BARE_SECONDS);
  if (match) {
    return Number(match[1]);
  }

  return 0;
}

/** `H:MM:SS` from one hour up, `M:SS` below. */
export function formatTimestamp(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  const ss = String(s).padStart(2, "0");

  if (h > 0) {
    return `${h}:${String(m).padStart(2, "0")}:${ss}`;
  }
  return `${m}:${ss}`;
}
