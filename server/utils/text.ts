/**
 * Text-length helpers shared by the stage processors.
 */

export const ELLIPSIS = "...";

/**
 * Clamp a stored field to `max` characters. Prefers the last word boundary
 * when it keeps more than 80% of the allowance; always appends the ellipsis
 * when anything was cut.
 */
export function truncateText(value: string, max: number): string {
  if (value.length <= max) return value;

  const head = value.substring(0, max);
  const lastSpace = head.lastIndexOf(" ");
  if (lastSpace > 0 && lastSpace > max * 0.8) {
    return head.substring(0, lastSpace) + ELLIPSIS;
  }
  return head + ELLIPSIS;
}

export interface TranscriptBudget {
  maxChars: number;
  /** Fraction of the budget a boundary cut must keep, e.g. 0.85 */
  minKeepRatio: number;
  /** Also accept a line break as a boundary */
  breakOnNewline: boolean;
}

export const TOPIC_DISCOVERY_BUDGET: TranscriptBudget = {
  maxChars: 600_000,
  minKeepRatio: 0.85,
  breakOnNewline: true,
};

export const SUMMARY_BUDGET: TranscriptBudget = {
  maxChars: 12_000,
  minKeepRatio: 0.8,
  breakOnNewline: false,
};

/**
 * Fit a transcript into a prompt budget. Cuts after the last sentence end
 * (or line break) inside the budget if that keeps enough text, otherwise
 * cuts raw and marks the cut with an ellipsis.
 */
export function truncateTranscript(transcript: string, budget: TranscriptBudget): string {
  if (transcript.length <= budget.maxChars) return transcript;

  const head = transcript.substring(0, budget.maxChars);
  const sentenceEnd = head.lastIndexOf(". ");
  const lineEnd = budget.breakOnNewline ? head.lastIndexOf("\n") : -1;
  const boundary = Math.max(sentenceEnd >= 0 ? sentenceEnd + 1 : -1, lineEnd);

  if (boundary > budget.maxChars * budget.minKeepRatio) {
    return head.substring(0, boundary);
  }
  return head + ELLIPSIS;
}

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

export const WORD_TRUNCATION_SUFFIX = "... [transcript truncated for length]";

export function truncateWords(text: string, maxWords: number): string {
  const words = splitWords(text);
  if (words.length <= maxWords) return text;
  return words.slice(0, maxWords).join(" ") + WORD_TRUNCATION_SUFFIX;
}

// Models sometimes wrap JSON in ```json fences even in JSON mode
export function stripCodeFences(raw: string): string {
  const trimmed = raw.trim();
  const match = trimmed.match(/^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/);
  return match ? match[1].trim() : trimmed;
}
