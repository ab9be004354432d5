import type { ModelSettings } from "../lib/llm-gateway.js";

export const SUMMARY_MODEL: ModelSettings = {
  model: "gpt-4o-mini",
  maxTokens: 1500,
  temperature: 0.3,
  json: true,
};

export const SUMMARY_SYSTEM_PROMPT =
  "You are a content analyst who condenses video material into clear, practical summaries.";

const INSTRUCTIONS = `Summarize the YouTube transcript below so a reader understands what the video is about and what it offers.

Length: two or three paragraphs. Go longer only when the material is unusually dense or important.

Cover:
- The subject, the main arguments and the key takeaways
- Why the video is worth watching and who it is for

Call out structured material when the video contains it, for example:
- Blueprints, step-by-step plans or methodologies
- Frameworks, templates or models
- Numbered lists ("7 ways to...") or checklists
- Case studies, worked examples or before/after comparisons

Keep to concepts and insights. Mention that structured material exists without reproducing every step. Use a professional, approachable tone, and say so plainly if the video has little substance.

Respond with a single JSON object:

{
  "video_topic": "One or two sentences naming the subject of the video",
  "main_summary": "The two or three paragraph summary",
  "structured_content": "Short note on any frameworks, lists or plans the video includes"
}`;

export function buildSummaryPrompt(transcript: string): string {
  return `${INSTRUCTIONS}\n\nTranscript:\n\n${transcript}\n`;
}
