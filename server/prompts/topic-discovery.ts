import type { ModelSettings } from "../lib/llm-gateway.js";

export const TOPIC_DISCOVERY_MODEL: ModelSettings = {
  model: "gpt-4o-mini",
  maxTokens: 3000,
  temperature: 0.2,
  json: true,
};

export const TOPIC_DISCOVERY_SYSTEM_PROMPT =
  "You are a curriculum designer who turns long-form educational videos into well-defined learning segments. " +
  "Follow the requested output format exactly and give every segment an accurate start time.";

const INSTRUCTIONS = `Read the YouTube transcript below and split it into its distinct teaching segments. Ignore intros, sponsor reads, channel promotion and sign-offs; keep the substantive material.

What to capture:
- Points where the subject or theme clearly shifts
- Any framework, blueprint, checklist or step-by-step method the speaker lays out
- Practical takeaways a viewer could act on
- A start time for every segment

Respond with a single JSON object shaped like this:

{
  "topics": [
    {
      "starttime": "HH:MM:SS",
      "title": "Short, specific segment title",
      "summary": "One or two sentences on what the segment covers",
      "content": "Fuller breakdown of the points, steps or ideas in the segment",
      "blueprint_elements": ["first step", "second step"]
    }
  ]
}

Rules:
- Timestamps use HH:MM:SS; use 00:00:00 when the transcript gives no timing cue
- List steps or framework parts in blueprint_elements, or leave it as an empty array
- Keep the speaker's own names for technical ideas
- Every segment must teach something on its own`;

export function buildTopicDiscoveryPrompt(transcript: string): string {
  return `${INSTRUCTIONS}\n\nTranscript:\n\n${transcript}\n`;
}
