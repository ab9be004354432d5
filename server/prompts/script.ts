import type { ModelSettings } from "../lib/llm-gateway.js";

// Long-form prose, so no JSON mode
export const SCRIPT_MODEL: ModelSettings = {
  model: "gpt-4o",
  maxTokens: 4000,
  temperature: 0.7,
  json: false,
};

export const SCRIPT_SYSTEM_PROMPT =
  "You are an experienced YouTube scriptwriter who writes scripts that hold attention from the first second to the last.";

export interface ScriptSource {
  title: string;
  transcript: string;
}

function briefFor(topic: string): string {
  return `Write a YouTube video script about ${topic} that keeps viewers watching to the end.

Before the script, set out the packaging:
- Working title: brainstorm several options and choose the strongest
- Thumbnail idea: what the viewer sees
- Three questions: what someone clicking this title and thumbnail wants answered

Structure the script in four parts.

1. HOOK (first 15-30 seconds)
Open with one of: a pointed "why" question, a drop into the highest-stakes moment of the story, or a bold claim you can back up. It has to match the title and thumbnail, promise clear value and create tension straight away. No "welcome back to the channel" openings.

2. INTRO (15-45 seconds)
Preview the answers to the three questions, add something the viewer did not expect, say briefly why the presenter is credible, and include a light call to engage.

3. BODY (building to a climax)
For each main point: open with a mini-hook, tell the story that leads to the answer, and put the payoff at the end of the point rather than the start. Leave loops open and close them later. Vary the emotional register. Mix clear facts, personal feeling and some fun. Cut anything that does not build toward the climax.

4. OUTRO (30 seconds at most)
Keep the energy up and point viewers to a related video that feels like the natural next step.

Style:
- Conversational prose rather than bullet lists
- A guide sharing experience, not a lecturer
- Every line either builds toward the main payoff or adds tension; cut the rest

Close with a SCRIPT STATS block: word count, estimated speaking time at 150 words per minute, hook type, number of open loops, and the split between setup, body and climax.`;
}

export function buildScriptPrompt(topic: string, sources: ScriptSource[]): string {
  const lines = [
    briefFor(topic),
    "",
    "SOURCE MATERIAL:",
    "Draw stories, insights and examples from these video transcripts:",
    "",
  ];

  sources.forEach((source, i) => {
    lines.push(`=== VIDEO ${i + 1}: ${source.title} ===`);
    lines.push(source.transcript);
    lines.push("");
  });

  lines.push("INSTRUCTIONS:");
  lines.push("1. Pull the strongest stories, insights and examples from the transcripts above");
  lines.push(`2. Weave them into one narrative about: ${topic}`);
  lines.push("3. Follow the four-part structure above");
  lines.push("4. Reference specific examples from the source videos where they help");
  lines.push("5. Make it feel new, not a recap of the sources");
  lines.push("6. End with the SCRIPT STATS block");
  lines.push("");
  lines.push("Write the script now:");

  return lines.join("\n");
}
