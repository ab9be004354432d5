import type { ModelSettings } from "../lib/llm-gateway.js";

export const CLUSTERING_MODEL: ModelSettings = {
  model: "gpt-4o-mini",
  maxTokens: 3000,
  temperature: 0.2,
  json: true,
};

export const CLUSTERING_SYSTEM_PROMPT =
  "You are a content strategist who organizes educational material into coherent learning modules.";

export interface ClusterPromptTopic {
  title: string;
  summary: string;
  blueprintElements: string;
}

const INSTRUCTIONS = `Below is a numbered list of topics taken from several video transcripts. Group them into clusters that would each make sense as one part of a new script.

How to group:
- Put topics together by theme, difficulty or where they sit in a learning path
- Aim for clusters that read as a coherent story; balance between clusters matters less than coherence
- Notice which topics build on others and which stand alone
- Typical groupings include basics, core ideas, advanced techniques and implementation

For every cluster give:
- A clear name of two to eight words
- A one-line description of what it covers
- A display_order (1, 2, 3, ...) for the order a viewer should meet it
- For each topic, a short reason it belongs there

Respond with a single JSON object:

{
  "clusters": [
    {
      "cluster_name": "Getting Started",
      "cluster_description": "Core ideas everything else depends on",
      "display_order": 1,
      "topics": [
        { "topic_index": 0, "assignment_reason": "Introduces the vocabulary later topics use" },
        { "topic_index": 3, "assignment_reason": "Covers the initial setup" }
      ]
    }
  ]
}

Rules:
- topic_index is the zero-based number shown in the list
- Place each topic in exactly one cluster
- Order the clusters as a sensible learning progression`;

export function buildClusteringPrompt(projectName: string, topics: ClusterPromptTopic[]): string {
  const lines = [INSTRUCTIONS, "", `Project: ${projectName}`, "", `Total Topics to Cluster: ${topics.length}`, "", "Topics:"];

  topics.forEach((topic, i) => {
    lines.push(`${i}: ${topic.title}`);
    lines.push(`   Summary: ${topic.summary}`);
    if (topic.blueprintElements.trim()) {
      lines.push(`   Blueprint: ${topic.blueprintElements}`);
    }
    lines.push("");
  });

  return lines.join("\n");
}
