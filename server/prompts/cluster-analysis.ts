import type { ModelSettings } from "../lib/llm-gateway.js";

// The three analyses send a single user message; the role lives in the prompt.
export const CLUSTER_ANALYSIS_MODEL: ModelSettings = {
  model: "gpt-4o-mini",
  maxTokens: 4000,
  temperature: 0.1,
  json: true,
};

const JSON_ONLY =
  "Reply with ONLY a JSON object in exactly the shape below. No commentary, no markdown.";

const READINESS = `You are a content strategist judging whether a group of transcript topics is ready to become part of a video script.

The cluster below lists related topics from YouTube transcripts, each with a title, summary, content, any blueprint elements and its start time in the source video.

Rate how complete the narrative is, how well the topics hang together, and what is missing before this could be scripted.

${JSON_ONLY}

{
  "overall_readiness_score": 7,
  "narrative_completeness_score": 6,
  "structural_coherence_score": 8,
  "cluster_type": "Introductory | Implementation | Deep Dive | Case Study | Mixed",
  "key_strengths": ["..."],
  "critical_gaps": ["..."],
  "missing_elements": ["..."],
  "script_usage_recommendation": "How this cluster is best used in a script"
}

Scores are integers from 1 to 10:
- narrative_completeness_score: is there a beginning, middle and end?
- structural_coherence_score: do the topics follow each other logically?
- overall_readiness_score: could this stand alone as a script section?

Cluster types:
- Introductory: concepts, theory, foundations
- Implementation: how-to steps and practical application
- Deep Dive: advanced, detailed exploration
- Case Study: stories, examples, real-world use
- Mixed: more than one of the above`;

const DENSITY = `You are an analyst of educational video scripts.

Assess the cluster below for how much information it packs in, how deep versus broad it goes, and how hard it is for a viewer to take in.

${JSON_ONLY}

{
  "overall_density": "Light | Medium | Heavy",
  "depth_breadth_ratio": "e.g. 70% depth, 30% breadth",
  "recommended_script_pacing": "Concrete pacing advice with timings",
  "cognitive_load": "Low | Medium | High",
  "topic_density_ratings": [
    { "topic_title": "Title from the cluster", "density_level": "Light | Medium | Heavy", "information_type": "Conceptual | Actionable | Mixed" }
  ],
  "simplification_opportunities": ["..."],
  "pacing_implications": ["..."]
}

Guidance:
- Light: overview or introductory material
- Medium: detailed explanation with some action items
- Heavy: dense, complex material with many steps
- Conceptual information explains; actionable information instructs
- Cognitive load is how much new material a viewer must hold at once
- Pacing should allow for examples, pauses and repetition where needed`;

const STRUCTURAL = `You are a script developer with an instructional-design background.

Find the structural elements in the cluster below that could anchor a video script: frameworks, processes, lists and blueprints.

${JSON_ONLY}

{
  "total_structural_elements": 4,
  "primary_anchor_element": "Name of the strongest framework or blueprint to build around",
  "frameworks_and_models": [
    { "name": "...", "completeness_score": 8, "instructional_value": "...", "description": "..." }
  ],
  "step_by_step_processes": [
    { "name": "...", "step_count": 5, "clarity_score": 7, "actionability_score": 8, "missing_steps": ["..."] }
  ],
  "lists_and_enumerations": [
    { "name": "...", "item_count": 5, "organization_quality": "Excellent | Good | Fair | Poor", "memorability_score": 6 }
  ],
  "blueprint_elements": [
    { "name": "...", "practical_application": "...", "uniqueness_score": 5, "value_score": 8 }
  ],
  "hook_potential_elements": ["Element that could open the video"],
  "script_structure_suggestion": "How to arrange these elements in a script",
  "missing_structural_pieces": ["..."]
}

All scores are integers from 1 to 10. Favor elements that could serve as the backbone of the video, an opening hook, a practical takeaway or a teaching framework.`;

export type ClusterAnalysisKind = "readiness" | "density" | "structural";

const TEMPLATES: Record<ClusterAnalysisKind, string> = {
  readiness: READINESS,
  density: DENSITY,
  structural: STRUCTURAL,
};

export function buildClusterAnalysisPrompt(kind: ClusterAnalysisKind, clusterData: string): string {
  return `${TEMPLATES[kind]}\n\nCluster data:\n${clusterData}`;
}
