import { z } from "zod";
import { stripCodeFences } from "../utils/text.js";

/**
 * Versioned response shapes expected from the model, one per stage call.
 * Bump the id when a prompt's documented JSON changes so stored failures
 * and logs say which contract a response was checked against.
 */
export interface ResponseContract<S extends z.ZodTypeAny> {
  id: string;
  schema: S;
}

export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

// Models drift between strings and numbers for scalar fields
const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v == null ? "" : String(v).trim()));

const requiredText = z.string().trim().min(1);

const textList = z
  .array(z.union([z.string(), z.number()]).transform((v) => String(v).trim()))
  .nullish()
  .transform((v) => (v ?? []).filter((s) => s.length > 0));

const score = z.coerce.number().catch(0);

// ============ Topic Discovery ============

export const topicDiscoveryContract = {
  id: "topic-discovery/v1",
  schema: z.object({
    topics: z.array(
      z.object({
        starttime: text,
        title: text,
        summary: text,
        content: text,
        blueprint_elements: textList,
      })
    ),
  }),
} satisfies ResponseContract<z.ZodTypeAny>;

export type TopicDiscoveryResponse = z.infer<typeof topicDiscoveryContract.schema>;

// ============ Summary ============

export const summaryContract = {
  id: "summary/v1",
  schema: z.object({
    video_topic: requiredText,
    main_summary: requiredText,
    structured_content: text,
  }),
} satisfies ResponseContract<z.ZodTypeAny>;

export type SummaryResponse = z.infer<typeof summaryContract.schema>;

// ============ Clustering ============

export const clusteringContract = {
  id: "clustering/v1",
  schema: z.object({
    clusters: z.array(
      z.object({
        cluster_name: text,
        cluster_description: text,
        display_order: z.coerce.number().int().catch(0),
        topics: z
          .array(
            z.object({
              topic_index: z.coerce.number().int().catch(-1),
              assignment_reason: text,
            })
          )
          .nullish()
          .transform((v) => v ?? []),
      })
    ),
  }),
} satisfies ResponseContract<z.ZodTypeAny>;

export type ClusteringResponse = z.infer<typeof clusteringContract.schema>;

// ============ Cluster Analysis ============

export const clusterReadinessContract = {
  id: "cluster-readiness/v1",
  schema: z.object({
    overall_readiness_score: z.coerce.number().positive(),
    narrative_completeness_score: z.coerce.number().positive(),
    structural_coherence_score: z.coerce.number().positive(),
    cluster_type: requiredText,
    key_strengths: textList,
    critical_gaps: textList,
    missing_elements: textList,
    script_usage_recommendation: text,
  }),
} satisfies ResponseContract<z.ZodTypeAny>;

export type ClusterReadiness = z.infer<typeof clusterReadinessContract.schema>;

export const contentDensityContract = {
  id: "content-density/v1",
  schema: z.object({
    overall_density: requiredText,
    depth_breadth_ratio: requiredText,
    recommended_script_pacing: text,
    cognitive_load: requiredText,
    topic_density_ratings: z
      .array(
        z.object({
          topic_title: text,
          density_level: text,
          information_type: text,
        })
      )
      .nullish()
      .transform((v) => v ?? []),
    simplification_opportunities: textList,
    pacing_implications: textList,
  }),
} satisfies ResponseContract<z.ZodTypeAny>;

export type ContentDensity = z.infer<typeof contentDensityContract.schema>;

export const structuralElementsContract = {
  id: "structural-elements/v1",
  schema: z.object({
    total_structural_elements: z.coerce.number().int().min(0),
    primary_anchor_element: requiredText,
    frameworks_and_models: z
      .array(
        z.object({
          name: text,
          completeness_score: score,
          instructional_value: text,
          description: text,
        })
      )
      .nullish()
      .transform((v) => v ?? []),
    step_by_step_processes: z
      .array(
        z.object({
          name: text,
          step_count: score,
          clarity_score: score,
          actionability_score: score,
          missing_steps: textList,
        })
      )
      .nullish()
      .transform((v) => v ?? []),
    lists_and_enumerations: z
      .array(
        z.object({
          name: text,
          item_count: score,
          organization_quality: text,
          memorability_score: score,
        })
      )
      .nullish()
      .transform((v) => v ?? []),
    blueprint_elements: z
      .array(
        z.object({
          name: text,
          practical_application: text,
          uniqueness_score: score,
          value_score: score,
        })
      )
      .nullish()
      .transform((v) => v ?? []),
    hook_potential_elements: textList,
    script_structure_suggestion: text,
    missing_structural_pieces: textList,
  }),
} satisfies ResponseContract<z.ZodTypeAny>;

export type StructuralElements = z.infer<typeof structuralElementsContract.schema>;

/**
 * Strip code fences, parse JSON and check it against a contract.
 * Never throws; the error string names the contract that rejected the response.
 */
export function parseModelJson<S extends z.ZodTypeAny>(
  raw: string,
  contract: ResponseContract<S>
): ParseOutcome<z.infer<S>> {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(raw));
  } catch (err) {
    const detail = err instanceof Error ? err.message : "invalid JSON";
    return { ok: false, error: `Failed to parse AI response as JSON (${contract.id}): ${detail}` };
  }

  const parsed = contract.schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return {
      ok: false,
      error: `AI response did not match ${contract.id}: ${where}${issue?.message ?? "invalid shape"}`,
    };
  }

  return { ok: true, value: parsed.data };
}
