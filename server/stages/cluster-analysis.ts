import type { PipelineStore, ClusterWithTopics } from "../lib/pipeline-store.js";
import type { LlmGateway } from "../lib/llm-gateway.js";
import {
  CLUSTER_ANALYSIS_MODEL,
  buildClusterAnalysisPrompt,
  type ClusterAnalysisKind,
} from "../prompts/cluster-analysis.js";
import {
  parseModelJson,
  clusterReadinessContract,
  contentDensityContract,
  structuralElementsContract,
  type ResponseContract,
  type ParseOutcome,
  type ClusterReadiness,
  type ContentDensity,
  type StructuralElements,
} from "./response-contracts.js";
import { formatTimestamp } from "../utils/timestamps.js";
import type { z } from "zod";
import {
  type StageProcessor,
  type StageStatus,
  type StageResult,
  type ItemOutcome,
  missingProjectStatus,
  projectStatus,
  stageFailure,
  stageResult,
  errorMessage,
} from "./types.js";

export interface ClusterAnalysis {
  clusterId: string;
  clusterName: string;
  displayOrder: number;
  topicCount: number;
  /** True iff at least one of the three analyses came back valid */
  success: boolean;
  readiness: ClusterReadiness | null;
  density: ContentDensity | null;
  structural: StructuralElements | null;
  failures: Partial<Record<ClusterAnalysisKind, string>>;
}

export interface ProjectClusterAnalysis {
  projectName: string;
  projectExists: boolean;
  success: boolean;
  errorMessage?: string;
  clusters: ClusterAnalysis[];
}

function blueprintLine(raw: string): string {
  if (!raw.trim()) return "";
  try {
    const parsed: unknown = JSON.parse(raw);
    if (Array.isArray(parsed)) return parsed.map(String).join("; ");
  } catch {
    // stored before blueprints were JSON-encoded; use as-is
  }
  return raw;
}

/** Plain-text block describing a cluster and its topics for the analysis prompts. */
export function formatClusterData({ cluster, topics }: ClusterWithTopics): string {
  const lines = [
    `CLUSTER: ${cluster.clusterName}`,
    `DESCRIPTION: ${cluster.clusterDescription}`,
    `DISPLAY ORDER: ${cluster.displayOrder}`,
    `TOTAL TOPICS: ${topics.length}`,
    "",
  ];

  topics.forEach(({ topic, video }, i) => {
    lines.push(`TOPIC ${i + 1}: ${topic.title}`);
    lines.push(`START TIME: ${formatTimestamp(topic.startTimeSeconds)}`);
    lines.push(`VIDEO: ${video.title}`);
    lines.push(`SUMMARY: ${topic.topicSummary}`);
    lines.push(`CONTENT: ${topic.content}`);
    const blueprint = blueprintLine(topic.blueprintElements);
    if (blueprint) {
      lines.push(`BLUEPRINT ELEMENTS: ${blueprint}`);
    }
    lines.push("---");
  });

  return lines.join("\n");
}

/**
 * Runs three independent analyses per cluster. Results are returned for
 * display and never persisted.
 */
export class ClusterAnalysisStage implements StageProcessor {
  readonly stage = "clusterAnalysis" as const;

  constructor(
    private readonly store: PipelineStore,
    private readonly llm: LlmGateway
  ) {}

  async getStatus(projectName: string): Promise<StageStatus> {
    try {
      const project = await this.store.findProjectByName(projectName);
      if (!project) return missingProjectStatus(this.stage, projectName);

      const clusters = await this.store.listProjectClusters(project.id);
      const analyzable = clusters.filter((c) => c.topics.length > 0).length;
      const totalTopics = clusters.reduce((sum, c) => sum + c.topics.length, 0);

      // Analyses are transient, so "needing" is every cluster a run would cover
      return projectStatus(this.stage, projectName, clusters.length, clusters.length - analyzable, {
        totalClusters: clusters.length,
        analyzableClusters: analyzable,
        totalTopics,
      });
    } catch (err) {
      console.error(`[ClusterAnalysis] Status check failed for ${projectName}:`, errorMessage(err));
      return missingProjectStatus(this.stage, projectName, errorMessage(err));
    }
  }

  async processProject(projectName: string): Promise<StageResult> {
    const analysis = await this.analyzeProject(projectName);
    if (analysis.errorMessage) {
      return stageFailure(this.stage, projectName, analysis.errorMessage);
    }
    return stageResult(this.stage, projectName, analysis.clusters.map(toItemOutcome));
  }

  async analyzeProject(projectName: string): Promise<ProjectClusterAnalysis> {
    try {
      const project = await this.store.findProjectByName(projectName);
      if (!project) {
        return {
          projectName,
          projectExists: false,
          success: false,
          errorMessage: `Project '${projectName}' not found`,
          clusters: [],
        };
      }

      const clusters = (await this.store.listProjectClusters(project.id)).filter(
        (c) => c.topics.length > 0
      );
      if (clusters.length === 0) {
        return {
          projectName,
          projectExists: true,
          success: false,
          errorMessage: "No clusters with topics found for this project",
          clusters: [],
        };
      }

      console.log(`[ClusterAnalysis] Analyzing ${clusters.length} cluster(s) for ${projectName}`);

      const results: ClusterAnalysis[] = [];
      for (const cluster of clusters) {
        results.push(await this.analyzeCluster(cluster));
      }

      return {
        projectName,
        projectExists: true,
        success: results.some((r) => r.success),
        clusters: results,
      };
    } catch (err) {
      console.error(`[ClusterAnalysis] Analysis failed for ${projectName}:`, errorMessage(err));
      return {
        projectName,
        projectExists: true,
        success: false,
        errorMessage: `Analysis failed: ${errorMessage(err)}`,
        clusters: [],
      };
    }
  }

  async analyzeCluster(cluster: ClusterWithTopics): Promise<ClusterAnalysis> {
    const data = formatClusterData(cluster);

    // Independent calls: one failing leaves the other two intact
    const [readiness, density, structural] = await Promise.all([
      this.runAnalysis("readiness", data, clusterReadinessContract),
      this.runAnalysis("density", data, contentDensityContract),
      this.runAnalysis("structural", data, structuralElementsContract),
    ]);

    const failures: Partial<Record<ClusterAnalysisKind, string>> = {};
    if (!readiness.ok) failures.readiness = readiness.error;
    if (!density.ok) failures.density = density.error;
    if (!structural.ok) failures.structural = structural.error;

    const analysis: ClusterAnalysis = {
      clusterId: cluster.cluster.id,
      clusterName: cluster.cluster.clusterName,
      displayOrder: cluster.cluster.displayOrder,
      topicCount: cluster.topics.length,
      success: readiness.ok || density.ok || structural.ok,
      readiness: readiness.ok ? readiness.value : null,
      density: density.ok ? density.value : null,
      structural: structural.ok ? structural.value : null,
      failures,
    };

    for (const [kind, error] of Object.entries(failures)) {
      console.warn(`[ClusterAnalysis] ${analysis.clusterName} ${kind}: ${error}`);
    }

    return analysis;
  }

  private async runAnalysis<S extends z.ZodTypeAny>(
    kind: ClusterAnalysisKind,
    clusterData: string,
    contract: ResponseContract<S>
  ): Promise<ParseOutcome<z.infer<S>>> {
    try {
      const completion = await this.llm.complete({
        ...CLUSTER_ANALYSIS_MODEL,
        userPrompt: buildClusterAnalysisPrompt(kind, clusterData),
      });
      if (!completion.ok) {
        return { ok: false, error: completion.error };
      }
      return parseModelJson(completion.text, contract);
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }
}

function toItemOutcome(analysis: ClusterAnalysis): ItemOutcome {
  const completed: ClusterAnalysisKind[] = [];
  if (analysis.readiness) completed.push("readiness");
  if (analysis.density) completed.push("density");
  if (analysis.structural) completed.push("structural");

  const failed = Object.keys(analysis.failures);
  const message = analysis.success
    ? `Completed: ${completed.join(", ")}${failed.length > 0 ? `; failed: ${failed.join(", ")}` : ""}`
    : `All analyses failed: ${Object.values(analysis.failures).join("; ")}`;

  const metrics: Record<string, number> = { topicCount: analysis.topicCount };
  if (analysis.readiness) {
    metrics.overallReadinessScore = analysis.readiness.overall_readiness_score;
  }
  if (analysis.structural) {
    metrics.totalStructuralElements = analysis.structural.total_structural_elements;
  }

  return {
    id: analysis.clusterId,
    title: analysis.clusterName,
    success: analysis.success,
    message,
    metrics,
  };
}
