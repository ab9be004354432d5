import type { PipelineStore, ProjectTopic, AssignmentInput } from "../lib/pipeline-store.js";
import type { LlmGateway } from "../lib/llm-gateway.js";
import {
  CLUSTERING_MODEL,
  CLUSTERING_SYSTEM_PROMPT,
  buildClusteringPrompt,
} from "../prompts/clustering.js";
import { parseModelJson, clusteringContract, type ClusteringResponse } from "./response-contracts.js";
import { truncateText } from "../utils/text.js";
import {
  type StageProcessor,
  type StageStatus,
  type StageResult,
  type ItemOutcome,
  missingProjectStatus,
  projectStatus,
  stageFailure,
  stageResult,
  itemFailure,
  errorMessage,
} from "./types.js";

export const MAX_CLUSTER_NAME_LENGTH = 200;

export interface PlannedCluster {
  name: string;
  description: string;
  displayOrder: number;
  assignments: AssignmentInput[];
}

/**
 * Map the model's index-based clusters onto real topics.
 * Out-of-range indexes are dropped, a topic claimed twice stays with its
 * first cluster, and clusters left without a name or members are discarded.
 */
export function planClusters(response: ClusteringResponse, topics: ProjectTopic[]): PlannedCluster[] {
  const claimed = new Set<number>();
  const planned: PlannedCluster[] = [];

  for (const cluster of response.clusters) {
    if (!cluster.cluster_name) continue;

    const assignments: AssignmentInput[] = [];
    for (const { topic_index, assignment_reason } of cluster.topics) {
      if (topic_index < 0 || topic_index >= topics.length || claimed.has(topic_index)) continue;
      claimed.add(topic_index);
      assignments.push({
        transcriptTopicId: topics[topic_index].topic.id,
        assignmentReason: assignment_reason,
      });
    }

    if (assignments.length === 0) continue;

    planned.push({
      name: truncateText(cluster.cluster_name, MAX_CLUSTER_NAME_LENGTH),
      description: cluster.cluster_description,
      displayOrder: cluster.display_order,
      assignments,
    });
  }

  return planned;
}

/**
 * Groups every topic of a project into clusters in one model call.
 *
 * Clustering is a full recompute, not an incremental update: existing
 * clusters are deleted before the model is asked, so a failed run leaves the
 * project with no clusters rather than the previous set.
 */
export class ClusteringStage implements StageProcessor {
  readonly stage = "clustering" as const;

  constructor(
    private readonly store: PipelineStore,
    private readonly llm: LlmGateway
  ) {}

  async getStatus(projectName: string): Promise<StageStatus> {
    try {
      const project = await this.store.findProjectByName(projectName);
      if (!project) return missingProjectStatus(this.stage, projectName);

      const topics = await this.store.listProjectTopics(project.id);
      const clusters = await this.store.listProjectClusters(project.id);
      const clusteredIds = new Set(clusters.flatMap((c) => c.topics.map((t) => t.topic.id)));
      const clustered = topics.filter(({ topic }) => clusteredIds.has(topic.id)).length;

      const status = projectStatus(this.stage, projectName, topics.length, clustered, {
        totalTopics: topics.length,
        clustered,
        unclustered: topics.length - clustered,
        totalClusters: clusters.length,
      });
      // Nothing to cluster is not the same as done
      return { ...status, isComplete: status.isComplete && topics.length > 0 };
    } catch (err) {
      console.error(`[Clustering] Status check failed for ${projectName}:`, errorMessage(err));
      return missingProjectStatus(this.stage, projectName, errorMessage(err));
    }
  }

  async processProject(projectName: string): Promise<StageResult> {
    try {
      const project = await this.store.findProjectByName(projectName);
      if (!project) {
        return stageFailure(this.stage, projectName, `Project '${projectName}' not found`);
      }

      const removed = await this.store.deleteProjectClusters(project.id);
      if (removed > 0) {
        console.log(`[Clustering] Cleared ${removed} existing cluster(s) for ${projectName}`);
      }

      const topics = await this.store.listProjectTopics(project.id);
      if (topics.length === 0) {
        return stageFailure(this.stage, projectName, "No topics found for this project");
      }

      console.log(`[Clustering] Clustering ${topics.length} topic(s) for ${projectName}`);

      const completion = await this.llm.complete({
        ...CLUSTERING_MODEL,
        systemPrompt: CLUSTERING_SYSTEM_PROMPT,
        userPrompt: buildClusteringPrompt(
          project.name,
          topics.map(({ topic }) => ({
            title: topic.title,
            summary: topic.topicSummary,
            blueprintElements: topic.blueprintElements,
          }))
        ),
      });
      if (!completion.ok) {
        return stageFailure(this.stage, projectName, completion.error);
      }

      const parsed = parseModelJson(completion.text, clusteringContract);
      if (!parsed.ok) {
        console.warn(`[Clustering] ${projectName}: ${parsed.error}`);
        return stageFailure(this.stage, projectName, parsed.error);
      }

      const planned = planClusters(parsed.value, topics);
      if (planned.length === 0) {
        return stageFailure(this.stage, projectName, "No valid clusters found in AI response");
      }

      const items: ItemOutcome[] = [];
      for (const cluster of planned) {
        items.push(await this.saveCluster(project.id, cluster));
      }

      const assigned = items.reduce((sum, item) => sum + (item.metrics.topicCount ?? 0), 0);
      if (assigned < topics.length) {
        console.warn(`[Clustering] ${topics.length - assigned} topic(s) left unclustered for ${projectName}`);
      }

      return stageResult(this.stage, projectName, items);
    } catch (err) {
      console.error(`[Clustering] Processing failed for ${projectName}:`, errorMessage(err));
      return stageFailure(this.stage, projectName, `Processing failed: ${errorMessage(err)}`);
    }
  }

  // Cluster row first (for its id), then its assignments
  private async saveCluster(projectId: string, planned: PlannedCluster): Promise<ItemOutcome> {
    try {
      const cluster = await this.store.createCluster(projectId, {
        clusterName: planned.name,
        clusterDescription: planned.description,
        displayOrder: planned.displayOrder,
      });
      await this.store.createAssignments(cluster.id, planned.assignments);

      return {
        id: cluster.id,
        title: cluster.clusterName,
        success: true,
        message: `Assigned ${planned.assignments.length} topic(s)`,
        metrics: { topicCount: planned.assignments.length, displayOrder: planned.displayOrder },
      };
    } catch (err) {
      console.error(`[Clustering] Saving cluster '${planned.name}' failed:`, errorMessage(err));
      return itemFailure("", planned.name, `Failed to save cluster: ${errorMessage(err)}`);
    }
  }
}
