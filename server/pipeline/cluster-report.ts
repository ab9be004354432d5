import type { PipelineStore } from "../lib/pipeline-store.js";
import { formatTimestamp } from "../utils/timestamps.js";

export type ProjectProcessingState = "Fully Processed" | "No Clusters" | "No Topics" | "No Videos";

export interface ProjectClusterSummary {
  projectName: string;
  videoCount: number;
  totalTopics: number;
  clusteredTopics: number;
  clusterCount: number;
  status: ProjectProcessingState;
}

export interface ClusterTopicDetails {
  id: string;
  title: string;
  startTime: string;
  videoTitle: string;
  assignmentReason: string;
  isSelected: boolean;
}

export interface ClusterDetails {
  id: string;
  name: string;
  description: string;
  displayOrder: number;
  topics: ClusterTopicDetails[];
}

export interface ProjectClusterDetails {
  projectName: string;
  projectExists: boolean;
  clusters: ClusterDetails[];
}

export function processingState(
  videoCount: number,
  totalTopics: number,
  clusterCount: number
): ProjectProcessingState {
  if (videoCount === 0) return "No Videos";
  if (totalTopics === 0) return "No Topics";
  if (clusterCount === 0) return "No Clusters";
  return "Fully Processed";
}

/** Read-only views over the clustering output. */
export class ClusterReport {
  constructor(private readonly store: PipelineStore) {}

  async summarizeProjects(): Promise<ProjectClusterSummary[]> {
    const summaries: ProjectClusterSummary[] = [];

    for (const project of await this.store.listProjects()) {
      const videos = await this.store.listProjectVideos(project.id);
      const topics = await this.store.listProjectTopics(project.id);
      const clusters = await this.store.listProjectClusters(project.id);
      const clusteredTopics = clusters.reduce((sum, c) => sum + c.topics.length, 0);

      summaries.push({
        projectName: project.name,
        videoCount: videos.length,
        totalTopics: topics.length,
        clusteredTopics,
        clusterCount: clusters.length,
        status: processingState(videos.length, topics.length, clusters.length),
      });
    }

    return summaries;
  }

  async getProjectClusters(projectName: string): Promise<ProjectClusterDetails> {
    const project = await this.store.findProjectByName(projectName);
    if (!project) {
      return { projectName, projectExists: false, clusters: [] };
    }

    const clusters = await this.store.listProjectClusters(project.id);
    return {
      projectName,
      projectExists: true,
      clusters: clusters.map(({ cluster, topics }) => ({
        id: cluster.id,
        name: cluster.clusterName,
        description: cluster.clusterDescription,
        displayOrder: cluster.displayOrder,
        topics: topics.map(({ topic, video, assignmentReason }) => ({
          id: topic.id,
          title: topic.title,
          startTime: formatTimestamp(topic.startTimeSeconds),
          videoTitle: video.title,
          assignmentReason,
          isSelected: topic.isSelected,
        })),
      })),
    };
  }
}
