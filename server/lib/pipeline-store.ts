import type {
  Project,
  Channel,
  Video,
  TranscriptTopic,
  TopicCluster,
  TopicClusterAssignment,
  Script,
} from "../db/schema.js";

/** A topic together with the video it was discovered in. */
export interface ProjectTopic {
  topic: TranscriptTopic;
  video: Pick<Video, "id" | "ytId" | "title" | "publishedAt">;
}

export interface ClusterTopic extends ProjectTopic {
  assignmentReason: string;
}

export interface ClusterWithTopics {
  cluster: TopicCluster;
  topics: ClusterTopic[];
}

export type ChannelInput = Pick<
  Channel,
  | "ytId"
  | "title"
  | "description"
  | "thumbnailUrl"
  | "videoCount"
  | "subscriberCount"
  | "publishedAt"
>;

export type VideoInput = Pick<
  Video,
  | "ytId"
  | "title"
  | "description"
  | "thumbnailUrl"
  | "viewCount"
  | "likeCount"
  | "commentCount"
  | "durationSeconds"
  | "publishedAt"
  | "projectId"
  | "channelId"
>;

export type VideoPatch = Partial<
  Pick<Video, "rawTranscript" | "videoTopic" | "mainSummary" | "structuredContent" | "projectId">
>;

export type TopicInput = Pick<
  TranscriptTopic,
  "startTimeSeconds" | "title" | "topicSummary" | "content" | "blueprintElements"
>;

export type ClusterInput = Pick<TopicCluster, "clusterName" | "clusterDescription" | "displayOrder">;

export type AssignmentInput = Pick<TopicClusterAssignment, "transcriptTopicId" | "assignmentReason">;

export type ScriptInput = Pick<
  Script,
  "projectId" | "title" | "content" | "version" | "promptTokens" | "completionTokens" | "totalTokens"
>;

/**
 * Persistence boundary for the pipeline. Reads never return soft-deleted rows.
 *
 * Ordering guarantees callers rely on:
 * - `listProjectTopics`: video publish date (unknown dates last), then start time
 * - `listProjectClusters`: display order
 * - `listProjectScripts`: newest version first
 */
export interface PipelineStore {
  listProjects(): Promise<Project[]>;
  findProjectByName(name: string): Promise<Project | null>;
  createProject(name: string, topic: string): Promise<Project>;

  findChannelByYtId(ytId: string): Promise<Channel | null>;
  /** Insert or refresh a channel keyed by its external id. */
  saveChannel(input: ChannelInput): Promise<Channel>;

  findVideoByYtId(ytId: string): Promise<Video | null>;
  createVideo(input: VideoInput): Promise<Video>;
  updateVideo(id: string, patch: VideoPatch): Promise<void>;
  listProjectVideos(projectId: string): Promise<Video[]>;

  findTopicById(id: string): Promise<TranscriptTopic | null>;
  listVideoTopics(videoId: string): Promise<TranscriptTopic[]>;
  listProjectTopics(projectId: string): Promise<ProjectTopic[]>;
  createTopics(videoId: string, topics: TopicInput[]): Promise<TranscriptTopic[]>;
  setTopicSelected(id: string, isSelected: boolean): Promise<void>;

  /**
   * Hard-deletes every cluster of the project with its assignments, plus any
   * assignment of the project's topics left under another project's clusters.
   */
  deleteProjectClusters(projectId: string): Promise<number>;
  createCluster(projectId: string, input: ClusterInput): Promise<TopicCluster>;
  createAssignments(
    clusterId: string,
    assignments: AssignmentInput[]
  ): Promise<TopicClusterAssignment[]>;
  listProjectClusters(projectId: string): Promise<ClusterWithTopics[]>;

  listProjectScripts(projectId: string): Promise<Script[]>;
  /** Highest version ever written, soft-deleted rows included; 0 when none. */
  latestScriptVersion(projectId: string): Promise<number>;
  createScript(input: ScriptInput): Promise<Script>;
}
