import { randomUUID } from "crypto";
import type {
  Project,
  Channel,
  Video,
  TranscriptTopic,
  TopicCluster,
  TopicClusterAssignment,
  Script,
} from "../../db/schema.js";
import { stampCreate, stampUpdate } from "../../db/audit.js";
import type {
  PipelineStore,
  ProjectTopic,
  ClusterTopic,
  ClusterWithTopics,
  ChannelInput,
  VideoInput,
  VideoPatch,
  TopicInput,
  ClusterInput,
  AssignmentInput,
  ScriptInput,
} from "../../lib/pipeline-store.js";

const ACTOR = "test";

// Postgres ascending order: unknown dates sort last
function byPublishedAt(a: Pick<Video, "publishedAt">, b: Pick<Video, "publishedAt">): number {
  if (a.publishedAt && b.publishedAt) return a.publishedAt.getTime() - b.publishedAt.getTime();
  if (a.publishedAt) return -1;
  if (b.publishedAt) return 1;
  return 0;
}

/**
 * In-process stand-in for DrizzleStore with the same ordering, cascade and
 * uniqueness rules.
 */
export class MemoryStore implements PipelineStore {
  projects: Project[] = [];
  channels: Channel[] = [];
  videos: Video[] = [];
  topics: TranscriptTopic[] = [];
  clusters: TopicCluster[] = [];
  assignments: TopicClusterAssignment[] = [];
  scripts: Script[] = [];

  async listProjects() {
    return [...this.projects].sort((a, b) => a.name.localeCompare(b.name));
  }

  async findProjectByName(name: string) {
    return this.projects.find((p) => p.name === name) ?? null;
  }

  async createProject(name: string, topic: string) {
    if (this.projects.some((p) => p.name === name)) {
      throw new Error(`duplicate key value violates unique constraint "projects_name_unique"`);
    }
    const project: Project = { id: randomUUID(), name, topic, createdAt: new Date() };
    this.projects.push(project);
    return project;
  }

  async findChannelByYtId(ytId: string) {
    return this.channels.find((c) => c.ytId === ytId && !c.isDeleted) ?? null;
  }

  async saveChannel(input: ChannelInput) {
    const now = new Date();
    const existing = this.channels.find((c) => c.ytId === input.ytId);
    if (existing) {
      Object.assign(existing, input, { lastCheckDate: now, isDeleted: false }, stampUpdate(ACTOR, now));
      return existing;
    }
    const channel: Channel = { id: randomUUID(), ...input, lastCheckDate: now, ...stampCreate(ACTOR, now) };
    this.channels.push(channel);
    return channel;
  }

  async findVideoByYtId(ytId: string) {
    return this.videos.find((v) => v.ytId === ytId && !v.isDeleted) ?? null;
  }

  async createVideo(input: VideoInput) {
    if (this.videos.some((v) => v.ytId === input.ytId)) {
      throw new Error(`duplicate key value violates unique constraint "videos_yt_id_idx"`);
    }
    const video: Video = {
      id: randomUUID(),
      ...input,
      rawTranscript: "",
      videoTopic: "",
      mainSummary: "",
      structuredContent: "",
      ...stampCreate(ACTOR),
    };
    this.videos.push(video);
    return video;
  }

  async updateVideo(id: string, patch: VideoPatch) {
    const video = this.videos.find((v) => v.id === id);
    if (video) Object.assign(video, patch, stampUpdate(ACTOR));
  }

  async listProjectVideos(projectId: string) {
    return this.videos
      .filter((v) => v.projectId === projectId && !v.isDeleted)
      .sort((a, b) => byPublishedAt(a, b) || a.createdAt.getTime() - b.createdAt.getTime());
  }

  async findTopicById(id: string) {
    return this.topics.find((t) => t.id === id && !t.isDeleted) ?? null;
  }

  async listVideoTopics(videoId: string) {
    return this.topics
      .filter((t) => t.videoId === videoId && !t.isDeleted)
      .sort((a, b) => a.startTimeSeconds - b.startTimeSeconds);
  }

  private toProjectTopic(topic: TranscriptTopic): ProjectTopic | null {
    const video = this.videos.find((v) => v.id === topic.videoId && !v.isDeleted);
    if (!video) return null;
    return {
      topic,
      video: { id: video.id, ytId: video.ytId, title: video.title, publishedAt: video.publishedAt },
    };
  }

  private sortTopics<T extends ProjectTopic>(rows: T[]): T[] {
    return rows.sort(
      (a, b) => byPublishedAt(a.video, b.video) || a.topic.startTimeSeconds - b.topic.startTimeSeconds
    );
  }

  async listProjectTopics(projectId: string) {
    const rows: ProjectTopic[] = [];
    for (const topic of this.topics) {
      if (topic.isDeleted) continue;
      const row = this.toProjectTopic(topic);
      if (row && this.videos.some((v) => v.id === row.video.id && v.projectId === projectId)) {
        rows.push(row);
      }
    }
    return this.sortTopics(rows);
  }

  async createTopics(videoId: string, topics: TopicInput[]) {
    const now = new Date();
    const created = topics.map(
      (topic): TranscriptTopic => ({
        id: randomUUID(),
        videoId,
        ...topic,
        isSelected: false,
        ...stampCreate(ACTOR, now),
      })
    );
    this.topics.push(...created);
    return created;
  }

  async setTopicSelected(id: string, isSelected: boolean) {
    const topic = this.topics.find((t) => t.id === id);
    if (topic) Object.assign(topic, { isSelected }, stampUpdate(ACTOR));
  }

  async deleteProjectClusters(projectId: string) {
    const removed = new Set(this.clusters.filter((c) => c.projectId === projectId).map((c) => c.id));
    const projectVideoIds = new Set(
      this.videos.filter((v) => v.projectId === projectId).map((v) => v.id)
    );
    const projectTopicIds = new Set(
      this.topics.filter((t) => projectVideoIds.has(t.videoId)).map((t) => t.id)
    );
    this.clusters = this.clusters.filter((c) => !removed.has(c.id));
    this.assignments = this.assignments.filter(
      (a) => !removed.has(a.topicClusterId) && !projectTopicIds.has(a.transcriptTopicId)
    );
    return removed.size;
  }

  async createCluster(projectId: string, input: ClusterInput) {
    const cluster: TopicCluster = { id: randomUUID(), projectId, ...input, ...stampCreate(ACTOR) };
    this.clusters.push(cluster);
    return cluster;
  }

  async createAssignments(clusterId: string, assignments: AssignmentInput[]) {
    for (const { transcriptTopicId } of assignments) {
      if (this.assignments.some((a) => a.transcriptTopicId === transcriptTopicId)) {
        throw new Error(
          `duplicate key value violates unique constraint "topic_cluster_assignments_topic_idx"`
        );
      }
    }
    const now = new Date();
    const created = assignments.map(
      (assignment): TopicClusterAssignment => ({
        id: randomUUID(),
        ...assignment,
        topicClusterId: clusterId,
        ...stampCreate(ACTOR, now),
      })
    );
    this.assignments.push(...created);
    return created;
  }

  async listProjectClusters(projectId: string): Promise<ClusterWithTopics[]> {
    return this.clusters
      .filter((c) => c.projectId === projectId && !c.isDeleted)
      .sort((a, b) => a.displayOrder - b.displayOrder)
      .map((cluster) => {
        const topics: ClusterTopic[] = [];
        for (const assignment of this.assignments) {
          if (assignment.topicClusterId !== cluster.id || assignment.isDeleted) continue;
          const topic = this.topics.find((t) => t.id === assignment.transcriptTopicId && !t.isDeleted);
          const row = topic ? this.toProjectTopic(topic) : null;
          if (row) topics.push({ ...row, assignmentReason: assignment.assignmentReason });
        }
        return { cluster, topics: this.sortTopics(topics) };
      });
  }

  async listProjectScripts(projectId: string) {
    return this.scripts
      .filter((s) => s.projectId === projectId && !s.isDeleted)
      .sort((a, b) => b.version - a.version);
  }

  async latestScriptVersion(projectId: string) {
    return this.scripts
      .filter((s) => s.projectId === projectId)
      .reduce((max, s) => Math.max(max, s.version), 0);
  }

  async createScript(input: ScriptInput) {
    if (this.scripts.some((s) => s.projectId === input.projectId && s.version === input.version)) {
      throw new Error(`duplicate key value violates unique constraint "scripts_project_version_idx"`);
    }
    const script: Script = { id: randomUUID(), ...input, ...stampCreate(ACTOR) };
    this.scripts.push(script);
    return script;
  }

  // ============ Seeding helpers ============

  async seedProject(name: string, topic = ""): Promise<Project> {
    return this.createProject(name, topic);
  }

  async seedVideo(
    project: Project | null,
    overrides: Partial<Omit<Video, "id" | "projectId">> & { ytId: string }
  ): Promise<Video> {
    const channel =
      this.channels[0] ??
      (await this.saveChannel({
        ytId: "UC_test_channel",
        title: "Test Channel",
        description: "",
        thumbnailUrl: "",
        videoCount: 0,
        subscriberCount: 0,
        publishedAt: null,
      }));

    const video = await this.createVideo({
      ytId: overrides.ytId,
      title: overrides.title ?? `Video ${overrides.ytId}`,
      description: "",
      thumbnailUrl: "",
      viewCount: 0,
      likeCount: 0,
      commentCount: 0,
      durationSeconds: 0,
      publishedAt: overrides.publishedAt ?? null,
      projectId: project ? project.id : null,
      channelId: channel.id,
    });
    Object.assign(video, overrides);
    return video;
  }

  async seedTopics(video: Video, titles: string[]): Promise<TranscriptTopic[]> {
    return this.createTopics(
      video.id,
      titles.map((title, i) => ({
        startTimeSeconds: i * 60,
        title,
        topicSummary: `${title} summary`,
        content: `${title} content`,
        blueprintElements: "",
      }))
    );
  }
}
