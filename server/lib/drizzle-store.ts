import { and, asc, desc, eq, inArray } from "drizzle-orm";
import type { Database } from "../db/index.js";
import {
  projects,
  channels,
  videos,
  transcriptTopics,
  topicClusters,
  topicClusterAssignments,
  scripts,
} from "../db/schema.js";
import { stampCreate, stampUpdate } from "../db/audit.js";
import type {
  PipelineStore,
  ProjectTopic,
  ClusterWithTopics,
  ChannelInput,
  VideoInput,
  VideoPatch,
  TopicInput,
  ClusterInput,
  AssignmentInput,
  ScriptInput,
} from "./pipeline-store.js";

/**
 * Postgres-backed store (Neon HTTP driver).
 *
 * The HTTP driver has no interactive transactions, so multi-row writes
 * (a cluster and then its assignments) are committed one statement at a time.
 */
export class DrizzleStore implements PipelineStore {
  constructor(
    private readonly db: Database,
    private readonly actor: string = "pipeline"
  ) {}

  async listProjects() {
    return this.db.select().from(projects).orderBy(asc(projects.name));
  }

  async findProjectByName(name: string) {
    const [row] = await this.db.select().from(projects).where(eq(projects.name, name)).limit(1);
    return row ?? null;
  }

  async createProject(name: string, topic: string) {
    const [row] = await this.db.insert(projects).values({ name, topic }).returning();
    return row;
  }

  async findChannelByYtId(ytId: string) {
    const [row] = await this.db
      .select()
      .from(channels)
      .where(and(eq(channels.ytId, ytId), eq(channels.isDeleted, false)))
      .limit(1);
    return row ?? null;
  }

  async saveChannel(input: ChannelInput) {
    const now = new Date();
    const [row] = await this.db
      .insert(channels)
      .values({ ...input, lastCheckDate: now, ...stampCreate(this.actor, now) })
      .onConflictDoUpdate({
        target: channels.ytId,
        set: { ...input, lastCheckDate: now, isDeleted: false, ...stampUpdate(this.actor, now) },
      })
      .returning();
    return row;
  }

  async findVideoByYtId(ytId: string) {
    const [row] = await this.db
      .select()
      .from(videos)
      .where(and(eq(videos.ytId, ytId), eq(videos.isDeleted, false)))
      .limit(1);
    return row ?? null;
  }

  async createVideo(input: VideoInput) {
    const [row] = await this.db
      .insert(videos)
      .values({ ...input, ...stampCreate(this.actor) })
      .returning();
    return row;
  }

  async updateVideo(id: string, patch: VideoPatch) {
    await this.db
      .update(videos)
      .set({ ...patch, ...stampUpdate(this.actor) })
      .where(eq(videos.id, id));
  }

  async listProjectVideos(projectId: string) {
    return this.db
      .select()
      .from(videos)
      .where(and(eq(videos.projectId, projectId), eq(videos.isDeleted, false)))
      .orderBy(asc(videos.publishedAt), asc(videos.createdAt));
  }

  async findTopicById(id: string) {
    const [row] = await this.db
      .select()
      .from(transcriptTopics)
      .where(and(eq(transcriptTopics.id, id), eq(transcriptTopics.isDeleted, false)))
      .limit(1);
    return row ?? null;
  }

  async listVideoTopics(videoId: string) {
    return this.db
      .select()
      .from(transcriptTopics)
      .where(and(eq(transcriptTopics.videoId, videoId), eq(transcriptTopics.isDeleted, false)))
      .orderBy(asc(transcriptTopics.startTimeSeconds));
  }

  async listProjectTopics(projectId: string): Promise<ProjectTopic[]> {
    const rows = await this.db
      .select({
        topic: transcriptTopics,
        video: {
          id: videos.id,
          ytId: videos.ytId,
          title: videos.title,
          publishedAt: videos.publishedAt,
        },
      })
      .from(transcriptTopics)
      .innerJoin(videos, eq(transcriptTopics.videoId, videos.id))
      .where(
        and(
          eq(videos.projectId, projectId),
          eq(videos.isDeleted, false),
          eq(transcriptTopics.isDeleted, false)
        )
      )
      .orderBy(asc(videos.publishedAt), asc(transcriptTopics.startTimeSeconds));
    return rows;
  }

  async createTopics(videoId: string, topics: TopicInput[]) {
    if (topics.length === 0) return [];
    const now = new Date();
    return this.db
      .insert(transcriptTopics)
      .values(topics.map((topic) => ({ ...topic, videoId, ...stampCreate(this.actor, now) })))
      .returning();
  }

  async setTopicSelected(id: string, isSelected: boolean) {
    await this.db
      .update(transcriptTopics)
      .set({ isSelected, ...stampUpdate(this.actor) })
      .where(eq(transcriptTopics.id, id));
  }

  async deleteProjectClusters(projectId: string) {
    // A topic whose video moved here may still be assigned under its old project
    const projectTopicIds = this.db
      .select({ id: transcriptTopics.id })
      .from(transcriptTopics)
      .innerJoin(videos, eq(transcriptTopics.videoId, videos.id))
      .where(eq(videos.projectId, projectId));
    await this.db
      .delete(topicClusterAssignments)
      .where(inArray(topicClusterAssignments.transcriptTopicId, projectTopicIds));

    // The remaining assignments cascade on the cluster foreign key
    const deleted = await this.db
      .delete(topicClusters)
      .where(eq(topicClusters.projectId, projectId))
      .returning({ id: topicClusters.id });
    return deleted.length;
  }

  async createCluster(projectId: string, input: ClusterInput) {
    const [row] = await this.db
      .insert(topicClusters)
      .values({ ...input, projectId, ...stampCreate(this.actor) })
      .returning();
    return row;
  }

  async createAssignments(clusterId: string, assignments: AssignmentInput[]) {
    if (assignments.length === 0) return [];
    const now = new Date();
    return this.db
      .insert(topicClusterAssignments)
      .values(
        assignments.map((assignment) => ({
          ...assignment,
          topicClusterId: clusterId,
          ...stampCreate(this.actor, now),
        }))
      )
      .returning();
  }

  async listProjectClusters(projectId: string): Promise<ClusterWithTopics[]> {
    const clusters = await this.db
      .select()
      .from(topicClusters)
      .where(and(eq(topicClusters.projectId, projectId), eq(topicClusters.isDeleted, false)))
      .orderBy(asc(topicClusters.displayOrder));

    if (clusters.length === 0) return [];

    const rows = await this.db
      .select({
        clusterId: topicClusterAssignments.topicClusterId,
        assignmentReason: topicClusterAssignments.assignmentReason,
        topic: transcriptTopics,
        video: {
          id: videos.id,
          ytId: videos.ytId,
          title: videos.title,
          publishedAt: videos.publishedAt,
        },
      })
      .from(topicClusterAssignments)
      .innerJoin(transcriptTopics, eq(topicClusterAssignments.transcriptTopicId, transcriptTopics.id))
      .innerJoin(videos, eq(transcriptTopics.videoId, videos.id))
      .where(
        and(
          inArray(
            topicClusterAssignments.topicClusterId,
            clusters.map((c) => c.id)
          ),
          eq(topicClusterAssignments.isDeleted, false),
          eq(transcriptTopics.isDeleted, false)
        )
      )
      .orderBy(asc(videos.publishedAt), asc(transcriptTopics.startTimeSeconds));

    return clusters.map((cluster) => ({
      cluster,
      topics: rows
        .filter((row) => row.clusterId === cluster.id)
        .map(({ topic, video, assignmentReason }) => ({ topic, video, assignmentReason })),
    }));
  }

  async listProjectScripts(projectId: string) {
    return this.db
      .select()
      .from(scripts)
      .where(and(eq(scripts.projectId, projectId), eq(scripts.isDeleted, false)))
      .orderBy(desc(scripts.version));
  }

  async latestScriptVersion(projectId: string) {
    const [row] = await this.db
      .select({ version: scripts.version })
      .from(scripts)
      .where(eq(scripts.projectId, projectId))
      .orderBy(desc(scripts.version))
      .limit(1);
    return row?.version ?? 0;
  }

  async createScript(input: ScriptInput) {
    const [row] = await this.db
      .insert(scripts)
      .values({ ...input, ...stampCreate(this.actor) })
      .returning();
    return row;
  }
}
