import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  boolean,
  integer,
  bigint,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";
import { ELLIPSIS } from "../utils/text.js";

// Width of a column filled through truncateText(value, max), ellipsis included
const truncatedWidth = (max: number) => max + ELLIPSIS.length;

// Audit + soft-delete columns shared by every table except projects.
// A fresh set of builders is needed per table, hence the factory.
const auditColumns = () => ({
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  createdBy: varchar("created_by", { length: 100 }).notNull(),
  lastModifiedAt: timestamp("last_modified_at", { withTimezone: true }).defaultNow().notNull(),
  lastModifiedBy: varchar("last_modified_by", { length: 100 }).notNull(),
  isDeleted: boolean("is_deleted").default(false).notNull(),
});

// ============ Projects ============

export const projects = pgTable("projects", {
  id: uuid("id").primaryKey().defaultRandom(),
  name: varchar("name", { length: 200 }).unique().notNull(),
  topic: text("topic").default("").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

// ============ Channels & Videos ============

export const channels = pgTable(
  "channels",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ytId: varchar("yt_id", { length: 64 }).notNull(),
    title: varchar("title", { length: truncatedWidth(200) }).default("").notNull(),
    description: text("description").default("").notNull(),
    thumbnailUrl: text("thumbnail_url").default("").notNull(),
    videoCount: integer("video_count").default(0).notNull(),
    subscriberCount: bigint("subscriber_count", { mode: "number" }).default(0).notNull(),
    publishedAt: timestamp("published_at", { withTimezone: true }),
    lastCheckDate: timestamp("last_check_date", { withTimezone: true }),
    ...auditColumns(),
  },
  (table) => [uniqueIndex("channels_yt_id_idx").on(table.ytId)]
);

export const videos = pgTable(
  "videos",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ytId: varchar("yt_id", { length: 20 }).notNull(),
    title: varchar("title", { length: truncatedWidth(200) }).default("").notNull(),
    description: text("description").default("").notNull(),
    thumbnailUrl: text("thumbnail_url").default("").notNull(),
    viewCount: bigint("view_count", { mode: "number" }).default(0).notNull(),
    likeCount: bigint("like_count", { mode: "number" }).default(0).notNull(),
    commentCount: bigint("comment_count", { mode: "number" }).default(0).notNull(),
    durationSeconds: integer("duration_seconds").default(0).notNull(),
    publishedAt: timestamp("published_at", { withTimezone: true }),
    rawTranscript: text("raw_transcript").default("").notNull(),
    videoTopic: varchar("video_topic", { length: truncatedWidth(200) }).default("").notNull(),
    mainSummary: text("main_summary").default("").notNull(),
    structuredContent: text("structured_content").default("").notNull(),
    projectId: uuid("project_id").references(() => projects.id, { onDelete: "set null" }),
    channelId: uuid("channel_id")
      .references(() => channels.id)
      .notNull(),
    ...auditColumns(),
  },
  (table) => [
    uniqueIndex("videos_yt_id_idx").on(table.ytId),
    index("videos_project_id_idx").on(table.projectId),
    index("videos_channel_id_idx").on(table.channelId),
  ]
);

// ============ Topics & Clusters ============

export const transcriptTopics = pgTable(
  "transcript_topics",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    videoId: uuid("video_id")
      .references(() => videos.id, { onDelete: "cascade" })
      .notNull(),
    startTimeSeconds: integer("start_time_seconds").default(0).notNull(),
    title: varchar("title", { length: truncatedWidth(200) }).notNull(),
    topicSummary: varchar("topic_summary", { length: truncatedWidth(1000) }).default("").notNull(),
    content: text("content").default("").notNull(),
    blueprintElements: text("blueprint_elements").default("").notNull(), // JSON array string
    isSelected: boolean("is_selected").default(false).notNull(),
    ...auditColumns(),
  },
  (table) => [index("transcript_topics_video_id_idx").on(table.videoId)]
);

export const topicClusters = pgTable(
  "topic_clusters",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    projectId: uuid("project_id")
      .references(() => projects.id, { onDelete: "cascade" })
      .notNull(),
    clusterName: varchar("cluster_name", { length: truncatedWidth(200) }).notNull(),
    clusterDescription: text("cluster_description").default("").notNull(),
    displayOrder: integer("display_order").default(0).notNull(),
    ...auditColumns(),
  },
  (table) => [index("topic_clusters_project_id_idx").on(table.projectId)]
);

export const topicClusterAssignments = pgTable(
  "topic_cluster_assignments",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    transcriptTopicId: uuid("transcript_topic_id")
      .references(() => transcriptTopics.id, { onDelete: "cascade" })
      .notNull(),
    topicClusterId: uuid("topic_cluster_id")
      .references(() => topicClusters.id, { onDelete: "cascade" })
      .notNull(),
    assignmentReason: text("assignment_reason").default("").notNull(),
    ...auditColumns(),
  },
  (table) => [
    // A topic belongs to at most one cluster
    uniqueIndex("topic_cluster_assignments_topic_idx").on(table.transcriptTopicId),
    index("topic_cluster_assignments_cluster_idx").on(table.topicClusterId),
  ]
);

// ============ Scripts ============

export const scripts = pgTable(
  "scripts",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    projectId: uuid("project_id")
      .references(() => projects.id, { onDelete: "cascade" })
      .notNull(),
    // Built from the project name and its free-text topic, so unbounded
    title: text("title").notNull(),
    content: text("content").notNull(),
    version: integer("version").notNull(),
    promptTokens: integer("prompt_tokens").default(0).notNull(),
    completionTokens: integer("completion_tokens").default(0).notNull(),
    totalTokens: integer("total_tokens").default(0).notNull(),
    ...auditColumns(),
  },
  (table) => [uniqueIndex("scripts_project_version_idx").on(table.projectId, table.version)]
);

// ============ Relations ============

export const projectsRelations = relations(projects, ({ many }) => ({
  videos: many(videos),
  clusters: many(topicClusters),
  scripts: many(scripts),
}));

export const channelsRelations = relations(channels, ({ many }) => ({
  videos: many(videos),
}));

export const videosRelations = relations(videos, ({ one, many }) => ({
  project: one(projects, { fields: [videos.projectId], references: [projects.id] }),
  channel: one(channels, { fields: [videos.channelId], references: [channels.id] }),
  topics: many(transcriptTopics),
}));

export const transcriptTopicsRelations = relations(transcriptTopics, ({ one }) => ({
  video: one(videos, { fields: [transcriptTopics.videoId], references: [videos.id] }),
}));

export const topicClustersRelations = relations(topicClusters, ({ one, many }) => ({
  project: one(projects, { fields: [topicClusters.projectId], references: [projects.id] }),
  assignments: many(topicClusterAssignments),
}));

export const topicClusterAssignmentsRelations = relations(topicClusterAssignments, ({ one }) => ({
  topic: one(transcriptTopics, {
    fields: [topicClusterAssignments.transcriptTopicId],
    references: [transcriptTopics.id],
  }),
  cluster: one(topicClusters, {
    fields: [topicClusterAssignments.topicClusterId],
    references: [topicClusters.id],
  }),
}));

export const scriptsRelations = relations(scripts, ({ one }) => ({
  project: one(projects, { fields: [scripts.projectId], references: [projects.id] }),
}));

// ============ Types ============

export type Project = typeof projects.$inferSelect;
export type NewProject = typeof projects.$inferInsert;
export type Channel = typeof channels.$inferSelect;
export type NewChannel = typeof channels.$inferInsert;
export type Video = typeof videos.$inferSelect;
export type NewVideo = typeof videos.$inferInsert;
export type TranscriptTopic = typeof transcriptTopics.$inferSelect;
export type NewTranscriptTopic = typeof transcriptTopics.$inferInsert;
export type TopicCluster = typeof topicClusters.$inferSelect;
export type NewTopicCluster = typeof topicClusters.$inferInsert;
export type TopicClusterAssignment = typeof topicClusterAssignments.$inferSelect;
export type NewTopicClusterAssignment = typeof topicClusterAssignments.$inferInsert;
export type Script = typeof scripts.$inferSelect;
export type NewScript = typeof scripts.$inferInsert;
