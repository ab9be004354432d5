import type { PipelineStore, TopicInput } from "../lib/pipeline-store.js";
import type { LlmGateway } from "../lib/llm-gateway.js";
import type { TranscriptTopic, Video } from "../db/schema.js";
import {
  TOPIC_DISCOVERY_MODEL,
  TOPIC_DISCOVERY_SYSTEM_PROMPT,
  buildTopicDiscoveryPrompt,
} from "../prompts/topic-discovery.js";
import { parseModelJson, topicDiscoveryContract } from "./response-contracts.js";
import { truncateText, truncateTranscript, TOPIC_DISCOVERY_BUDGET } from "../utils/text.js";
import { parseTimestamp } from "../utils/timestamps.js";
import { hasTranscript } from "./transcript.js";
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

export const MAX_TITLE_LENGTH = 200;
export const MAX_SUMMARY_LENGTH = 1000;

export class TopicDiscoveryStage implements StageProcessor {
  readonly stage = "topicDiscovery" as const;

  constructor(
    private readonly store: PipelineStore,
    private readonly llm: LlmGateway
  ) {}

  private async topicCountsByVideo(projectId: string): Promise<Map<string, number>> {
    const counts = new Map<string, number>();
    for (const { topic } of await this.store.listProjectTopics(projectId)) {
      counts.set(topic.videoId, (counts.get(topic.videoId) ?? 0) + 1);
    }
    return counts;
  }

  async getStatus(projectName: string): Promise<StageStatus> {
    try {
      const project = await this.store.findProjectByName(projectName);
      if (!project) return missingProjectStatus(this.stage, projectName);

      const videos = await this.store.listProjectVideos(project.id);
      const counts = await this.topicCountsByVideo(project.id);
      const withTranscripts = videos.filter(hasTranscript);
      const withTopics = withTranscripts.filter((v) => (counts.get(v.id) ?? 0) > 0).length;
      const totalTopics = [...counts.values()].reduce((sum, n) => sum + n, 0);

      return projectStatus(this.stage, projectName, withTranscripts.length, withTopics, {
        totalVideos: videos.length,
        withTranscripts: withTranscripts.length,
        withTopics,
        needingTopics: withTranscripts.length - withTopics,
        totalTopics,
      });
    } catch (err) {
      console.error(`[TopicDiscovery] Status check failed for ${projectName}:`, errorMessage(err));
      return missingProjectStatus(this.stage, projectName, errorMessage(err));
    }
  }

  async processProject(projectName: string): Promise<StageResult> {
    try {
      const project = await this.store.findProjectByName(projectName);
      if (!project) {
        return stageFailure(this.stage, projectName, `Project '${projectName}' not found`);
      }

      const videos = await this.store.listProjectVideos(project.id);
      const counts = await this.topicCountsByVideo(project.id);
      const eligible = videos.filter((v) => hasTranscript(v) && (counts.get(v.id) ?? 0) === 0);

      if (eligible.length === 0) {
        return stageFailure(this.stage, projectName, "No videos with transcripts need topic discovery");
      }

      console.log(`[TopicDiscovery] Analyzing ${eligible.length} video(s) for ${projectName}`);

      const items: ItemOutcome[] = [];
      for (const video of eligible) {
        items.push(await this.processVideo(video));
      }
      return stageResult(this.stage, projectName, items);
    } catch (err) {
      console.error(`[TopicDiscovery] Processing failed for ${projectName}:`, errorMessage(err));
      return stageFailure(this.stage, projectName, `Processing failed: ${errorMessage(err)}`);
    }
  }

  private async processVideo(video: Video): Promise<ItemOutcome> {
    try {
      if (!hasTranscript(video)) {
        return itemFailure(video.ytId, video.title, "Video has no transcript");
      }

      const transcript = truncateTranscript(video.rawTranscript, TOPIC_DISCOVERY_BUDGET);
      const completion = await this.llm.complete({
        ...TOPIC_DISCOVERY_MODEL,
        systemPrompt: TOPIC_DISCOVERY_SYSTEM_PROMPT,
        userPrompt: buildTopicDiscoveryPrompt(transcript),
      });
      if (!completion.ok) {
        return itemFailure(video.ytId, video.title, completion.error);
      }

      const parsed = parseModelJson(completion.text, topicDiscoveryContract);
      if (!parsed.ok) {
        console.warn(`[TopicDiscovery] ${video.ytId}: ${parsed.error}`);
        return itemFailure(video.ytId, video.title, parsed.error);
      }

      const topics: TopicInput[] = [];
      for (const topic of parsed.value.topics) {
        if (!topic.title || !topic.summary || !topic.starttime) {
          console.warn(`[TopicDiscovery] ${video.ytId}: skipping topic missing title, summary or start time`);
          continue;
        }
        topics.push({
          startTimeSeconds: parseTimestamp(topic.starttime),
          title: truncateText(topic.title, MAX_TITLE_LENGTH),
          topicSummary: truncateText(topic.summary, MAX_SUMMARY_LENGTH),
          content: topic.content,
          blueprintElements:
            topic.blueprint_elements.length > 0 ? JSON.stringify(topic.blueprint_elements) : "",
        });
      }

      if (topics.length === 0) {
        return itemFailure(video.ytId, video.title, "No valid topics found in AI response");
      }

      await this.store.createTopics(video.id, topics);

      return {
        id: video.ytId,
        title: video.title,
        success: true,
        message: `Discovered ${topics.length} topic(s)`,
        metrics: { topicCount: topics.length },
      };
    } catch (err) {
      console.error(`[TopicDiscovery] ${video.title} (${video.ytId}) failed:`, errorMessage(err));
      return itemFailure(video.ytId, video.title, `Processing failed: ${errorMessage(err)}`);
    }
  }

  /** Topics of one video by its external id, or null if the video is unknown. */
  async getVideoTopics(ytId: string): Promise<TranscriptTopic[] | null> {
    const video = await this.store.findVideoByYtId(ytId);
    if (!video) return null;
    return this.store.listVideoTopics(video.id);
  }

  /** Flip a topic's selection flag. Returns null for an unknown topic. */
  async toggleTopicSelection(topicId: string): Promise<TranscriptTopic | null> {
    const topic = await this.store.findTopicById(topicId);
    if (!topic) return null;
    await this.store.setTopicSelected(topic.id, !topic.isSelected);
    return { ...topic, isSelected: !topic.isSelected };
  }
}
