import type { PipelineStore } from "../lib/pipeline-store.js";
import type { LlmGateway } from "../lib/llm-gateway.js";
import type { Video } from "../db/schema.js";
import { SUMMARY_MODEL, SUMMARY_SYSTEM_PROMPT, buildSummaryPrompt } from "../prompts/summary.js";
import { parseModelJson, summaryContract } from "./response-contracts.js";
import { truncateText, truncateTranscript, SUMMARY_BUDGET } from "../utils/text.js";
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

export const MAX_VIDEO_TOPIC_LENGTH = 200;
const MAX_MAIN_SUMMARY_LENGTH = 2000;

const hasSummary = (video: Video) => video.videoTopic.trim().length > 0;

export class SummaryStage implements StageProcessor {
  readonly stage = "summary" as const;

  constructor(
    private readonly store: PipelineStore,
    private readonly llm: LlmGateway
  ) {}

  async getStatus(projectName: string): Promise<StageStatus> {
    try {
      const project = await this.store.findProjectByName(projectName);
      if (!project) return missingProjectStatus(this.stage, projectName);

      const videos = await this.store.listProjectVideos(project.id);
      const withTranscripts = videos.filter(hasTranscript);
      const withSummaries = withTranscripts.filter(hasSummary).length;

      return projectStatus(this.stage, projectName, withTranscripts.length, withSummaries, {
        totalVideos: videos.length,
        withTranscripts: withTranscripts.length,
        withSummaries,
        needingSummaries: withTranscripts.length - withSummaries,
      });
    } catch (err) {
      console.error(`[Summary] Status check failed for ${projectName}:`, errorMessage(err));
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
      const eligible = videos.filter((v) => hasTranscript(v) && !hasSummary(v));
      if (eligible.length === 0) {
        return stageFailure(this.stage, projectName, "No videos with transcripts need summaries");
      }

      console.log(`[Summary] Summarizing ${eligible.length} video(s) for ${projectName}`);

      const items: ItemOutcome[] = [];
      for (const video of eligible) {
        items.push(await this.processVideo(video));
      }
      return stageResult(this.stage, projectName, items);
    } catch (err) {
      console.error(`[Summary] Processing failed for ${projectName}:`, errorMessage(err));
      return stageFailure(this.stage, projectName, `Processing failed: ${errorMessage(err)}`);
    }
  }

  private async processVideo(video: Video): Promise<ItemOutcome> {
    try {
      const transcript = truncateTranscript(video.rawTranscript, SUMMARY_BUDGET);
      const completion = await this.llm.complete({
        ...SUMMARY_MODEL,
        systemPrompt: SUMMARY_SYSTEM_PROMPT,
        userPrompt: buildSummaryPrompt(transcript),
      });
      if (!completion.ok) {
        return itemFailure(video.ytId, video.title, completion.error);
      }

      // Nothing is written unless the whole response validates, so a failed
      // video stays eligible for the next run.
      const parsed = parseModelJson(completion.text, summaryContract);
      if (!parsed.ok) {
        console.warn(`[Summary] ${video.ytId}: ${parsed.error}`);
        return itemFailure(video.ytId, video.title, parsed.error);
      }

      const mainSummary = truncateText(parsed.value.main_summary, MAX_MAIN_SUMMARY_LENGTH);
      await this.store.updateVideo(video.id, {
        videoTopic: truncateText(parsed.value.video_topic, MAX_VIDEO_TOPIC_LENGTH),
        mainSummary,
        structuredContent: parsed.value.structured_content,
      });

      return {
        id: video.ytId,
        title: video.title,
        success: true,
        message: "Summary generated and saved successfully",
        metrics: { summaryLength: mainSummary.length },
      };
    } catch (err) {
      console.error(`[Summary] ${video.title} (${video.ytId}) failed:`, errorMessage(err));
      return itemFailure(video.ytId, video.title, `Processing failed: ${errorMessage(err)}`);
    }
  }
}
