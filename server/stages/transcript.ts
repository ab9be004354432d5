import type { PipelineStore } from "../lib/pipeline-store.js";
import type { TranscriptFetcher } from "../lib/transcript-fetcher.js";
import type { Video } from "../db/schema.js";
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

export const DEFAULT_TRANSCRIPT_DELAY_MS = 2000;

export interface TranscriptStageOptions {
  /** Pause between consecutive fetches (third-party rate limit) */
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const hasTranscript = (video: Pick<Video, "rawTranscript">) =>
  video.rawTranscript.trim().length > 0;

export function watchUrl(ytId: string): string {
  return `https://www.youtube.com/watch?v=${ytId}`;
}

export class TranscriptStage implements StageProcessor {
  readonly stage = "transcript" as const;
  private readonly delayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly store: PipelineStore,
    private readonly fetcher: TranscriptFetcher,
    options: TranscriptStageOptions = {}
  ) {
    this.delayMs = options.delayMs ?? DEFAULT_TRANSCRIPT_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async getStatus(projectName: string): Promise<StageStatus> {
    try {
      const project = await this.store.findProjectByName(projectName);
      if (!project) return missingProjectStatus(this.stage, projectName);

      const videos = await this.store.listProjectVideos(project.id);
      const withTranscripts = videos.filter(hasTranscript).length;

      return projectStatus(this.stage, projectName, videos.length, withTranscripts, {
        totalVideos: videos.length,
        withTranscripts,
        withoutTranscripts: videos.length - withTranscripts,
      });
    } catch (err) {
      console.error(`[Transcript] Status check failed for ${projectName}:`, errorMessage(err));
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
      const eligible = videos.filter((video) => !hasTranscript(video));
      if (eligible.length === 0) {
        return stageFailure(this.stage, projectName, "No videos need transcripts");
      }

      console.log(`[Transcript] Fetching ${eligible.length} transcript(s) for ${projectName}`);

      const items: ItemOutcome[] = [];
      for (const [i, video] of eligible.entries()) {
        if (i > 0 && this.delayMs > 0) {
          await this.sleep(this.delayMs);
        }
        items.push(await this.processVideo(video));
      }

      return stageResult(this.stage, projectName, items);
    } catch (err) {
      console.error(`[Transcript] Processing failed for ${projectName}:`, errorMessage(err));
      return stageFailure(this.stage, projectName, `Processing failed: ${errorMessage(err)}`);
    }
  }

  private async processVideo(video: Video): Promise<ItemOutcome> {
    try {
      const result = await this.fetcher.fetchTranscript(watchUrl(video.ytId));
      if (!result.ok) {
        console.warn(`[Transcript] ${video.title} (${video.ytId}): ${result.error}`);
        return itemFailure(video.ytId, video.title, result.error);
      }

      await this.store.updateVideo(video.id, { rawTranscript: result.text });

      return {
        id: video.ytId,
        title: video.title,
        success: true,
        message: "Transcript retrieved and saved successfully",
        metrics: { transcriptLength: result.text.length },
      };
    } catch (err) {
      console.error(`[Transcript] ${video.title} (${video.ytId}) failed:`, errorMessage(err));
      return itemFailure(video.ytId, video.title, `Processing failed: ${errorMessage(err)}`);
    }
  }
}
