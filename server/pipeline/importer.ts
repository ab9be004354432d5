import type { PipelineStore } from "../lib/pipeline-store.js";
import type { Channel, Project } from "../db/schema.js";
import {
  extractVideoId,
  type VideoMetadataSource,
  type YouTubeVideoInfo,
} from "../lib/youtube-data.js";
import { truncateText } from "../utils/text.js";
import { errorMessage } from "../stages/types.js";

export const MAX_VIDEO_TITLE_LENGTH = 200;
export const MAX_CHANNEL_TITLE_LENGTH = 200;
const MAX_VIDEO_DESCRIPTION_LENGTH = 5000;

export interface ImportedVideo {
  ytId: string;
  title: string;
  success: boolean;
  message: string;
}

export interface RowImportResult {
  projectName: string;
  success: boolean;
  errorMessage?: string;
  projectCreated: boolean;
  videos: ImportedVideo[];
}

export function defaultProjectTopic(projectName: string): string {
  return `Project for ${projectName}`;
}

/**
 * Turns one spreadsheet row (project name + video URLs) into Project,
 * Channel and Video records.
 */
export class VideoImporter {
  constructor(
    private readonly store: PipelineStore,
    private readonly youtube: VideoMetadataSource
  ) {}

  async importRow(projectName: string, videoUrls: string[]): Promise<RowImportResult> {
    const result: RowImportResult = { projectName, success: false, projectCreated: false, videos: [] };

    const urls = videoUrls.map((u) => u.trim()).filter((u) => u.length > 0);
    if (urls.length === 0) {
      return { ...result, errorMessage: "No valid video URLs provided" };
    }

    const ids: string[] = [];
    for (const url of urls) {
      const id = extractVideoId(url);
      if (!id) {
        result.videos.push({ ytId: "", title: url, success: false, message: "Not a recognizable YouTube URL" });
      } else if (!ids.includes(id)) {
        ids.push(id);
      }
    }

    if (ids.length === 0) {
      return { ...result, errorMessage: "No valid YouTube video IDs could be extracted from the provided URLs" };
    }

    try {
      let project = await this.store.findProjectByName(projectName);
      if (!project) {
        project = await this.store.createProject(projectName, defaultProjectTopic(projectName));
        result.projectCreated = true;
        console.log(`[Import] Created project ${projectName}`);
      }

      const newIds: string[] = [];
      for (const id of ids) {
        const existing = await this.store.findVideoByYtId(id);
        if (existing) {
          await this.store.updateVideo(existing.id, { projectId: project.id });
          result.videos.push({
            ytId: id,
            title: existing.title,
            success: true,
            message: "Video already exists - updated project association",
          });
        } else {
          newIds.push(id);
        }
      }

      if (newIds.length > 0) {
        let infos: YouTubeVideoInfo[];
        try {
          infos = await this.youtube.getVideos(newIds);
        } catch (err) {
          return {
            ...result,
            errorMessage: `Failed to retrieve video information from YouTube API: ${errorMessage(err)}`,
          };
        }

        for (const id of newIds) {
          const info = infos.find((i) => i.ytId === id);
          result.videos.push(
            info
              ? await this.createVideo(project, info)
              : { ytId: id, title: id, success: false, message: "Video not found on YouTube" }
          );
        }
      }

      return { ...result, success: true };
    } catch (err) {
      console.error(`[Import] Row for ${projectName} failed:`, errorMessage(err));
      return { ...result, errorMessage: `Processing failed: ${errorMessage(err)}` };
    }
  }

  private async createVideo(project: Project, info: YouTubeVideoInfo): Promise<ImportedVideo> {
    try {
      const channel = await this.ensureChannel(info);
      const video = await this.store.createVideo({
        ytId: info.ytId,
        title: truncateText(info.title, MAX_VIDEO_TITLE_LENGTH),
        description: truncateText(info.description, MAX_VIDEO_DESCRIPTION_LENGTH),
        thumbnailUrl: info.thumbnailUrl,
        viewCount: info.viewCount,
        likeCount: info.likeCount,
        commentCount: info.commentCount,
        durationSeconds: info.durationSeconds,
        publishedAt: info.publishedAt,
        projectId: project.id,
        channelId: channel.id,
      });
      return { ytId: video.ytId, title: video.title, success: true, message: "Video created successfully" };
    } catch (err) {
      console.error(`[Import] Video ${info.ytId} failed:`, errorMessage(err));
      return {
        ytId: info.ytId,
        title: info.title,
        success: false,
        message: `Failed to process video: ${errorMessage(err)}`,
      };
    }
  }

  // Channels are shared across projects and created on first sighting
  private async ensureChannel(info: YouTubeVideoInfo): Promise<Channel> {
    const existing = await this.store.findChannelByYtId(info.channelId);
    if (existing) return existing;

    const channel = await this.youtube.getChannel(info.channelId);
    return this.store.saveChannel(
      channel
        ? {
            ytId: channel.ytId,
            title: truncateText(channel.title, MAX_CHANNEL_TITLE_LENGTH),
            description: channel.description,
            thumbnailUrl: channel.thumbnailUrl,
            videoCount: channel.videoCount,
            subscriberCount: channel.subscriberCount,
            publishedAt: channel.publishedAt,
          }
        : {
            ytId: info.channelId,
            title: truncateText(info.channelTitle, MAX_CHANNEL_TITLE_LENGTH),
            description: "",
            thumbnailUrl: "",
            videoCount: 0,
            subscriberCount: 0,
            publishedAt: null,
          }
    );
  }
}
