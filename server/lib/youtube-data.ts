import { toDateSafe } from "../utils/dates.js";

// YouTube Data API v3 (read-only, API key auth)
export const YOUTUBE_API_BASE = "https://www.googleapis.com/youtube/v3";
const MAX_IDS_PER_REQUEST = 50;

export interface YouTubeVideoInfo {
  ytId: string;
  title: string;
  description: string;
  channelId: string;
  channelTitle: string;
  publishedAt: Date | null;
  viewCount: number;
  likeCount: number;
  commentCount: number;
  durationSeconds: number;
  thumbnailUrl: string;
}

export interface YouTubeChannelInfo {
  ytId: string;
  title: string;
  description: string;
  thumbnailUrl: string;
  subscriberCount: number;
  videoCount: number;
  publishedAt: Date | null;
}

/** Metadata boundary used by the import step. */
export interface VideoMetadataSource {
  getVideos(ids: string[]): Promise<YouTubeVideoInfo[]>;
  getChannel(channelId: string): Promise<YouTubeChannelInfo | null>;
}

interface ThumbnailSet {
  default?: { url: string };
  medium?: { url: string };
  high?: { url: string };
}

interface VideoListResponse {
  items?: Array<{
    id: string;
    snippet?: {
      title?: string;
      description?: string;
      channelId?: string;
      channelTitle?: string;
      publishedAt?: string;
      thumbnails?: ThumbnailSet;
    };
    statistics?: { viewCount?: string; likeCount?: string; commentCount?: string };
    contentDetails?: { duration?: string };
  }>;
}

interface ChannelListResponse {
  items?: Array<{
    id: string;
    snippet?: {
      title?: string;
      description?: string;
      publishedAt?: string;
      thumbnails?: ThumbnailSet;
    };
    statistics?: { subscriberCount?: string; videoCount?: string };
  }>;
}

const VIDEO_ID_PATTERNS = [
  /(?:youtube\.com\/watch\?v=|youtu\.be\/|youtube\.com\/embed\/)([a-zA-Z0-9_-]{11})/,
  /youtube\.com\/v\/([a-zA-Z0-9_-]{11})/,
  /youtube\.com\/watch\?.*[?&]?v=([a-zA-Z0-9_-]{11})/,
];

/** Pull the 11-character video id out of a URL (or accept a bare id). */
export function extractVideoId(url: string): string | null {
  const input = url.trim();
  if (!input) return null;
  if (/^[a-zA-Z0-9_-]{11}$/.test(input)) return input;

  for (const pattern of VIDEO_ID_PATTERNS) {
    const match = input.match(pattern);
    if (match) return match[1];
  }
  return null;
}

/** ISO 8601 duration (PT1H4M13S) to whole seconds; 0 when unparseable. */
export function parseIsoDuration(duration: string | undefined): number {
  if (!duration) return 0;
  const match = duration.match(/^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/);
  if (!match) return 0;
  const [, days, hours, minutes, seconds] = match;
  return (
    Number(days ?? 0) * 86400 +
    Number(hours ?? 0) * 3600 +
    Number(minutes ?? 0) * 60 +
    Math.floor(Number(seconds ?? 0))
  );
}

function pickThumbnail(thumbnails: ThumbnailSet | undefined): string {
  return thumbnails?.high?.url ?? thumbnails?.medium?.url ?? thumbnails?.default?.url ?? "";
}

function toCount(value: string | undefined): number {
  const n = Number(value ?? 0);
  return Number.isFinite(n) ? n : 0;
}

function getConfig() {
  const apiKey = process.env.YOUTUBE_API_KEY;
  if (!apiKey) {
    throw new Error("Missing YouTube Data API configuration. Set YOUTUBE_API_KEY");
  }
  return { apiKey };
}

export class YouTubeDataClient implements VideoMetadataSource {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string = YOUTUBE_API_BASE
  ) {}

  static fromEnv(): YouTubeDataClient {
    return new YouTubeDataClient(getConfig().apiKey);
  }

  private async get<T>(resource: string, params: Record<string, string>): Promise<T> {
    const query = new URLSearchParams({ ...params, key: this.apiKey });
    const response = await fetch(`${this.baseUrl}/${resource}?${query}`);

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`YouTube API ${resource} request failed (${response.status}): ${body}`);
    }

    const data: T = await response.json();
    return data;
  }

  /** Fetch video details, batching ids 50 at a time. Unknown ids are simply absent. */
  async getVideos(ids: string[]): Promise<YouTubeVideoInfo[]> {
    const unique = [...new Set(ids)];
    const results: YouTubeVideoInfo[] = [];

    for (let i = 0; i < unique.length; i += MAX_IDS_PER_REQUEST) {
      const batch = unique.slice(i, i + MAX_IDS_PER_REQUEST);
      const data = await this.get<VideoListResponse>("videos", {
        part: "snippet,statistics,contentDetails",
        id: batch.join(","),
      });

      for (const item of data.items ?? []) {
        results.push({
          ytId: item.id,
          title: item.snippet?.title ?? "",
          description: item.snippet?.description ?? "",
          channelId: item.snippet?.channelId ?? "",
          channelTitle: item.snippet?.channelTitle ?? "",
          publishedAt: toDateSafe(item.snippet?.publishedAt),
          viewCount: toCount(item.statistics?.viewCount),
          likeCount: toCount(item.statistics?.likeCount),
          commentCount: toCount(item.statistics?.commentCount),
          durationSeconds: parseIsoDuration(item.contentDetails?.duration),
          thumbnailUrl: pickThumbnail(item.snippet?.thumbnails),
        });
      }
    }

    return results;
  }

  async getChannel(channelId: string): Promise<YouTubeChannelInfo | null> {
    const data = await this.get<ChannelListResponse>("channels", {
      part: "snippet,statistics",
      id: channelId,
    });

    const item = data.items?.[0];
    if (!item) return null;

    return {
      ytId: item.id,
      title: item.snippet?.title ?? "",
      description: item.snippet?.description ?? "",
      thumbnailUrl: pickThumbnail(item.snippet?.thumbnails),
      subscriberCount: toCount(item.statistics?.subscriberCount),
      videoCount: toCount(item.statistics?.videoCount),
      publishedAt: toDateSafe(item.snippet?.publishedAt),
    };
  }
}
