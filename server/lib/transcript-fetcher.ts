import { z } from "zod";

export const APIFY_API_BASE = "https://api.apify.com/v2";
const DEFAULT_ACTOR_ID = "streamers~youtube-scraper";

export type TranscriptFetchResult = { ok: true; text: string } | { ok: false; error: string };

/** Caption retrieval boundary used by the Transcript stage. Never throws. */
export interface TranscriptFetcher {
  fetchTranscript(videoUrl: string): Promise<TranscriptFetchResult>;
}

const subtitleSchema = z.object({
  language: z.string().nullish(),
  plaintext: z.string().nullish(),
  srt: z.string().nullish(),
});

const datasetItemSchema = z.object({
  id: z.string().nullish(),
  title: z.string().nullish(),
  subtitles: z.array(subtitleSchema).nullish(),
});

const datasetSchema = z.array(datasetItemSchema);

function getConfig() {
  const token = process.env.APIFY_API_TOKEN;
  if (!token) {
    throw new Error("Missing Apify configuration. Set APIFY_API_TOKEN");
  }
  return { token, actorId: process.env.APIFY_ACTOR_ID || DEFAULT_ACTOR_ID };
}

/**
 * Runs a YouTube scraping actor synchronously and returns its caption text.
 */
export class ApifyTranscriptFetcher implements TranscriptFetcher {
  constructor(
    private readonly token: string,
    private readonly actorId: string = DEFAULT_ACTOR_ID,
    private readonly baseUrl: string = APIFY_API_BASE
  ) {}

  static fromEnv(): ApifyTranscriptFetcher {
    const { token, actorId } = getConfig();
    return new ApifyTranscriptFetcher(token, actorId);
  }

  async fetchTranscript(videoUrl: string): Promise<TranscriptFetchResult> {
    const url =
      `${this.baseUrl}/acts/${encodeURIComponent(this.actorId)}/run-sync-get-dataset-items` +
      `?token=${encodeURIComponent(this.token)}`;

    try {
      const response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          startUrls: [{ url: videoUrl }],
          downloadSubtitles: true,
          subtitlesFormat: "plaintext",
          subtitlesLanguage: "en",
          maxResults: 1,
        }),
      });

      if (!response.ok) {
        return { ok: false, error: `Transcript service request failed (${response.status})` };
      }

      const parsed = datasetSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { ok: false, error: "Unexpected response from transcript service" };
      }

      const subtitles = parsed.data[0]?.subtitles ?? [];
      const text = subtitles
        .map((s) => (s.plaintext || s.srt || "").trim())
        .find((candidate) => candidate.length > 0);

      if (!text) {
        return { ok: false, error: "No subtitles found for this video" };
      }

      return { ok: true, text };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      console.error(`[Transcript] Fetch failed for ${videoUrl}:`, message);
      return { ok: false, error: `Transcript service error: ${message}` };
    }
  }
}
