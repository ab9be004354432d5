import { http, HttpResponse } from "msw";

export const OPENAI_CHAT_URL = "https://api.openai.com/v1/chat/completions";
export const YOUTUBE_VIDEOS_URL = "https://www.googleapis.com/youtube/v3/videos";
export const YOUTUBE_CHANNELS_URL = "https://www.googleapis.com/youtube/v3/channels";
export const APIFY_RUN_URL =
  "https://api.apify.com/v2/acts/:actor/run-sync-get-dataset-items";
export const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";
export const DRIVE_FILES_URL = "https://www.googleapis.com/drive/v3/files";
export const SHEETS_VALUES_URL = /^https:\/\/sheets\.googleapis\.com\/v4\/spreadsheets\/[^/]+\/values\/[^:]/;
export const SHEETS_BATCH_URL = /^https:\/\/sheets\.googleapis\.com\/v4\/spreadsheets\/[^/]+\/values:batchUpdate$/;

/**
 * Chat completion body in the shape the OpenAI API returns
 */
export function chatCompletion(content: string | null) {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 1700000000,
    model: "gpt-4o-mini",
    choices: [
      {
        index: 0,
        message: { role: "assistant", content },
        finish_reason: "stop",
        logprobs: null,
      },
    ],
    usage: { prompt_tokens: 120, completion_tokens: 30, total_tokens: 150 },
  };
}

/**
 * YouTube Data API video resource
 */
export function youtubeVideo(id: string, overrides: { title?: string; channelId?: string } = {}) {
  return {
    id,
    snippet: {
      title: overrides.title ?? `Video ${id}`,
      description: "A test video",
      channelId: overrides.channelId ?? "UC_test_channel",
      channelTitle: "Test Channel",
      publishedAt: "2024-03-01T12:00:00Z",
      thumbnails: {
        default: { url: `https://i.ytimg.com/vi/${id}/default.jpg` },
        high: { url: `https://i.ytimg.com/vi/${id}/hqdefault.jpg` },
      },
    },
    statistics: { viewCount: "1500", likeCount: "120", commentCount: "8" },
    contentDetails: { duration: "PT12M30S" },
  };
}

export const youtubeChannel = {
  id: "UC_test_channel",
  snippet: {
    title: "Test Channel",
    description: "Channel used in tests",
    publishedAt: "2019-01-01T00:00:00Z",
    thumbnails: { medium: { url: "https://yt3.ggpht.com/test-medium.jpg" } },
  },
  statistics: { videoCount: "42", subscriberCount: "12000" },
};

export const apifyDataset = [
  {
    id: "dQw4w9WgXcQ",
    title: "Test video",
    subtitles: [{ language: "en", plaintext: "Hello and welcome to the show." }],
  },
];

/**
 * Default handlers for the external APIs the pipeline calls
 */
export const handlers = [
  http.post(OPENAI_CHAT_URL, async ({ request }) => {
    const authHeader = request.headers.get("Authorization");
    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      return HttpResponse.json({ error: { message: "Invalid API key" } }, { status: 401 });
    }
    return HttpResponse.json(chatCompletion('{"ok":true}'));
  }),

  http.get(YOUTUBE_VIDEOS_URL, ({ request }) => {
    const ids = (new URL(request.url).searchParams.get("id") ?? "").split(",").filter(Boolean);
    return HttpResponse.json({ items: ids.map((id) => youtubeVideo(id)) });
  }),

  http.get(YOUTUBE_CHANNELS_URL, () => HttpResponse.json({ items: [youtubeChannel] })),

  http.post(APIFY_RUN_URL, () => HttpResponse.json(apifyDataset)),

  http.post(GOOGLE_TOKEN_URL, () =>
    HttpResponse.json({ access_token: "test-access-token", expires_in: 3600, token_type: "Bearer" })
  ),
];

/**
 * Error handlers for specific test scenarios
 * Use with server.use(errorHandlers.x()) to override default handlers for one request
 */
export const errorHandlers = {
  openAiRateLimited: () =>
    http.post(
      OPENAI_CHAT_URL,
      () => HttpResponse.json({ error: { message: "Rate limit exceeded" } }, { status: 429 }),
      { once: true }
    ),

  openAiEmptyContent: () =>
    http.post(OPENAI_CHAT_URL, () => HttpResponse.json(chatCompletion(null)), { once: true }),

  youtubeForbidden: () =>
    http.get(
      YOUTUBE_VIDEOS_URL,
      () => HttpResponse.json({ error: { message: "quota exceeded" } }, { status: 403 }),
      { once: true }
    ),

  apifyServerError: () =>
    http.post(APIFY_RUN_URL, () => HttpResponse.json({ error: "internal" }, { status: 502 }), {
      once: true,
    }),

  apifyNoSubtitles: () =>
    http.post(APIFY_RUN_URL, () => HttpResponse.json([{ id: "dQw4w9WgXcQ", subtitles: [] }]), {
      once: true,
    }),
};
