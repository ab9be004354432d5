import { describe, it, expect, beforeAll, afterAll, afterEach } from "vitest";
import { http, HttpResponse } from "msw";
import { server } from "../mocks/server.js";
import { errorHandlers, APIFY_RUN_URL } from "../mocks/handlers.js";
import { ApifyTranscriptFetcher } from "../../lib/transcript-fetcher.js";

describe("ApifyTranscriptFetcher", () => {
  const fetcher = new ApifyTranscriptFetcher("test-apify-token");
  const videoUrl = "https://www.youtube.com/watch?v=dQw4w9WgXcQ";

  beforeAll(() => server.listen({ onUnhandledRequest: "error" }));
  afterEach(() => server.resetHandlers());
  afterAll(() => server.close());

  it("should run the actor and return the first plaintext subtitles", async () => {
    let actor = "";
    let token: string | null = null;
    let input: unknown;
    server.use(
      http.post(APIFY_RUN_URL, async ({ request, params }) => {
        actor = String(params.actor);
        token = new URL(request.url).searchParams.get("token");
        input = await request.json();
        return HttpResponse.json([
          { id: "dQw4w9WgXcQ", subtitles: [{ plaintext: "  " }, { srt: "Fallback captions" }] },
        ]);
      })
    );

    const result = await fetcher.fetchTranscript(videoUrl);

    expect(result).toEqual({ ok: true, text: "Fallback captions" });
    expect(actor).toBe("streamers~youtube-scraper");
    expect(token).toBe("test-apify-token");
    expect(input).toEqual({
      startUrls: [{ url: videoUrl }],
      downloadSubtitles: true,
      subtitlesFormat: "plaintext",
      subtitlesLanguage: "en",
      maxResults: 1,
    });
  });

  it("should use the default dataset handler", async () => {
    const result = await fetcher.fetchTranscript(videoUrl);
    expect(result).toEqual({ ok: true, text: "Hello and welcome to the show." });
  });

  it("should report videos without subtitles", async () => {
    server.use(errorHandlers.apifyNoSubtitles());
    expect(await fetcher.fetchTranscript(videoUrl)).toEqual({
      ok: false,
      error: "No subtitles found for this video",
    });
  });

  it("should report HTTP failures with the status", async () => {
    server.use(errorHandlers.apifyServerError());
    expect(await fetcher.fetchTranscript(videoUrl)).toEqual({
      ok: false,
      error: "Transcript service request failed (502)",
    });
  });

  it("should report unexpected payloads", async () => {
    server.use(http.post(APIFY_RUN_URL, () => HttpResponse.json({ items: "nope" })));
    expect(await fetcher.fetchTranscript(videoUrl)).toEqual({
      ok: false,
      error: "Unexpected response from transcript service",
    });
  });
});
