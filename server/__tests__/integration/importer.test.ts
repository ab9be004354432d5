import { describe, it, expect, beforeAll, afterAll, afterEach, beforeEach } from "vitest";
import { http, HttpResponse } from "msw";
import { server } from "../mocks/server.js";
import { errorHandlers, YOUTUBE_VIDEOS_URL, YOUTUBE_CHANNELS_URL, youtubeVideo } from "../mocks/handlers.js";
import { MemoryStore } from "../helpers/memory-store.js";
import { VideoImporter } from "../../pipeline/importer.js";
import { YouTubeDataClient } from "../../lib/youtube-data.js";

beforeAll(() => server.listen({ onUnhandledRequest: "error" }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

describe("VideoImporter", () => {
  let store: MemoryStore;
  let importer: VideoImporter;

  beforeEach(() => {
    store = new MemoryStore();
    importer = new VideoImporter(store, new YouTubeDataClient("test-youtube-key"));
  });

  it("should create the project, channel and videos from a row", async () => {
    const result = await importer.importRow("Finance", [
      "https://www.youtube.com/watch?v=aaaaaaaaaaa",
      "",
      "https://youtu.be/bbbbbbbbbbb",
    ]);

    expect(result).toEqual({
      projectName: "Finance",
      success: true,
      projectCreated: true,
      videos: [
        { ytId: "aaaaaaaaaaa", title: "Video aaaaaaaaaaa", success: true, message: "Video created successfully" },
        { ytId: "bbbbbbbbbbb", title: "Video bbbbbbbbbbb", success: true, message: "Video created successfully" },
      ],
    });
    expect(store.projects[0]).toMatchObject({ name: "Finance", topic: "Project for Finance" });
    expect(store.channels).toHaveLength(1);
    expect(store.channels[0]).toMatchObject({
      ytId: "UC_test_channel",
      title: "Test Channel",
      thumbnailUrl: "https://yt3.ggpht.com/test-medium.jpg",
      videoCount: 42,
      subscriberCount: 12000,
    });
    expect(store.videos[0]).toMatchObject({
      ytId: "aaaaaaaaaaa",
      projectId: store.projects[0].id,
      channelId: store.channels[0].id,
      viewCount: 1500,
      likeCount: 120,
      commentCount: 8,
      durationSeconds: 750,
      thumbnailUrl: "https://i.ytimg.com/vi/aaaaaaaaaaa/hqdefault.jpg",
      publishedAt: new Date("2024-03-01T12:00:00Z"),
      rawTranscript: "",
    });
  });

  it("should move an existing video to the row's project without refetching it", async () => {
    const other = await store.seedProject("Other");
    await store.seedVideo(other, { ytId: "aaaaaaaaaaa", title: "Already here" });
    const requested: string[] = [];
    server.use(
      http.get(YOUTUBE_VIDEOS_URL, ({ request }) => {
        const ids = new URL(request.url).searchParams.get("id") ?? "";
        requested.push(ids);
        return HttpResponse.json({ items: ids.split(",").map((id) => youtubeVideo(id)) });
      })
    );

    const result = await importer.importRow("Finance", ["aaaaaaaaaaa", "ccccccccccc", "ccccccccccc"]);

    expect(requested).toEqual(["ccccccccccc"]);
    expect(result.videos.map((v) => [v.ytId, v.message])).toEqual([
      ["aaaaaaaaaaa", "Video already exists - updated project association"],
      ["ccccccccccc", "Video created successfully"],
    ]);
    const finance = await store.findProjectByName("Finance");
    expect(store.videos.find((v) => v.ytId === "aaaaaaaaaaa")?.projectId).toBe(finance?.id);
  });

  it("should reuse a known channel", async () => {
    await store.seedVideo(null, { ytId: "zzzzzzzzzzz" });
    server.use(
      http.get(YOUTUBE_CHANNELS_URL, () => HttpResponse.json({ error: "should not be called" }, { status: 500 }))
    );

    const result = await importer.importRow("Finance", ["aaaaaaaaaaa"]);

    expect(result.videos[0].success).toBe(true);
    expect(store.channels).toHaveLength(1);
  });

  it("should record unrecognized URLs and ids the API does not return", async () => {
    server.use(http.get(YOUTUBE_VIDEOS_URL, () => HttpResponse.json({ items: [] }), { once: true }));

    const result = await importer.importRow("Finance", ["https://vimeo.com/12345", "aaaaaaaaaaa"]);

    expect(result.success).toBe(true);
    expect(result.videos).toEqual([
      { ytId: "", title: "https://vimeo.com/12345", success: false, message: "Not a recognizable YouTube URL" },
      { ytId: "aaaaaaaaaaa", title: "aaaaaaaaaaa", success: false, message: "Video not found on YouTube" },
    ]);
    expect(store.videos).toHaveLength(0);
  });

  it("should fail the row when the metadata request fails", async () => {
    server.use(errorHandlers.youtubeForbidden());

    const result = await importer.importRow("Finance", ["aaaaaaaaaaa"]);

    expect(result.success).toBe(false);
    expect(result.projectCreated).toBe(true);
    expect(result.errorMessage).toMatch(
      /^Failed to retrieve video information from YouTube API: YouTube API videos request failed \(403\)/
    );
  });

  it("should reject rows without usable URLs", async () => {
    expect((await importer.importRow("Finance", ["", "  "])).errorMessage).toBe("No valid video URLs provided");
    expect((await importer.importRow("Finance", ["not a link"])).errorMessage).toBe(
      "No valid YouTube video IDs could be extracted from the provided URLs"
    );
    expect(store.projects).toHaveLength(0);
  });
});
