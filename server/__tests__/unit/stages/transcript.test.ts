import { describe, it, expect, beforeEach } from "vitest";
import { MemoryStore } from "../../helpers/memory-store.js";
import { TranscriptStage, watchUrl } from "../../../stages/transcript.js";
import { FakeTranscripts } from "../../helpers/fakes.js";

describe("TranscriptStage", () => {
  let store: MemoryStore;
  let sleeps: number[];

  beforeEach(() => {
    store = new MemoryStore();
    sleeps = [];
  });

  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };

  it("should fetch and save transcripts for videos that have none", async () => {
    const project = await store.seedProject("Demo");
    await store.seedVideo(project, { ytId: "aaaaaaaaaaa", title: "First" });
    await store.seedVideo(project, { ytId: "bbbbbbbbbbb", title: "Second" });
    const fetcher = new FakeTranscripts({
      [watchUrl("aaaaaaaaaaa")]: { ok: true, text: "first transcript" },
      [watchUrl("bbbbbbbbbbb")]: { ok: true, text: "second" },
    });
    const stage = new TranscriptStage(store, fetcher, { delayMs: 250, sleep });

    const result = await stage.processProject("Demo");

    expect(result.success).toBe(true);
    expect(result.successfulCount).toBe(2);
    expect(result.items).toEqual([
      {
        id: "aaaaaaaaaaa",
        title: "First",
        success: true,
        message: "Transcript retrieved and saved successfully",
        metrics: { transcriptLength: 16 },
      },
      {
        id: "bbbbbbbbbbb",
        title: "Second",
        success: true,
        message: "Transcript retrieved and saved successfully",
        metrics: { transcriptLength: 6 },
      },
    ]);
    expect(fetcher.urls).toEqual([
      "https://www.youtube.com/watch?v=aaaaaaaaaaa",
      "https://www.youtube.com/watch?v=bbbbbbbbbbb",
    ]);
    // Only between fetches, not before the first
    expect(sleeps).toEqual([250]);
    expect(store.videos.map((v) => v.rawTranscript)).toEqual(["first transcript", "second"]);
  });

  it("should not refetch videos that already have a transcript", async () => {
    const project = await store.seedProject("Demo");
    await store.seedVideo(project, { ytId: "aaaaaaaaaaa", rawTranscript: "already here" });
    const fetcher = new FakeTranscripts({});
    const stage = new TranscriptStage(store, fetcher, { sleep });

    const status = await stage.getStatus("Demo");
    const result = await stage.processProject("Demo");

    expect(status).toMatchObject({ totalItems: 1, completedItems: 1, needingItems: 0, isComplete: true });
    expect(result).toMatchObject({ success: false, errorMessage: "No videos need transcripts" });
    expect(fetcher.urls).toEqual([]);
  });

  it("should record failures per item and keep the video eligible", async () => {
    const project = await store.seedProject("Demo");
    await store.seedVideo(project, { ytId: "aaaaaaaaaaa", title: "No captions" });
    await store.seedVideo(project, { ytId: "bbbbbbbbbbb", title: "Captioned" });
    const stage = new TranscriptStage(
      store,
      new FakeTranscripts({ [watchUrl("bbbbbbbbbbb")]: { ok: true, text: "words" } }),
      { sleep }
    );

    const result = await stage.processProject("Demo");

    expect(result.success).toBe(true);
    expect(result.failedCount).toBe(1);
    expect(result.items[0]).toEqual({
      id: "aaaaaaaaaaa",
      title: "No captions",
      success: false,
      message: "No subtitles found for this video",
      metrics: {},
    });
    expect(await stage.getStatus("Demo")).toMatchObject({ needingItems: 1, isComplete: false });
  });

  it("should report failure when every item fails", async () => {
    const project = await store.seedProject("Demo");
    await store.seedVideo(project, { ytId: "aaaaaaaaaaa" });
    const stage = new TranscriptStage(store, new FakeTranscripts({}), { sleep });

    const result = await stage.processProject("Demo");

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBeUndefined();
    expect(result.failedCount).toBe(1);
  });

  it("should report unknown projects without throwing", async () => {
    const stage = new TranscriptStage(store, new FakeTranscripts({}), { sleep });

    expect(await stage.getStatus("Nope")).toMatchObject({ projectExists: false, needingItems: 0 });
    expect(await stage.processProject("Nope")).toMatchObject({
      success: false,
      errorMessage: "Project 'Nope' not found",
    });
  });
});
