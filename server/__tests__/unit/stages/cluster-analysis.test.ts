import { describe, it, expect, beforeEach } from "vitest";
import { MemoryStore } from "../../helpers/memory-store.js";
import { FakeLlm, json, fail } from "../../helpers/fake-llm.js";
import { ClusterAnalysisStage, formatClusterData } from "../../../stages/cluster-analysis.js";
import type { CompletionRequest, CompletionResult } from "../../../lib/llm-gateway.js";
import type { Project } from "../../../db/schema.js";

const readiness = {
  overall_readiness_score: 8,
  narrative_completeness_score: 7,
  structural_coherence_score: 6,
  cluster_type: "Framework",
  key_strengths: ["Clear steps"],
  critical_gaps: [],
  missing_elements: ["Example"],
  script_usage_recommendation: "Use as the core section",
};

const density = {
  overall_density: "Medium",
  depth_breadth_ratio: "Balanced",
  recommended_script_pacing: "Steady",
  cognitive_load: "Moderate",
  topic_density_ratings: [{ topic_title: "Saving", density_level: "Light", information_type: "Practical" }],
  simplification_opportunities: [],
  pacing_implications: [],
};

const structural = {
  total_structural_elements: 3,
  primary_anchor_element: "Savings checklist",
  frameworks_and_models: [{ name: "50/30/20", completeness_score: 9, instructional_value: "High", description: "Split" }],
  hook_potential_elements: ["Surprising stat"],
  script_structure_suggestion: "Open with the stat",
  missing_structural_pieces: [],
};

// Answers each of the three analysis prompts by the JSON keys it documents
function byKind(replies: { readiness: CompletionResult; density: CompletionResult; structural: CompletionResult }) {
  return (request: CompletionRequest): CompletionResult => {
    if (request.userPrompt.includes("overall_readiness_score")) return replies.readiness;
    if (request.userPrompt.includes("overall_density")) return replies.density;
    return replies.structural;
  };
}

async function seedClusters(store: MemoryStore): Promise<Project> {
  const project = await store.seedProject("Money");
  const video = await store.seedVideo(project, { ytId: "aaaaaaaaaaa", title: "Lesson", rawTranscript: "Words." });
  const [one, two] = await store.seedTopics(video, ["One", "Two"]);
  one.blueprintElements = '["a","b"]';
  two.blueprintElements = "plain text";

  const basics = await store.createCluster(project.id, {
    clusterName: "Basics",
    clusterDescription: "Intro",
    displayOrder: 1,
  });
  await store.createAssignments(basics.id, [
    { transcriptTopicId: two.id, assignmentReason: "" },
    { transcriptTopicId: one.id, assignmentReason: "" },
  ]);
  await store.createCluster(project.id, { clusterName: "Unused", clusterDescription: "", displayOrder: 2 });
  return project;
}

describe("formatClusterData", () => {
  it("should describe the cluster and each topic in start-time order", async () => {
    const store = new MemoryStore();
    const project = await seedClusters(store);
    const [basics] = await store.listProjectClusters(project.id);

    expect(formatClusterData(basics)).toBe(
      [
        "CLUSTER: Basics",
        "DESCRIPTION: Intro",
        "DISPLAY ORDER: 1",
        "TOTAL TOPICS: 2",
        "",
        "TOPIC 1: One",
        "START TIME: 0:00",
        "VIDEO: Lesson",
        "SUMMARY: One summary",
        "CONTENT: One content",
        "BLUEPRINT ELEMENTS: a; b",
        "---",
        "TOPIC 2: Two",
        "START TIME: 1:00",
        "VIDEO: Lesson",
        "SUMMARY: Two summary",
        "CONTENT: Two content",
        "BLUEPRINT ELEMENTS: plain text",
        "---",
      ].join("\n")
    );
  });
});

describe("ClusterAnalysisStage", () => {
  let store: MemoryStore;
  let llm: FakeLlm;
  let stage: ClusterAnalysisStage;

  beforeEach(() => {
    store = new MemoryStore();
    llm = new FakeLlm();
    stage = new ClusterAnalysisStage(store, llm);
  });

  it("should run three analyses per cluster with topics", async () => {
    await seedClusters(store);
    llm.always(byKind({ readiness: json(readiness), density: json(density), structural: json(structural) }));

    const analysis = await stage.analyzeProject("Money");

    expect(llm.requests).toHaveLength(3);
    expect(analysis.success).toBe(true);
    expect(analysis.clusters).toHaveLength(1);
    expect(analysis.clusters[0]).toMatchObject({
      clusterName: "Basics",
      topicCount: 2,
      success: true,
      readiness: { overall_readiness_score: 8, cluster_type: "Framework" },
      density: { overall_density: "Medium", cognitive_load: "Moderate" },
      structural: { total_structural_elements: 3, step_by_step_processes: [] },
      failures: {},
    });
    for (const request of llm.requests) {
      expect(request.userPrompt).toContain("CLUSTER: Basics");
    }
  });

  it("should keep the other results when one analysis fails validation", async () => {
    await seedClusters(store);
    llm.always(
      byKind({
        readiness: json(readiness),
        density: json({ overall_density: "Medium" }),
        structural: json(structural),
      })
    );

    const result = await stage.processProject("Money");
    const analysis = await stage.analyzeProject("Money");

    expect(result.success).toBe(true);
    expect(result.items[0]).toMatchObject({
      title: "Basics",
      success: true,
      message: "Completed: readiness, structural; failed: density",
      metrics: { topicCount: 2, overallReadinessScore: 8, totalStructuralElements: 3 },
    });
    expect(analysis.clusters[0].density).toBeNull();
    expect(analysis.clusters[0].readiness).not.toBeNull();
    expect(analysis.clusters[0].failures.density).toMatch(/^AI response did not match content-density\/v1/);
  });

  it("should fail a cluster only when all three analyses fail", async () => {
    await seedClusters(store);
    llm.always(fail("AI request failed: down"));

    const result = await stage.processProject("Money");

    expect(result).toMatchObject({ success: false, successfulCount: 0, failedCount: 1 });
    expect(result.items[0].message).toBe(
      "All analyses failed: AI request failed: down; AI request failed: down; AI request failed: down"
    );
  });

  it("should count clusters with topics as pending work", async () => {
    await seedClusters(store);

    expect(await stage.getStatus("Money")).toMatchObject({
      totalItems: 2,
      completedItems: 1,
      needingItems: 1,
      details: { totalClusters: 2, analyzableClusters: 1, totalTopics: 2 },
    });
  });

  it("should fail without clusters that have topics", async () => {
    await store.seedProject("Empty");

    const result = await stage.processProject("Empty");

    expect(result.errorMessage).toBe("No clusters with topics found for this project");
    expect(llm.requests).toHaveLength(0);
    expect(await stage.analyzeProject("Nope")).toMatchObject({
      projectExists: false,
      errorMessage: "Project 'Nope' not found",
    });
  });
});
