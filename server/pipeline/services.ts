import type { PipelineStore } from "../lib/pipeline-store.js";
import { DrizzleStore } from "../lib/drizzle-store.js";
import { createOpenAiGateway, type LlmGateway } from "../lib/llm-gateway.js";
import { YouTubeDataClient, type VideoMetadataSource } from "../lib/youtube-data.js";
import { ApifyTranscriptFetcher, type TranscriptFetcher } from "../lib/transcript-fetcher.js";
import { getDb } from "../db/index.js";
import { TranscriptStage } from "../stages/transcript.js";
import { TopicDiscoveryStage } from "../stages/topic-discovery.js";
import { SummaryStage } from "../stages/summary.js";
import { ClusteringStage } from "../stages/clustering.js";
import { ClusterAnalysisStage } from "../stages/cluster-analysis.js";
import { ScriptSynthesisStage } from "../stages/script-synthesis.js";
import { errorMessage, type StageName } from "../stages/types.js";
import { GoogleSheetRowSource, type SheetRowSource } from "./sheet-rows.js";
import { VideoImporter } from "./importer.js";
import { ClusterReport } from "./cluster-report.js";
import { PipelineOrchestrator, PIPELINE_STAGE_ORDER } from "./orchestrator.js";

export interface PipelineStages {
  transcript: TranscriptStage;
  topicDiscovery: TopicDiscoveryStage;
  summary: SummaryStage;
  clustering: ClusteringStage;
  clusterAnalysis: ClusterAnalysisStage;
  scriptSynthesis: ScriptSynthesisStage;
}

export interface PipelineServices {
  store: PipelineStore;
  stages: PipelineStages;
  importer: VideoImporter;
  clusterReport: ClusterReport;
  orchestrator: PipelineOrchestrator;
}

export interface PipelineDependencies {
  store: PipelineStore;
  llm: LlmGateway;
  youtube: VideoMetadataSource;
  transcripts: TranscriptFetcher;
  rowSource: () => Promise<SheetRowSource>;
  transcriptDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
  order?: readonly StageName[];
}

export function buildPipelineServices(deps: PipelineDependencies): PipelineServices {
  const stages: PipelineStages = {
    transcript: new TranscriptStage(deps.store, deps.transcripts, {
      delayMs: deps.transcriptDelayMs,
      sleep: deps.sleep,
    }),
    topicDiscovery: new TopicDiscoveryStage(deps.store, deps.llm),
    summary: new SummaryStage(deps.store, deps.llm),
    clustering: new ClusteringStage(deps.store, deps.llm),
    clusterAnalysis: new ClusterAnalysisStage(deps.store, deps.llm),
    scriptSynthesis: new ScriptSynthesisStage(deps.store, deps.llm, { clock: deps.clock }),
  };

  const importer = new VideoImporter(deps.store, deps.youtube);

  return {
    store: deps.store,
    stages,
    importer,
    clusterReport: new ClusterReport(deps.store),
    orchestrator: new PipelineOrchestrator(
      stages,
      deps.store,
      importer,
      deps.rowSource,
      deps.order ?? PIPELINE_STAGE_ORDER
    ),
  };
}

// Missing credentials only disable the stage that needs them
function unconfiguredLlm(reason: string): LlmGateway {
  return { complete: async () => ({ ok: false, error: reason }) };
}

function unconfiguredMetadataSource(reason: string): VideoMetadataSource {
  const fail = async (): Promise<never> => {
    throw new Error(reason);
  };
  return { getVideos: fail, getChannel: fail };
}

function unconfiguredTranscripts(reason: string): TranscriptFetcher {
  return { fetchTranscript: async () => ({ ok: false, error: reason }) };
}

function resolve<T>(label: string, build: () => T, fallback: (reason: string) => T): T {
  try {
    return build();
  } catch (err) {
    console.warn(`[Services] ${label} unavailable: ${errorMessage(err)}`);
    return fallback(errorMessage(err));
  }
}

function parseDelay(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const delay = Number.parseInt(value, 10);
  return Number.isFinite(delay) && delay >= 0 ? delay : undefined;
}

export function createPipelineServicesFromEnv(): PipelineServices {
  return buildPipelineServices({
    store: new DrizzleStore(getDb(), process.env.PIPELINE_ACTOR || "pipeline"),
    llm: resolve("OpenAI", createOpenAiGateway, unconfiguredLlm),
    youtube: resolve("YouTube Data API", () => YouTubeDataClient.fromEnv(), unconfiguredMetadataSource),
    transcripts: resolve("Apify", () => ApifyTranscriptFetcher.fromEnv(), unconfiguredTranscripts),
    rowSource: () => GoogleSheetRowSource.fromEnv(),
    transcriptDelayMs: parseDelay(process.env.TRANSCRIPT_FETCH_DELAY_MS),
  });
}
