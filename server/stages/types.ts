export type StageName =
  | "transcript"
  | "topicDiscovery"
  | "summary"
  | "clustering"
  | "clusterAnalysis"
  | "scriptSynthesis";

export const STAGE_LABELS: Record<StageName, string> = {
  transcript: "Transcript",
  topicDiscovery: "Topic Discovery",
  summary: "Summary",
  clustering: "Clustering",
  clusterAnalysis: "Cluster Analysis",
  scriptSynthesis: "Script Synthesis",
};

export function isStageName(value: string): value is StageName {
  return Object.prototype.hasOwnProperty.call(STAGE_LABELS, value);
}

export interface StageStatus {
  stage: StageName;
  projectName: string;
  projectExists: boolean;
  totalItems: number;
  completedItems: number;
  needingItems: number;
  isComplete: boolean;
  /** Stage-specific counters, e.g. totalTopics or latestVersion */
  details: Record<string, number>;
  /** Set when the status could not be read */
  errorMessage?: string;
}

export interface ItemOutcome {
  id: string;
  title: string;
  success: boolean;
  message: string;
  /** Output metrics such as transcriptLength or topicCount */
  metrics: Record<string, number>;
}

export interface StageResult {
  stage: StageName;
  projectName: string;
  /** True iff at least one item succeeded */
  success: boolean;
  /** Set when the run failed before any item was attempted */
  errorMessage?: string;
  successfulCount: number;
  failedCount: number;
  items: ItemOutcome[];
}

/** Shape shared by every pipeline stage. Neither method throws. */
export interface StageProcessor {
  readonly stage: StageName;
  getStatus(projectName: string): Promise<StageStatus>;
  processProject(projectName: string): Promise<StageResult>;
}

export function missingProjectStatus(
  stage: StageName,
  projectName: string,
  errorMessage?: string
): StageStatus {
  return {
    stage,
    projectName,
    projectExists: false,
    totalItems: 0,
    completedItems: 0,
    needingItems: 0,
    isComplete: false,
    details: {},
    ...(errorMessage ? { errorMessage } : {}),
  };
}

export function projectStatus(
  stage: StageName,
  projectName: string,
  totalItems: number,
  completedItems: number,
  details: Record<string, number> = {}
): StageStatus {
  const needingItems = totalItems - completedItems;
  return {
    stage,
    projectName,
    projectExists: true,
    totalItems,
    completedItems,
    needingItems,
    isComplete: needingItems === 0,
    details,
  };
}

export function stageFailure(stage: StageName, projectName: string, errorMessage: string): StageResult {
  return {
    stage,
    projectName,
    success: false,
    errorMessage,
    successfulCount: 0,
    failedCount: 0,
    items: [],
  };
}

export function stageResult(stage: StageName, projectName: string, items: ItemOutcome[]): StageResult {
  const successfulCount = items.filter((item) => item.success).length;
  return {
    stage,
    projectName,
    success: successfulCount > 0,
    successfulCount,
    failedCount: items.length - successfulCount,
    items,
  };
}

export function itemFailure(id: string, title: string, message: string): ItemOutcome {
  return { id, title, success: false, message, metrics: {} };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "Unknown error";
}
