import type { PipelineStore } from "../lib/pipeline-store.js";
import type { SheetRow, SheetRowSource } from "./sheet-rows.js";
import type { RowImportResult, VideoImporter } from "./importer.js";
import {
  STAGE_LABELS,
  type StageName,
  type StageProcessor,
  type StageStatus,
  type StageResult,
  stageFailure,
  errorMessage,
} from "../stages/types.js";

/** The one place the default run order is defined. */
export const PIPELINE_STAGE_ORDER: readonly StageName[] = [
  "transcript",
  "topicDiscovery",
  "clustering",
  "summary",
];

export type StageRegistry = Record<StageName, StageProcessor>;

export interface StageReport {
  stage: StageName;
  /** Status read before the stage ran */
  status: StageStatus;
  skipped: boolean;
  skipReason?: string;
  result?: StageResult;
  /** Status read after the stage ran */
  after?: StageStatus;
}

export interface ProjectRunReport {
  projectName: string;
  projectExists: boolean;
  stages: StageReport[];
}

export interface ImportRunReport {
  success: boolean;
  errorMessage?: string;
  rows: RowImportResult[];
  /** Sheet rows passed over because they had no project name */
  skippedRows: number[];
  markedRows: number;
  projects: ProjectRunReport[];
}

function describeStatus(status: StageStatus): string {
  return `${status.completedItems}/${status.totalItems} complete, ${status.needingItems} pending`;
}

export class PipelineOrchestrator {
  constructor(
    private readonly stages: StageRegistry,
    private readonly store: PipelineStore,
    private readonly importer: VideoImporter,
    private readonly rowSource: () => Promise<SheetRowSource>,
    readonly order: readonly StageName[] = PIPELINE_STAGE_ORDER
  ) {}

  /**
   * Run a single stage. A stage is attempted only when its own status reports
   * pending work, regardless of how earlier stages fared.
   */
  async runStage(projectName: string, stage: StageName): Promise<StageReport> {
    const processor = this.stages[stage];
    const label = STAGE_LABELS[stage];

    const status = await processor.getStatus(projectName);
    if (!status.projectExists) {
      const skipReason = status.errorMessage ?? `Project '${projectName}' not found`;
      console.warn(`[Orchestrator] ${label} skipped for ${projectName}: ${skipReason}`);
      return { stage, status, skipped: true, skipReason };
    }

    console.log(`[Orchestrator] ${label} for ${projectName}: ${describeStatus(status)}`);

    if (status.needingItems === 0) {
      const skipReason = status.isComplete ? "Already complete" : "Nothing to process";
      console.log(`[Orchestrator] ${label} skipped for ${projectName}: ${skipReason}`);
      return { stage, status, skipped: true, skipReason };
    }

    let result: StageResult;
    try {
      result = await processor.processProject(projectName);
    } catch (err) {
      console.error(`[Orchestrator] ${label} threw for ${projectName}:`, errorMessage(err));
      result = stageFailure(stage, projectName, errorMessage(err));
    }

    const after = await processor.getStatus(projectName);
    console.log(
      `[Orchestrator] ${label} finished for ${projectName}: ` +
        `${result.successfulCount} succeeded, ${result.failedCount} failed; ${describeStatus(after)}`
    );

    return { stage, status, skipped: false, result, after };
  }

  async runProject(projectName: string): Promise<ProjectRunReport> {
    const project = await this.store.findProjectByName(projectName);
    if (!project) {
      console.warn(`[Orchestrator] Project '${projectName}' not found`);
      return { projectName, projectExists: false, stages: [] };
    }

    console.log(`[Orchestrator] Processing project ${projectName}`);
    const stages: StageReport[] = [];
    for (const stage of this.order) {
      stages.push(await this.runStage(projectName, stage));
    }
    return { projectName, projectExists: true, stages };
  }

  async processExistingProjects(): Promise<ProjectRunReport[]> {
    const projects = await this.store.listProjects();
    console.log(`[Orchestrator] Processing ${projects.length} existing project(s)`);

    const reports: ProjectRunReport[] = [];
    for (const project of projects) {
      reports.push(await this.runProject(project.name));
    }
    return reports;
  }

  /**
   * Import unimported spreadsheet rows, mark the ones that succeeded, then run
   * the pipeline for every project touched by the import.
   */
  async importAndProcess(): Promise<ImportRunReport> {
    const report: ImportRunReport = {
      success: false,
      rows: [],
      skippedRows: [],
      markedRows: 0,
      projects: [],
    };

    let source: SheetRowSource;
    let rows: SheetRow[];
    try {
      source = await this.rowSource();
      rows = await source.getUnimportedRows();
    } catch (err) {
      console.error("[Orchestrator] Could not read spreadsheet:", errorMessage(err));
      return { ...report, errorMessage: `Could not read spreadsheet: ${errorMessage(err)}` };
    }

    console.log(`[Orchestrator] Found ${rows.length} unimported row(s)`);

    const importedRows: number[] = [];
    const importedProjects: string[] = [];

    for (const row of rows) {
      if (!row.projectName) {
        console.warn(`[Orchestrator] Row ${row.rowNumber} has no project name; skipped`);
        report.skippedRows.push(row.rowNumber);
        continue;
      }

      const result = await this.importer.importRow(row.projectName, row.videoUrls);
      report.rows.push(result);

      if (result.success) {
        importedRows.push(row.rowNumber);
        if (!importedProjects.includes(row.projectName)) {
          importedProjects.push(row.projectName);
        }
      } else {
        console.warn(`[Orchestrator] Row ${row.rowNumber} (${row.projectName}) failed: ${result.errorMessage}`);
      }
    }

    if (importedRows.length > 0) {
      try {
        report.markedRows = await source.markRowsImported(importedRows);
      } catch (err) {
        console.error("[Orchestrator] Failed to mark rows as imported:", errorMessage(err));
      }
    }

    for (const projectName of importedProjects) {
      report.projects.push(await this.runProject(projectName));
    }

    return { ...report, success: true };
  }
}
