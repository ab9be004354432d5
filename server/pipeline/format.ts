import type { ItemOutcome, StageResult } from "../stages/types.js";
import { STAGE_LABELS } from "../stages/types.js";
import type { StageReport, ProjectRunReport, ImportRunReport } from "./orchestrator.js";
import type { ProjectClusterSummary, ProjectClusterDetails } from "./cluster-report.js";
import type { ClusterAnalysis } from "../stages/cluster-analysis.js";
import type { Script } from "../db/schema.js";
import { formatIsoDate, toDateSafe } from "../utils/dates.js";

// Console output for the interactive CLI. Each function returns lines; the caller prints them.

export function formatItem(item: ItemOutcome): string {
  return `  ${item.success ? "✅" : "❌"} ${item.title}: ${item.message}`;
}

export function formatStageResult(result: StageResult): string[] {
  const label = STAGE_LABELS[result.stage];
  if (result.errorMessage) {
    return [`${label}: ❌ ${result.errorMessage}`];
  }
  return [
    `${label}:`,
    ...result.items.map(formatItem),
    `  ${result.successfulCount} succeeded, ${result.failedCount} failed`,
  ];
}

export function formatStageReport(report: StageReport): string[] {
  if (report.skipped) {
    return [`${STAGE_LABELS[report.stage]}: skipped (${report.skipReason ?? "nothing to do"})`];
  }
  return report.result ? formatStageResult(report.result) : [];
}

export function formatProjectRun(report: ProjectRunReport): string[] {
  if (!report.projectExists) {
    return [`Project '${report.projectName}' not found`];
  }
  return [`=== ${report.projectName} ===`, ...report.stages.flatMap(formatStageReport)];
}

export function formatImportRun(report: ImportRunReport): string[] {
  if (!report.success) {
    return [`❌ ${report.errorMessage ?? "Import failed"}`];
  }

  const lines = [`Imported ${report.rows.filter((r) => r.success).length} of ${report.rows.length} row(s)`];
  for (const row of report.rows) {
    lines.push(`${row.success ? "✅" : "❌"} ${row.projectName}${row.errorMessage ? `: ${row.errorMessage}` : ""}`);
    for (const video of row.videos) {
      lines.push(`  ${video.success ? "✅" : "❌"} ${video.title}: ${video.message}`);
    }
  }
  if (report.skippedRows.length > 0) {
    lines.push(`Skipped rows without a project name: ${report.skippedRows.join(", ")}`);
  }
  lines.push(`Marked ${report.markedRows} row(s) as imported`);
  return [...lines, ...report.projects.flatMap(formatProjectRun)];
}

export function formatClusterOverview(projects: ProjectClusterSummary[]): string[] {
  if (projects.length === 0) return ["No projects found"];
  return projects.map(
    (p) =>
      `${p.projectName}: ${p.videoCount} video(s), ${p.clusteredTopics}/${p.totalTopics} topic(s) in ` +
      `${p.clusterCount} cluster(s) [${p.status}]`
  );
}

export function formatClusterDetails(details: ProjectClusterDetails): string[] {
  if (!details.projectExists) return [`Project '${details.projectName}' not found`];
  if (details.clusters.length === 0) return [`${details.projectName} has no clusters`];

  return details.clusters.flatMap((cluster) => [
    `${cluster.displayOrder}. ${cluster.name} (${cluster.topics.length} topic(s))`,
    `   ${cluster.description}`,
    ...cluster.topics.map((t) => `   - [${t.startTime}] ${t.title} (${t.videoTitle})`),
  ]);
}

export function formatClusterAnalysis(analysis: ClusterAnalysis): string[] {
  const lines = [`${analysis.success ? "✅" : "❌"} ${analysis.clusterName} (${analysis.topicCount} topic(s))`];
  if (analysis.readiness) {
    lines.push(
      `   Readiness ${analysis.readiness.overall_readiness_score}/10, type: ${analysis.readiness.cluster_type}`
    );
  }
  if (analysis.density) {
    lines.push(`   Density: ${analysis.density.overall_density}, load: ${analysis.density.cognitive_load}`);
  }
  if (analysis.structural) {
    lines.push(
      `   Structure: ${analysis.structural.total_structural_elements} element(s), anchor: ` +
        analysis.structural.primary_anchor_element
    );
  }
  for (const [kind, error] of Object.entries(analysis.failures)) {
    lines.push(`   ${kind} failed: ${error}`);
  }
  return lines;
}

/** Rows read over the Neon driver may carry `createdAt` as an ISO string. */
export type ScriptListEntry = Pick<Script, "version" | "title" | "totalTokens"> & {
  createdAt: Date | string | null;
};

export function formatScriptList(scripts: ScriptListEntry[]): string[] {
  if (scripts.length === 0) return ["No scripts yet"];
  return scripts.map((s) => {
    const created = toDateSafe(s.createdAt);
    const date = created ? formatIsoDate(created) : "unknown date";
    return `v${s.version} ${s.title} (${date}, ${s.totalTokens} tokens)`;
  });
}
