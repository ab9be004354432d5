import dotenv from "dotenv";
import path from "node:path";
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { createPipelineServicesFromEnv, type PipelineServices } from "./pipeline/services.js";
import { STAGE_LABELS, isStageName, type StageName } from "./stages/types.js";
import { validateEnv } from "./utils/validateEnv.js";
import {
  formatClusterAnalysis,
  formatClusterDetails,
  formatClusterOverview,
  formatImportRun,
  formatProjectRun,
  formatScriptList,
  formatStageReport,
} from "./pipeline/format.js";

dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config();

const MENU = [
  "",
  "1. Import new spreadsheet rows and run the full pipeline",
  "2. Process existing projects",
  "3. Run one stage for one project",
  "4. Show clusters",
  "5. Analyze clusters for a project",
  "6. Create a script for a project",
  "7. List scripts for a project",
  "0. Exit",
];

const STAGES = Object.keys(STAGE_LABELS).filter(isStageName);

function print(lines: string[]) {
  for (const line of lines) console.log(line);
}

async function chooseStage(rl: readline.Interface): Promise<StageName | null> {
  STAGES.forEach((stage, i) => console.log(`  ${i + 1}. ${STAGE_LABELS[stage]}`));
  const answer = (await rl.question("Stage: ")).trim();
  const byIndex = STAGES[Number.parseInt(answer, 10) - 1];
  if (byIndex) return byIndex;
  return isStageName(answer) ? answer : null;
}

async function runChoice(choice: string, rl: readline.Interface, services: PipelineServices) {
  const { orchestrator, clusterReport, stages } = services;

  switch (choice) {
    case "1":
      print(formatImportRun(await orchestrator.importAndProcess()));
      return;
    case "2":
      for (const report of await orchestrator.processExistingProjects()) {
        print(formatProjectRun(report));
      }
      return;
    case "3": {
      const projectName = (await rl.question("Project name: ")).trim();
      const stage = await chooseStage(rl);
      if (!stage) {
        console.log("Unknown stage");
        return;
      }
      print(formatStageReport(await orchestrator.runStage(projectName, stage)));
      return;
    }
    case "4": {
      print(formatClusterOverview(await clusterReport.summarizeProjects()));
      const projectName = (await rl.question("Project to expand (blank to skip): ")).trim();
      if (projectName) {
        print(formatClusterDetails(await clusterReport.getProjectClusters(projectName)));
      }
      return;
    }
    case "5": {
      const projectName = (await rl.question("Project name: ")).trim();
      const analysis = await stages.clusterAnalysis.analyzeProject(projectName);
      if (analysis.errorMessage) {
        console.log(`❌ ${analysis.errorMessage}`);
        return;
      }
      print(analysis.clusters.flatMap(formatClusterAnalysis));
      return;
    }
    case "6": {
      const projectName = (await rl.question("Project name: ")).trim();
      print(formatStageReport(await orchestrator.runStage(projectName, "scriptSynthesis")));
      return;
    }
    case "7": {
      const projectName = (await rl.question("Project name: ")).trim();
      const scripts = await stages.scriptSynthesis.listScripts(projectName);
      print(scripts ? formatScriptList(scripts) : [`Project '${projectName}' not found`]);
      return;
    }
    default:
      console.log("Unknown option");
  }
}

async function main() {
  validateEnv();
  const services = createPipelineServicesFromEnv();
  const rl = readline.createInterface({ input, output });

  try {
    for (;;) {
      print(MENU);
      const choice = (await rl.question("> ")).trim();
      if (choice === "0") break;

      try {
        await runChoice(choice, rl, services);
      } catch (error) {
        console.error("[CLI] Command failed:", error instanceof Error ? error.message : error);
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((error) => {
  console.error("[CLI] Fatal error:", error);
  process.exit(1);
});
