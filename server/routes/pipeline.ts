import { Router, Request, Response } from "express";
import type { PipelineServices } from "../pipeline/services.js";
import { PIPELINE_STAGE_ORDER } from "../pipeline/orchestrator.js";
import {
  STAGE_LABELS,
  isStageName,
  errorMessage,
  type StageName,
  type StageStatus,
} from "../stages/types.js";

const ALL_STAGES = Object.keys(STAGE_LABELS).filter(isStageName);

export function createPipelineRouter(services: PipelineServices): Router {
  const router = Router();
  const { store, stages, orchestrator, clusterReport } = services;

  // List all projects
  router.get("/projects", async (_req: Request, res: Response) => {
    try {
      const projects = await store.listProjects();
      res.json({ projects });
    } catch (error) {
      console.error("Error listing projects:", error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  // Every stage's status for one project
  router.get("/projects/:name/status", async (req: Request, res: Response) => {
    try {
      const projectName = req.params.name;
      const statuses: StageStatus[] = [];
      for (const stage of ALL_STAGES) {
        statuses.push(await stages[stage].getStatus(projectName));
      }

      // A status check that threw is a store failure, not a missing project
      const failed = statuses.find((s) => s.errorMessage);
      if (failed?.errorMessage) {
        res.status(500).json({ error: failed.errorMessage });
        return;
      }

      if (statuses.every((s) => !s.projectExists)) {
        res.status(404).json({ error: `Project '${projectName}' not found` });
        return;
      }

      res.json({ projectName, order: PIPELINE_STAGE_ORDER, statuses });
    } catch (error) {
      console.error("Error reading project status:", error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  // Run a single stage
  router.post("/projects/:name/stages/:stage", async (req: Request, res: Response) => {
    try {
      const stageParam = req.params.stage;
      if (!isStageName(stageParam)) {
        res.status(400).json({
          error: `Unknown stage '${stageParam}'. Expected one of: ${ALL_STAGES.join(", ")}`,
        });
        return;
      }

      const stage: StageName = stageParam;
      const report = await orchestrator.runStage(req.params.name, stage);
      if (!report.status.projectExists) {
        res.status(404).json({ error: report.skipReason ?? "Project not found" });
        return;
      }

      res.json({ report });
    } catch (error) {
      console.error("Error running stage:", error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  // Run the configured stage order
  router.post("/projects/:name/pipeline", async (req: Request, res: Response) => {
    try {
      const report = await orchestrator.runProject(req.params.name);
      if (!report.projectExists) {
        res.status(404).json({ error: `Project '${req.params.name}' not found` });
        return;
      }
      res.json({ report });
    } catch (error) {
      console.error("Error running pipeline:", error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  // Import spreadsheet rows, then run the pipeline for imported projects
  router.post("/import", async (_req: Request, res: Response) => {
    try {
      const report = await orchestrator.importAndProcess();
      if (!report.success) {
        res.status(500).json({ error: report.errorMessage ?? "Import failed", report });
        return;
      }
      res.json({ report });
    } catch (error) {
      console.error("Error importing rows:", error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  // Cluster overview across projects
  router.get("/clusters", async (_req: Request, res: Response) => {
    try {
      const projects = await clusterReport.summarizeProjects();
      res.json({ projects });
    } catch (error) {
      console.error("Error building cluster overview:", error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  router.get("/projects/:name/clusters", async (req: Request, res: Response) => {
    try {
      const details = await clusterReport.getProjectClusters(req.params.name);
      if (!details.projectExists) {
        res.status(404).json({ error: `Project '${req.params.name}' not found` });
        return;
      }
      res.json(details);
    } catch (error) {
      console.error("Error listing clusters:", error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  // Transient: nothing is stored
  router.get("/projects/:name/cluster-analysis", async (req: Request, res: Response) => {
    try {
      const analysis = await stages.clusterAnalysis.analyzeProject(req.params.name);
      if (!analysis.projectExists) {
        res.status(404).json({ error: analysis.errorMessage ?? "Project not found" });
        return;
      }
      res.json(analysis);
    } catch (error) {
      console.error("Error analyzing clusters:", error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  router.get("/projects/:name/scripts", async (req: Request, res: Response) => {
    try {
      const scripts = await stages.scriptSynthesis.listScripts(req.params.name);
      if (!scripts) {
        res.status(404).json({ error: `Project '${req.params.name}' not found` });
        return;
      }
      res.json({ scripts });
    } catch (error) {
      console.error("Error listing scripts:", error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  // Flip a topic's selection flag
  router.patch("/topics/:id/selection", async (req: Request, res: Response) => {
    try {
      const topic = await stages.topicDiscovery.toggleTopicSelection(req.params.id);
      if (!topic) {
        res.status(404).json({ error: "Topic not found" });
        return;
      }
      res.json({ topic });
    } catch (error) {
      console.error("Error toggling topic selection:", error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  return router;
}
