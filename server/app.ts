import express, { ErrorRequestHandler } from "express";
import cors from "cors";
import { createPipelineRouter } from "./routes/pipeline.js";
import { accessCodeMiddleware } from "./middleware/auth.js";
import type { PipelineServices } from "./pipeline/services.js";

export function createApp(services: PipelineServices): express.Application {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  // Health check (no auth required)
  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api", accessCodeMiddleware);
  app.use("/api", createPipelineRouter(services));

  // Returns JSON instead of Express's default HTML error page
  const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
    const message = err instanceof Error ? err.message : "Internal server error";
    console.error("Server error:", message);

    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }

    res.status(500).json({ error: message || "Internal server error" });
  };

  app.use(errorHandler);

  return app;
}
