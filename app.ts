import express from "express";
import cors from "cors";
import { createBatchRouter, type BatchDeps } from "./api/batch.js";
import { createCompareRouter } from "./api/compare.js";
import type { PipelineDeps } from "./services/runComparisonPipeline.js";

export type AppDeps = PipelineDeps & BatchDeps;

export function createApp(deps: AppDeps = {}) {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "2mb" }));
  app.use(express.text({ type: ["text/csv", "text/plain"], limit: "2mb" }));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/compare", createCompareRouter(deps));
  app.use("/batch", createBatchRouter(deps));

  return app;
}
