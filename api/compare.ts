import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { parsePartNumberList } from "../services/catalogService.js";
import { buildComparisonWorkbook, defaultWorkbookFilename, workbookToBuffer } from "../services/excelService.js";
import { runComparisonPipeline, type PipelineDeps } from "../services/runComparisonPipeline.js";
import { sendError } from "./errors.js";

const compareBodySchema = z.object({
  partNumbers: z.union([z.array(z.string()), z.string()]),
  justify: z.boolean().optional()
});

const BAD_BODY = "Expected { partNumbers: string[] | string, justify?: boolean }";

function readCompareBody(body: unknown) {
  const parsed = compareBodySchema.safeParse(body);
  if (!parsed.success) return null;

  const { partNumbers, justify } = parsed.data;
  return {
    partNumbers: typeof partNumbers === "string" ? parsePartNumberList(partNumbers) : partNumbers,
    justify: justify ?? false
  };
}

export function compareHandler(deps: PipelineDeps = {}) {
  return async (req: Request, res: Response) => {
    try {
      const request = readCompareBody(req.body);
      if (!request) {
        res.status(400).json({ error: BAD_BODY });
        return;
      }

      const result = await runComparisonPipeline(request, deps);
      res.json(result);
    } catch (err) {
      sendError(res, "COMPARE ERROR:", err);
    }
  };
}

export function exportHandler(deps: PipelineDeps = {}) {
  return async (req: Request, res: Response) => {
    try {
      const request = readCompareBody(req.body);
      if (!request) {
        res.status(400).json({ error: BAD_BODY });
        return;
      }

      const result = await runComparisonPipeline(request, deps);
      const workbook = buildComparisonWorkbook([
        { name: "Comparison", table: result.table, justification: result.justification }
      ]);

      res.setHeader("Content-Type", "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet");
      res.setHeader("Content-Disposition", `attachment; filename="${defaultWorkbookFilename()}"`);
      res.send(workbookToBuffer(workbook));
    } catch (err) {
      sendError(res, "EXPORT ERROR:", err);
    }
  };
}

export function createCompareRouter(deps: PipelineDeps = {}) {
  const router = Router();
  router.post("/", compareHandler(deps));
  router.post("/export", exportHandler(deps));
  return router;
}
