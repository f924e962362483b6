import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { buildBatchWorkbookSheets, compareManualEntry, processBatch } from "../services/batchService.js";
import { fetchCatalogRecords } from "../services/catalogService.js";
import { parseCsv } from "../services/csvService.js";
import { buildComparisonWorkbook, defaultWorkbookFilename, workbookToBuffer } from "../services/excelService.js";
import { sendLlmRequest, type GenerateFn } from "../services/generationClient.js";
import type { BatchRow, ComponentSpecRecord } from "../types.js";
import { sendError } from "./errors.js";

export interface BatchDeps {
  generate?: GenerateFn;
  fetchRecords?: (partNumbers: string[]) => Promise<ComponentSpecRecord[]>;
}

const manualBodySchema = z.object({
  partNumbers: z.array(z.string())
});

const csvBodySchema = z.object({
  csv: z.string()
});

function readCsvText(body: unknown): string | null {
  if (typeof body === "string") return body;
  if (Buffer.isBuffer(body)) return body.toString("utf8");

  const parsed = csvBodySchema.safeParse(body);
  return parsed.success ? parsed.data.csv : null;
}

// Sends the 400 itself and returns null when the upload is unusable.
function readBatchRows(req: Request, res: Response): BatchRow[] | null {
  const csv = readCsvText(req.body);
  if (csv === null) {
    res.status(400).json({ error: "Expected a text/csv body or { csv: string }" });
    return null;
  }

  const rows = parseCsv(csv);
  if (rows.length === 0) {
    res.status(400).json({ error: "No valid component data found in the uploaded CSV." });
    return null;
  }
  return rows;
}

export function batchHandler(deps: BatchDeps = {}) {
  const generate = deps.generate ?? (prompt => sendLlmRequest(prompt));

  return async (req: Request, res: Response) => {
    try {
      const rows = readBatchRows(req, res);
      if (!rows) return;

      const results = await processBatch(rows, generate);
      res.json({ results });
    } catch (err) {
      sendError(res, "BATCH ERROR:", err);
    }
  };
}

export function batchExportHandler(deps: BatchDeps = {}) {
  const generate = deps.generate ?? (prompt => sendLlmRequest(prompt));
  const fetchRecords = deps.fetchRecords ?? (pns => fetchCatalogRecords(pns));

  return async (req: Request, res: Response) => {
    try {
      const rows = readBatchRows(req, res);
      if (!rows) return;

      const results = await processBatch(rows, generate);
      const workbook = buildComparisonWorkbook(await buildBatchWorkbookSheets(results, fetchRecords));

      res.setHeader("Content-Type", "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet");
      res.setHeader("Content-Disposition", `attachment; filename="${defaultWorkbookFilename()}"`);
      res.send(workbookToBuffer(workbook));
    } catch (err) {
      sendError(res, "BATCH EXPORT ERROR:", err);
    }
  };
}

export function manualHandler(deps: BatchDeps = {}) {
  const generate = deps.generate ?? (prompt => sendLlmRequest(prompt));

  return async (req: Request, res: Response) => {
    try {
      const parsed = manualBodySchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: "Expected { partNumbers: string[] }" });
        return;
      }

      const comparison = await compareManualEntry(parsed.data.partNumbers, generate);
      res.json(comparison);
    } catch (err) {
      sendError(res, "MANUAL COMPARE ERROR:", err);
    }
  };
}

export function createBatchRouter(deps: BatchDeps = {}) {
  const router = Router();
  router.post("/", batchHandler(deps));
  router.post("/export", batchExportHandler(deps));
  router.post("/manual", manualHandler(deps));
  return router;
}
