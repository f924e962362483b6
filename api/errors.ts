import type { Response } from "express";
import { CatalogError, GenerationProtocolError, ValidationError, errorMessage } from "../services/errors.js";

export function statusFor(err: unknown): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof GenerationProtocolError || err instanceof CatalogError) return 502;
  return 500;
}

export function sendError(res: Response, tag: string, err: unknown) {
  const status = statusFor(err);
  if (status >= 500) {
    console.error(tag, err);
  }
  res.status(status).json({ error: errorMessage(err) || "Internal error" });
}
