// services/generationProtocol.ts
import type WebSocket from "ws";
import { z } from "zod";

// Inbound frames up to 8 MiB; long generated text must not be truncated.
export const MAX_FRAME_BYTES = 2 ** 23;

export const GENERATE_METHOD = "llm.generate";

/* -----------------------------
   Client -> server
----------------------------- */

export const initializeMessageSchema = z.object({
  type: z.literal("initialize"),
  client: z.string(),
  version: z.string()
});

export const generateParamsSchema = z.object({
  prompt: z.string(),
  system: z.string(),
  model: z.string(),
  temperature: z.number(),
  format: z.string()
});

export const requestMessageSchema = z.object({
  type: z.literal("request"),
  id: z.string(),
  method: z.string(),
  params: z.unknown()
});

export const clientMessageSchema = z.discriminatedUnion("type", [
  initializeMessageSchema,
  requestMessageSchema
]);

export type InitializeMessage = z.infer<typeof initializeMessageSchema>;
export type GenerateParams = z.infer<typeof generateParamsSchema>;
export type RequestMessage = z.infer<typeof requestMessageSchema>;
export type ClientMessage = z.infer<typeof clientMessageSchema>;

/* -----------------------------
   Server -> client
----------------------------- */

// Only the type is checked; a missing server name is not a protocol violation.
export const readyMessageSchema = z.object({
  type: z.literal("ready"),
  server: z.string().optional(),
  capabilities: z.unknown()
});

export const generationDataSchema = z.object({
  text: z.string(),
  usage: z.record(z.unknown()).optional()
});

export const successResultSchema = z.object({
  type: z.literal("result"),
  ok: z.literal(true),
  data: generationDataSchema
});

export type ReadyMessage = z.infer<typeof readyMessageSchema>;

export interface ResultMessage {
  type: "result";
  id?: string;
  ok: boolean;
  data?: { text: string; usage: Record<string, unknown> };
  error?: string;
}

export interface ErrorMessage {
  type: "error";
  id?: string;
  error: string;
}

export type ServerMessage = ReadyMessage | ResultMessage | ErrorMessage;

/* -----------------------------
   Builders
----------------------------- */

export function initializeMessage(client: string, version: string): InitializeMessage {
  return { type: "initialize", client, version };
}

export function generateRequest(id: string, params: GenerateParams): RequestMessage {
  return { type: "request", id, method: GENERATE_METHOD, params };
}

/**
 * Frames are single UTF-8 JSON objects. Anything else decodes to undefined
 * so callers can surface the raw text instead.
 */
export function decodeFrame(raw: string): Record<string, unknown> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function frameText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}
