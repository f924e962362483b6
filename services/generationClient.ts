// services/generationClient.ts
import { once } from "node:events";
import { randomUUID } from "node:crypto";
import WebSocket from "ws";
import { loadConfig, type GenerationSettings } from "../config.js";
import type { GenerationData } from "../types.js";
import { GenerationProtocolError, errorMessage } from "./errors.js";
import {
  MAX_FRAME_BYTES,
  decodeFrame,
  frameText,
  generateRequest,
  initializeMessage,
  readyMessageSchema,
  successResultSchema,
  type ReadyMessage
} from "./generationProtocol.js";

export interface GenerationRequestOptions extends Partial<GenerationSettings> {
  requestId?: string;
  onReady?: (ready: ReadyMessage) => void;
}

export type GenerateFn = (prompt: string) => Promise<GenerationData>;

/**
 * Opens a connection, performs the initialize/ready handshake, sends one
 * `llm.generate` request and returns its data. The connection never carries
 * more than this one request, so responses need no id correlation.
 */
export async function sendLlmRequest(
  prompt: string,
  options: GenerationRequestOptions = {}
): Promise<GenerationData> {
  const { requestId, onReady, ...overrides } = options;
  const settings: GenerationSettings = { ...loadConfig().generation, ...overrides };

  const ws = new WebSocket(settings.url, { maxPayload: MAX_FRAME_BYTES });
  const frames = new FrameReader(ws);

  try {
    try {
      await once(ws, "open");
    } catch (err) {
      throw new GenerationProtocolError(`Unable to connect to ${settings.url}: ${errorMessage(err)}`);
    }

    // 1) handshake
    ws.send(JSON.stringify(initializeMessage(settings.clientName, settings.clientVersion)));

    const readyRaw = await frames.next();
    const ready = readyMessageSchema.safeParse(decodeFrame(readyRaw));
    if (!ready.success) {
      throw new GenerationProtocolError(
        `Unexpected handshake response: ${readyRaw}`,
        decodeFrame(readyRaw) ?? readyRaw
      );
    }
    onReady?.(ready.data);

    // 2) request
    ws.send(
      JSON.stringify(
        generateRequest(requestId ?? randomUUID(), {
          prompt,
          system: settings.system,
          model: settings.model,
          temperature: settings.temperature,
          format: settings.format
        })
      )
    );

    // 3) result
    const resultRaw = await frames.next();
    const result = successResultSchema.safeParse(decodeFrame(resultRaw));
    if (!result.success) {
      throw new GenerationProtocolError(
        `Server error: ${resultRaw}`,
        decodeFrame(resultRaw) ?? resultRaw
      );
    }

    return {
      text: result.data.data.text,
      usage: result.data.data.usage ?? {}
    };
  } finally {
    if (ws.readyState === WebSocket.OPEN) {
      ws.close();
    }
  }
}

/* -----------------------------
   Frame queue
----------------------------- */

interface Waiter {
  resolve: (frame: string) => void;
  reject: (err: GenerationProtocolError) => void;
}

class FrameReader {
  private readonly frames: string[] = [];
  private readonly waiters: Waiter[] = [];
  private failure: GenerationProtocolError | null = null;

  constructor(ws: WebSocket) {
    ws.on("message", (data: WebSocket.RawData) => this.push(frameText(data)));
    ws.on("error", (err: Error) => {
      this.fail(new GenerationProtocolError(`Connection error: ${err.message}`));
    });
    ws.on("close", (code: number) => {
      this.fail(new GenerationProtocolError(`Connection closed before a response (code ${code})`));
    });
  }

  next(): Promise<string> {
    const frame = this.frames.shift();
    if (frame !== undefined) return Promise.resolve(frame);
    if (this.failure) return Promise.reject(this.failure);

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private push(frame: string) {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
    } else {
      this.frames.push(frame);
    }
  }

  private fail(err: GenerationProtocolError) {
    if (this.failure) return;
    this.failure = err;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(err);
    }
  }
}
