// services/generationServer.ts
import { once } from "node:events";
import WebSocket, { WebSocketServer } from "ws";
import type { GenerationData } from "../types.js";
import { errorMessage } from "./errors.js";
import {
  GENERATE_METHOD,
  MAX_FRAME_BYTES,
  clientMessageSchema,
  decodeFrame,
  frameText,
  generateParamsSchema,
  type GenerateParams,
  type RequestMessage,
  type ServerMessage
} from "./generationProtocol.js";

export interface TextGenerator {
  generate(params: GenerateParams): Promise<GenerationData>;
}

export interface GenerationServerOptions {
  generator: TextGenerator;
  name: string;
  port?: number;
  host?: string;
}

export interface RunningGenerationServer {
  port: number;
  url: string;
  close(): Promise<void>;
}

/* -----------------------------
   Per-connection session
----------------------------- */

/**
 * Serves one connection: `initialize` must come first and is answered with
 * `ready`; every later `request` gets exactly one reply. A `request` that
 * arrives before the handshake is rejected with an `error` frame.
 */
export function serveConnection(socket: WebSocket, generator: TextGenerator, name: string) {
  let ready = false;

  const send = (message: ServerMessage) => {
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(JSON.stringify(message));
    }
  };

  socket.on("message", (data: WebSocket.RawData) => {
    const frame = decodeFrame(frameText(data));
    const parsed = clientMessageSchema.safeParse(frame);

    if (!parsed.success) {
      send({
        type: "error",
        id: typeof frame?.id === "string" ? frame.id : undefined,
        error: frame ? "Unrecognised message" : "Frames must be JSON objects"
      });
      return;
    }

    const message = parsed.data;

    if (message.type === "initialize") {
      ready = true;
      send({
        type: "ready",
        server: name,
        capabilities: { methods: [GENERATE_METHOD], maxFrameBytes: MAX_FRAME_BYTES }
      });
      return;
    }

    if (!ready) {
      send({ type: "error", id: message.id, error: "initialize must precede request" });
      return;
    }

    handleRequest(message, generator).then(send, (err: unknown) => {
      console.error("GENERATION SERVER ERROR:", err);
      send({ type: "result", id: message.id, ok: false, error: errorMessage(err) });
    });
  });

  socket.on("error", (err: Error) => {
    console.error("GENERATION SOCKET ERROR:", err.message);
  });
}

async function handleRequest(message: RequestMessage, generator: TextGenerator): Promise<ServerMessage> {
  if (message.method !== GENERATE_METHOD) {
    return { type: "result", id: message.id, ok: false, error: `Unknown method: ${message.method}` };
  }

  const params = generateParamsSchema.safeParse(message.params);
  if (!params.success) {
    return {
      type: "result",
      id: message.id,
      ok: false,
      error: `Invalid params: ${params.error.issues.map(i => i.path.join(".") || "params").join(", ")}`
    };
  }

  const data = await generator.generate(params.data);
  return { type: "result", id: message.id, ok: true, data };
}

/* -----------------------------
   Server lifecycle
----------------------------- */

export async function startGenerationServer(
  options: GenerationServerOptions
): Promise<RunningGenerationServer> {
  const host = options.host ?? "127.0.0.1";
  const wss = new WebSocketServer({
    port: options.port ?? 0,
    host,
    maxPayload: MAX_FRAME_BYTES
  });

  wss.on("connection", socket => serveConnection(socket, options.generator, options.name));

  await once(wss, "listening");

  const address = wss.address();
  const port = typeof address === "object" && address !== null ? address.port : options.port ?? 0;

  return {
    port,
    url: `ws://${host}:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close(err => (err ? reject(err) : resolve()));
      })
  };
}
