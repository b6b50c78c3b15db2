import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { Server } from "node:http";
import { URL } from "node:url";
import { WebSocketServer } from "ws";
import type { TranslationProvider, TtsProvider } from "../domain/providers.js";
import { describeError } from "../domain/errors.js";
import { isJsonObject } from "../protocol/messages.js";
import { wireRelaySocket, type UpstreamSettings } from "../relay/bridge.js";
import type { Logger } from "./logger.js";

export const REALTIME_PATH = "/api/v1/asr/realtime";

const MAX_BODY_BYTES = 1024 * 1024;

class BodyTooLargeError extends Error {}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new BodyTooLargeError("request body too large");
    chunks.push(buf);
  }
  if (!chunks.length) return {};
  return JSON.parse(Buffer.concat(chunks).toString("utf8"));
}

function writeJson(res: ServerResponse, code: number, payload: unknown): void {
  res.statusCode = code;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(payload));
}

export type HttpServerOptions = {
  readonly translator: TranslationProvider;
  readonly tts: TtsProvider;
  readonly upstream: UpstreamSettings;
  readonly relayMaxPendingMessages: number;
};

export type RelayHttpServer = {
  readonly server: Server;
  readonly shutdown: () => Promise<void>;
};

export function startHttpServer(
  port: number,
  logger: Logger,
  opts: HttpServerOptions,
): RelayHttpServer {
  const realtimeWs = new WebSocketServer({ noServer: true });

  realtimeWs.on("connection", (ws) => {
    wireRelaySocket(ws, {
      logger,
      upstream: opts.upstream,
      maxPendingMessages: opts.relayMaxPendingMessages,
    });
  });

  const server = createServer(async (req, res) => {
    try {
      const method = req.method ?? "GET";
      const pathname = new URL(req.url ?? "/", "http://localhost").pathname;

      if (method === "GET" && pathname === "/health") {
        return writeJson(res, 200, { ok: true, service: "tandem-voice-relay" });
      }

      if (method === "POST" && pathname === "/api/v1/translate/text") {
        const payload = await readJsonBody(req);
        if (!validateTranslatePayload(payload)) {
          return writeJson(res, 400, {
            error: "Missing required fields: text, source_lang, target_lang",
          });
        }
        const started = Date.now();
        const translation = await opts.translator.translate({
          text: payload.text,
          sourceLanguage: payload.source_lang,
          targetLanguage: payload.target_lang,
        });
        if (translation === null) {
          return writeJson(res, 502, { error: "translation_failed", provider: opts.translator.name });
        }
        return writeJson(res, 200, { translation, timing: { total_ms: Date.now() - started } });
      }

      if (method === "POST" && pathname === "/api/v1/tts") {
        const payload = await readJsonBody(req);
        if (!validateTtsPayload(payload)) {
          return writeJson(res, 400, { error: "Missing required fields: text, lang" });
        }
        const audio = await opts.tts.synthesize({ text: payload.text, language: payload.lang });
        if (!audio) {
          return writeJson(res, 502, { error: "synthesis_failed", provider: opts.tts.name });
        }
        return writeJson(res, 200, {
          audio_base64: audio.payload.toString("base64"),
          encoding: audio.encoding,
          sample_rate_hz: audio.sampleRateHz,
          voice: audio.voice,
        });
      }

      writeJson(res, 404, { error: "not_found" });
    } catch (error) {
      if (error instanceof SyntaxError) {
        return writeJson(res, 400, { error: "invalid_json" });
      }
      if (error instanceof BodyTooLargeError) {
        return writeJson(res, 413, { error: "payload_too_large" });
      }
      logger.error("request failed", { error: describeError(error) });
      writeJson(res, 500, { error: "internal_error" });
    }
  });

  server.on("upgrade", (req, socket, head) => {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;

    if (pathname !== REALTIME_PATH) {
      logger.warn("rejecting upgrade", { pathname });
      socket.destroy();
      return;
    }

    realtimeWs.handleUpgrade(req, socket, head, (ws) => {
      realtimeWs.emit("connection", ws, req);
    });
  });

  server.listen(port, () => {
    logger.info("http server started", { port, realtimePath: REALTIME_PATH });
  });

  const shutdown = (): Promise<void> =>
    new Promise((resolve, reject) => {
      for (const client of realtimeWs.clients) {
        client.terminate();
      }
      realtimeWs.close();
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
      server.closeIdleConnections();
    });

  return { server, shutdown };
}

type TranslatePayload = {
  text: string;
  source_lang: string;
  target_lang: string;
};

type TtsPayload = {
  text: string;
  lang: string;
};

function isFilledString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function validateTranslatePayload(payload: unknown): payload is TranslatePayload {
  if (!isJsonObject(payload)) return false;
  return (
    isFilledString(payload.text) &&
    isFilledString(payload.source_lang) &&
    isFilledString(payload.target_lang)
  );
}

function validateTtsPayload(payload: unknown): payload is TtsPayload {
  if (!isJsonObject(payload)) return false;
  return isFilledString(payload.text) && isFilledString(payload.lang);
}
