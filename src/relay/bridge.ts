import { randomUUID } from "node:crypto";
import type { IncomingMessage } from "node:http";
import WebSocket from "ws";
import type { SessionConfiguration } from "../domain/types.js";
import { describeError } from "../domain/errors.js";
import type { Logger } from "../server/logger.js";
import {
  ClientMessageType,
  UpstreamEventType,
  annotateCompletedTranscript,
  parseClientEnvelope,
  parseJsonObject,
  parseSessionConfiguration,
  relayError,
  sessionFinished,
  type RelayErrorMessage,
  type SessionFinishedMessage,
} from "../protocol/messages.js";
import { rawDataToText } from "../protocol/ws-text.js";

export type UpstreamSettings = {
  readonly apiKey?: string;
  readonly realtimeUrl: string;
  readonly defaultModel: string;
};

export type RelayBridgeDeps = {
  readonly logger: Logger;
  readonly upstream: UpstreamSettings;
  readonly maxPendingMessages: number;
};

export type RelayBridgeSnapshot = {
  readonly connectionId: string;
  readonly config?: SessionConfiguration;
  readonly upstreamState: "none" | "connecting" | "open" | "closing" | "closed";
  readonly pendingMessages: number;
};

type OutboundToClient = RelayErrorMessage | SessionFinishedMessage | Record<string, unknown>;

export function upstreamUrlFor(settings: UpstreamSettings, model: string): string {
  const url = new URL(settings.realtimeUrl);
  url.searchParams.set("model", model);
  return url.toString();
}

/**
 * Bridges one client socket to at most one upstream recognition socket.
 * All mutable state for the connection lives on this object.
 */
export class RelayBridge {
  public readonly connectionId = randomUUID();
  private readonly logger: Logger;
  private config: SessionConfiguration | undefined;
  private upstream: WebSocket | undefined;
  private readonly pending: string[] = [];
  private handshakeFailed = false;
  private disposed = false;

  public constructor(
    private readonly client: WebSocket,
    private readonly deps: RelayBridgeDeps,
  ) {
    this.logger = deps.logger.child({ connectionId: this.connectionId });
  }

  public attach(): void {
    this.logger.info("client connected");
    this.client.on("message", (raw, isBinary) => {
      if (isBinary) {
        this.sendClient(relayError("Binary frames are not supported", "protocol_violation"));
        return;
      }
      this.handleClientText(rawDataToText(raw));
    });

    this.client.on("close", () => {
      this.logger.info("client closed");
      this.dispose();
    });

    this.client.on("error", (error) => {
      this.logger.warn("client socket error", { error: error.message });
    });
  }

  public snapshot(): RelayBridgeSnapshot {
    return {
      connectionId: this.connectionId,
      config: this.config,
      upstreamState: this.upstreamState(),
      pendingMessages: this.pending.length,
    };
  }

  public handleClientText(text: string): void {
    const parsed = parseClientEnvelope(text);
    if (!parsed.ok) {
      this.sendClient(
        parsed.reason === "invalid_json"
          ? relayError("Invalid JSON from client", "invalid_json")
          : relayError("Message type is required", "protocol_violation"),
      );
      return;
    }
    const { envelope } = parsed;

    if (!this.config) {
      if (envelope.type !== ClientMessageType.sessionUpdate) {
        this.logger.warn("message before session.update rejected", { type: envelope.type });
        this.sendClient(relayError("First message must be session.update", "protocol_violation"));
        return;
      }
      this.configure(envelope, text);
      return;
    }

    if (envelope.type === ClientMessageType.sessionUpdate) {
      this.sendClient(
        relayError("Session is already configured for this connection", "protocol_violation"),
      );
      return;
    }

    this.forwardUpstream(text);
  }

  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.pending.length = 0;
    const upstream = this.upstream;
    this.upstream = undefined;
    if (upstream && upstream.readyState !== WebSocket.CLOSED) {
      upstream.terminate();
    }
  }

  private configure(envelope: Record<string, unknown>, rawText: string): void {
    const parsed = parseSessionConfiguration(envelope, this.deps.upstream.defaultModel);
    if (!parsed.ok) {
      this.sendClient(relayError(`Invalid session.update: ${parsed.reason}`, "protocol_violation"));
      return;
    }

    const apiKey = this.deps.upstream.apiKey;
    if (!apiKey) {
      this.logger.error("upstream credential missing");
      this.sendClient(relayError("Missing upstream credential", "missing_credentials"));
      this.client.close(1011, "missing upstream credential");
      return;
    }

    this.config = parsed.config;
    this.openUpstream(apiKey, parsed.config, rawText);
  }

  private openUpstream(apiKey: string, config: SessionConfiguration, sessionUpdate: string): void {
    const url = upstreamUrlFor(this.deps.upstream, config.model);
    this.logger.info("connecting upstream", {
      model: config.model,
      mode: config.mode,
      sideALanguage: config.sideALanguage,
      sideBLanguage: config.sideBLanguage,
    });

    const upstream = new WebSocket(url, {
      headers: { Authorization: `Bearer ${apiKey}` },
    });
    this.upstream = upstream;

    upstream.on("unexpected-response", (_req, res: IncomingMessage) => {
      this.handshakeFailed = true;
      const chunks: Buffer[] = [];
      res.on("data", (chunk: Buffer) => chunks.push(chunk));
      res.on("end", () => {
        const body = Buffer.concat(chunks).toString("utf8");
        const status = res.statusCode ?? 0;
        this.logger.error("upstream handshake failed", { status, body });
        this.sendClient(
          relayError(`Upstream handshake failed: ${status}`, "upstream_handshake_failed", body),
        );
        upstream.terminate();
      });
    });

    upstream.on("open", () => {
      if (this.upstream !== upstream) return;
      this.logger.info("upstream open", { flushed: this.pending.length });
      upstream.send(sessionUpdate);
      for (const queued of this.pending.splice(0)) {
        upstream.send(queued);
      }
    });

    upstream.on("message", (data) => {
      this.sendClientText(this.mapUpstreamPayload(rawDataToText(data)));
    });

    upstream.on("close", (code, reason) => {
      const reasonText = reason.toString("utf8");
      this.logger.info("upstream closed", { code, reason: reasonText });
      this.sendClient(sessionFinished(reasonText));
      if (this.client.readyState === WebSocket.OPEN) {
        this.client.close();
      }
    });

    upstream.on("error", (error) => {
      if (this.handshakeFailed || this.disposed) {
        this.logger.debug("upstream error after teardown", { error: error.message });
        return;
      }
      this.logger.error("upstream transport error", { error: error.message });
      this.sendClient(relayError(`Upstream error: ${error.message}`, "upstream_transport_error"));
    });
  }

  private forwardUpstream(text: string): void {
    const upstream = this.upstream;
    if (!upstream) return;

    if (upstream.readyState === WebSocket.CONNECTING) {
      if (this.pending.length >= this.deps.maxPendingMessages) {
        this.logger.warn("pending queue full, dropping client message", {
          limit: this.deps.maxPendingMessages,
        });
        return;
      }
      this.pending.push(text);
      return;
    }

    if (upstream.readyState === WebSocket.OPEN) {
      upstream.send(text);
      return;
    }

    this.logger.debug("upstream not open, client message dropped", {
      readyState: upstream.readyState,
    });
  }

  private mapUpstreamPayload(text: string): string {
    const parsed = parseJsonObject(text);
    if (!parsed) return text;
    if (parsed.type !== UpstreamEventType.completedTranscript || !this.config) {
      return text;
    }
    try {
      const annotated = annotateCompletedTranscript(parsed, this.config);
      this.logger.debug("completed transcript routed", {
        language: parsed.language,
        side: annotated.ui_side,
        sourceLanguage: annotated.ui_source_lang,
        targetLanguage: annotated.ui_target_lang,
      });
      return JSON.stringify(annotated);
    } catch (error) {
      this.logger.error("failed to annotate upstream event", { error: describeError(error) });
      return text;
    }
  }

  private upstreamState(): RelayBridgeSnapshot["upstreamState"] {
    if (!this.upstream) return "none";
    switch (this.upstream.readyState) {
      case WebSocket.CONNECTING:
        return "connecting";
      case WebSocket.OPEN:
        return "open";
      case WebSocket.CLOSING:
        return "closing";
      default:
        return "closed";
    }
  }

  private sendClient(payload: OutboundToClient): void {
    this.sendClientText(JSON.stringify(payload));
  }

  private sendClientText(text: string): void {
    if (this.client.readyState !== WebSocket.OPEN) return;
    this.client.send(text, (error) => {
      if (error) this.logger.warn("send to client failed", { error: error.message });
    });
  }
}

export function wireRelaySocket(ws: WebSocket, deps: RelayBridgeDeps): RelayBridge {
  const bridge = new RelayBridge(ws, deps);
  bridge.attach();
  return bridge;
}
