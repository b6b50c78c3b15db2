import WebSocket from "ws";
import { RelayConnectError, describeError } from "../domain/errors.js";
import { parseRelayEvent, type ClientMessage, type RelayEvent } from "../protocol/messages.js";
import { rawDataToText } from "../protocol/ws-text.js";

export type RelayConnectionHandlers = {
  readonly onEvent: (event: RelayEvent) => void;
  readonly onClose: (code: number, reason: string) => void;
  readonly onError: (error: Error) => void;
};

export interface RelayConnection {
  send(message: ClientMessage): void;
  /** Closing handshake with 1000; used once a turn has its transcript. */
  close(): void;
  /** Drops the socket without waiting on the relay. */
  terminate(): void;
  isOpen(): boolean;
}

export type RelayConnector = (handlers: RelayConnectionHandlers) => Promise<RelayConnection>;

export type RelaySocketOptions = {
  readonly url: string;
  readonly connectTimeoutMs: number;
};

class WsRelayConnection implements RelayConnection {
  public constructor(private readonly ws: WebSocket) {}

  public send(message: ClientMessage): void {
    if (this.ws.readyState !== WebSocket.OPEN) return;
    this.ws.send(JSON.stringify(message));
  }

  public close(): void {
    if (this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.terminate();
      return;
    }
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.close(1000, "turn finished");
    }
  }

  public terminate(): void {
    if (this.ws.readyState !== WebSocket.CLOSED) this.ws.terminate();
  }

  public isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }
}

/** Connector that opens a `ws` socket to the relay's realtime path. */
export function makeRelayConnector(opts: RelaySocketOptions): RelayConnector {
  return (handlers) =>
    new Promise<RelayConnection>((resolve, reject) => {
      const ws = new WebSocket(opts.url);
      let state: "connecting" | "open" | "failed" = "connecting";

      const fail = (error: RelayConnectError): void => {
        if (state !== "connecting") return;
        state = "failed";
        clearTimeout(timer);
        reject(error);
      };

      const timer = setTimeout(() => {
        fail(new RelayConnectError(`Relay connect timed out after ${opts.connectTimeoutMs}ms`));
        ws.terminate();
      }, opts.connectTimeoutMs);

      ws.on("open", () => {
        if (state !== "connecting") return;
        state = "open";
        clearTimeout(timer);
        resolve(new WsRelayConnection(ws));
      });

      ws.on("message", (raw, isBinary) => {
        if (isBinary || state !== "open") return;
        const event = parseRelayEvent(rawDataToText(raw));
        if (event) handlers.onEvent(event);
      });

      ws.on("error", (error) => {
        if (state === "open") {
          handlers.onError(error);
          return;
        }
        fail(new RelayConnectError(`Relay connect failed: ${describeError(error)}`, { cause: error }));
      });

      ws.on("close", (code, reason) => {
        if (state === "open") {
          handlers.onClose(code, reason.toString("utf8"));
          return;
        }
        fail(new RelayConnectError(`Relay closed during connect: ${code}`));
      });
    });
}
