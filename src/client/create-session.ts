import type { SessionPhase, Turn } from "../domain/types.js";
import type { Logger } from "../server/logger.js";
import { AudioPipeline, type AudioInputDevice } from "./audio/pipeline.js";
import { resolveClientConfig, type ClientConfigInput } from "./config.js";
import { RelaySpeechClient, RelayTranslationClient, type SpeechPlayback } from "./relay-clients.js";
import { makeRelayConnector } from "./relay-socket.js";
import { ConversationSession } from "./session-machine.js";

export type ConversationClientOptions = {
  readonly config: ClientConfigInput;
  readonly device: AudioInputDevice;
  readonly playback: SpeechPlayback;
  readonly logger: Logger;
  readonly onTurnChanged?: (turn: Turn) => void;
  readonly onPhaseChanged?: (phase: SessionPhase) => void;
};

/** Builds a session wired to a relay's realtime socket and HTTP endpoints. */
export function createConversationSession(opts: ConversationClientOptions): ConversationSession {
  const config = resolveClientConfig(opts.config);
  const http = { baseUrl: config.httpBaseUrl, timeoutMs: config.httpTimeoutMs };
  opts.logger.info("conversation client configured", {
    relayUrl: config.relayUrl,
    httpBaseUrl: config.httpBaseUrl,
    mode: config.mode,
  });

  return new ConversationSession({
    config,
    logger: opts.logger,
    audio: new AudioPipeline(opts.device, opts.logger),
    connect: makeRelayConnector({ url: config.relayUrl, connectTimeoutMs: config.connectTimeoutMs }),
    translator: new RelayTranslationClient(http),
    speech: new RelaySpeechClient(http, opts.playback, opts.logger),
    onTurnChanged: opts.onTurnChanged,
    onPhaseChanged: opts.onPhaseChanged,
  });
}
