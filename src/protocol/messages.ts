import type {
  LanguageTag,
  RoutingDecision,
  SessionConfiguration,
  SessionMode,
  Side,
} from "../domain/types.js";
import { decideDirection } from "./direction.js";

export const WIRE_SAMPLE_RATE_HZ = 16000;

export const ClientMessageType = {
  sessionUpdate: "session.update",
  audioAppend: "input_audio_buffer.append",
  audioCommit: "input_audio_buffer.commit",
  sessionFinish: "session.finish",
} as const;

export const UpstreamEventType = {
  partialTranscript: "conversation.item.input_audio_transcription.text",
  completedTranscript: "conversation.item.input_audio_transcription.completed",
  sessionFinished: "session.finished",
  error: "error",
} as const;

export type SessionUpdatePayload = {
  mode?: SessionMode;
  side_a_lang?: LanguageTag;
  side_b_lang?: LanguageTag;
  model?: string;
  input_audio_format?: "pcm";
  sample_rate?: number;
  input_audio_transcription?: { language?: LanguageTag };
};

export type SessionUpdateMessage = {
  type: typeof ClientMessageType.sessionUpdate;
  session: SessionUpdatePayload;
};

export type AudioAppendMessage = {
  type: typeof ClientMessageType.audioAppend;
  audio: string;
};

export type AudioCommitMessage = { type: typeof ClientMessageType.audioCommit };

export type SessionFinishMessage = { type: typeof ClientMessageType.sessionFinish };

export type ClientMessage =
  | SessionUpdateMessage
  | AudioAppendMessage
  | AudioCommitMessage
  | SessionFinishMessage;

export type RelayErrorCode =
  | "invalid_json"
  | "protocol_violation"
  | "missing_credentials"
  | "upstream_handshake_failed"
  | "upstream_transport_error";

export type RelayErrorMessage = {
  type: "error";
  error: { message: string; code?: RelayErrorCode; detail?: string };
};

export type SessionFinishedMessage = {
  type: typeof UpstreamEventType.sessionFinished;
  reason: string;
};

export type RoutingAnnotation = {
  ui_side: Side;
  ui_source_lang: LanguageTag;
  ui_target_lang: LanguageTag;
  ui_mode: SessionMode;
};

/** What the client session machine reads out of a relay frame. */
export type RelayEvent =
  | { readonly kind: "partial"; readonly text: string }
  | {
      readonly kind: "completed";
      readonly transcript: string;
      readonly language?: LanguageTag;
      readonly routing?: RoutingDecision;
      readonly mode?: SessionMode;
    }
  | { readonly kind: "finished"; readonly reason: string }
  | {
      readonly kind: "error";
      readonly message: string;
      readonly code?: string;
      readonly detail?: string;
    };

export type JsonObject = Record<string, unknown>;

export type TypedEnvelope = JsonObject & { type: string };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJsonObject(text: string): JsonObject | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return isJsonObject(parsed) ? parsed : null;
}

export type EnvelopeParse =
  | { readonly ok: true; readonly envelope: TypedEnvelope }
  | { readonly ok: false; readonly reason: "invalid_json" | "missing_type" };

export function parseClientEnvelope(text: string): EnvelopeParse {
  const parsed = parseJsonObject(text);
  if (!parsed) return { ok: false, reason: "invalid_json" };
  const type = parsed.type;
  if (typeof type !== "string" || type.length === 0) return { ok: false, reason: "missing_type" };
  return { ok: true, envelope: { ...parsed, type } };
}

export function isClientMessage(value: unknown): value is ClientMessage {
  if (!isJsonObject(value)) return false;
  switch (value.type) {
    case ClientMessageType.sessionUpdate:
      return isJsonObject(value.session);
    case ClientMessageType.audioAppend:
      return typeof value.audio === "string";
    case ClientMessageType.audioCommit:
    case ClientMessageType.sessionFinish:
      return true;
    default:
      return false;
  }
}

function pickLanguage(session: JsonObject, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (session[key] !== undefined) return session[key];
  }
  return undefined;
}

function isSessionMode(value: unknown): value is SessionMode {
  return value === "fixed_sides" || value === "auto_detect";
}

export type ConfigurationParse =
  | { readonly ok: true; readonly config: SessionConfiguration }
  | { readonly ok: false; readonly reason: string };

/**
 * Reads the session block of a `session.update`. Side languages also accept
 * the older `left_lang`/`right_lang` spellings.
 */
export function parseSessionConfiguration(
  message: JsonObject,
  defaultModel: string,
): ConfigurationParse {
  const session = message.session ?? {};
  if (!isJsonObject(session)) return { ok: false, reason: "session must be an object" };

  const mode = session.mode ?? "fixed_sides";
  if (!isSessionMode(mode)) {
    return { ok: false, reason: `Unsupported mode: ${String(mode)}` };
  }

  const sideA = pickLanguage(session, ["side_a_lang", "left_lang", "leftLang"]) ?? "zh";
  const sideB = pickLanguage(session, ["side_b_lang", "right_lang", "rightLang"]) ?? "en";
  if (typeof sideA !== "string" || sideA.trim().length === 0) {
    return { ok: false, reason: "side_a_lang must be a non-empty string" };
  }
  if (typeof sideB !== "string" || sideB.trim().length === 0) {
    return { ok: false, reason: "side_b_lang must be a non-empty string" };
  }

  const model = session.model ?? defaultModel;
  if (typeof model !== "string" || model.trim().length === 0) {
    return { ok: false, reason: "model must be a non-empty string" };
  }

  return {
    ok: true,
    config: { mode, sideALanguage: sideA.trim(), sideBLanguage: sideB.trim(), model: model.trim() },
  };
}

export function sessionUpdateMessage(
  config: SessionConfiguration,
  transcriptionLanguage?: LanguageTag,
): SessionUpdateMessage {
  const session: SessionUpdatePayload = {
    mode: config.mode,
    side_a_lang: config.sideALanguage,
    side_b_lang: config.sideBLanguage,
    model: config.model,
    input_audio_format: "pcm",
    sample_rate: WIRE_SAMPLE_RATE_HZ,
  };
  if (transcriptionLanguage) {
    session.input_audio_transcription = { language: transcriptionLanguage };
  }
  return { type: ClientMessageType.sessionUpdate, session };
}

export function audioAppendMessage(audioBase64: string): AudioAppendMessage {
  return { type: ClientMessageType.audioAppend, audio: audioBase64 };
}

export function audioCommitMessage(): AudioCommitMessage {
  return { type: ClientMessageType.audioCommit };
}

export function sessionFinishMessage(): SessionFinishMessage {
  return { type: ClientMessageType.sessionFinish };
}

export function relayError(
  message: string,
  code: RelayErrorCode,
  detail?: string,
): RelayErrorMessage {
  return detail === undefined
    ? { type: "error", error: { message, code } }
    : { type: "error", error: { message, code, detail } };
}

export function sessionFinished(reason: string): SessionFinishedMessage {
  return { type: UpstreamEventType.sessionFinished, reason };
}

export function annotateCompletedTranscript(
  event: JsonObject,
  config: SessionConfiguration,
): JsonObject & RoutingAnnotation {
  const detected = typeof event.language === "string" ? event.language : undefined;
  const decision = decideDirection(config.sideALanguage, config.sideBLanguage, detected);
  return {
    ...event,
    ui_side: decision.side,
    ui_source_lang: decision.sourceLanguage,
    ui_target_lang: decision.targetLanguage,
    ui_mode: config.mode,
  };
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function isSide(value: unknown): value is Side {
  return value === "A" || value === "B";
}

function readRouting(event: JsonObject): RoutingDecision | undefined {
  const side = event.ui_side;
  const sourceLanguage = readString(event.ui_source_lang);
  const targetLanguage = readString(event.ui_target_lang);
  if (!isSide(side) || !sourceLanguage || !targetLanguage) return undefined;
  return { side, sourceLanguage, targetLanguage };
}

export function parseRelayEvent(text: string): RelayEvent | null {
  const event = parseJsonObject(text);
  if (!event) return null;

  switch (event.type) {
    case UpstreamEventType.partialTranscript:
      return { kind: "partial", text: `${readString(event.text) ?? ""}${readString(event.stash) ?? ""}` };
    case UpstreamEventType.completedTranscript: {
      const mode = isSessionMode(event.ui_mode) ? event.ui_mode : undefined;
      return {
        kind: "completed",
        transcript: readString(event.transcript) ?? "",
        language: readString(event.language),
        routing: readRouting(event),
        mode,
      };
    }
    case UpstreamEventType.sessionFinished:
      return { kind: "finished", reason: readString(event.reason) ?? "" };
    case UpstreamEventType.error: {
      const body = isJsonObject(event.error) ? event.error : {};
      return {
        kind: "error",
        message: readString(body.message) ?? "Unknown relay error",
        code: readString(body.code),
        detail: readString(body.detail),
      };
    }
    default:
      return null;
  }
}
