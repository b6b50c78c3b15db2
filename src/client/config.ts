import type { LanguageTag, SessionMode } from "../domain/types.js";
import { DEFAULT_RECOGNITION_MODEL } from "../config.js";

export interface ClientConfig {
  readonly relayUrl: string;
  readonly httpBaseUrl: string;
  readonly mode: SessionMode;
  readonly sideALanguage: LanguageTag;
  readonly sideBLanguage: LanguageTag;
  readonly model: string;
  readonly finalizeTimeoutMs: number;
  readonly connectTimeoutMs: number;
  readonly httpTimeoutMs: number;
  readonly speakTranslations: boolean;
}

export type ClientConfigInput = Partial<ClientConfig> & Pick<ClientConfig, "relayUrl">;

function requireTimeout(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return value;
}

/** Derives the HTTP origin of the relay from its websocket URL. */
export function httpBaseFromRelayUrl(relayUrl: string): string {
  const url = new URL(relayUrl);
  url.protocol = url.protocol === "wss:" ? "https:" : "http:";
  return url.origin;
}

export function resolveClientConfig(input: ClientConfigInput): ClientConfig {
  let relay: URL;
  try {
    relay = new URL(input.relayUrl);
  } catch {
    throw new Error(`Invalid relayUrl: ${input.relayUrl}`);
  }
  if (relay.protocol !== "ws:" && relay.protocol !== "wss:") {
    throw new Error(`Invalid relayUrl: ${input.relayUrl}`);
  }

  const sideALanguage = input.sideALanguage?.trim() || "zh";
  const sideBLanguage = input.sideBLanguage?.trim() || "en";

  return {
    relayUrl: relay.toString(),
    httpBaseUrl: input.httpBaseUrl ?? httpBaseFromRelayUrl(input.relayUrl),
    mode: input.mode ?? "fixed_sides",
    sideALanguage,
    sideBLanguage,
    model: input.model ?? DEFAULT_RECOGNITION_MODEL,
    finalizeTimeoutMs: requireTimeout("finalizeTimeoutMs", input.finalizeTimeoutMs ?? 3000),
    connectTimeoutMs: requireTimeout("connectTimeoutMs", input.connectTimeoutMs ?? 5000),
    httpTimeoutMs: requireTimeout("httpTimeoutMs", input.httpTimeoutMs ?? 15000),
    speakTranslations: input.speakTranslations ?? true,
  };
}
