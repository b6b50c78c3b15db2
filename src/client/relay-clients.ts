import { TranslationFailureError, describeError } from "../domain/errors.js";
import type { LanguageTag, SpeechAudio } from "../domain/types.js";
import { isJsonObject } from "../protocol/messages.js";
import type { Logger } from "../server/logger.js";

export interface TurnTranslator {
  translate(text: string, sourceLanguage: LanguageTag, targetLanguage: LanguageTag): Promise<string>;
}

export interface SpeechOutput {
  /** Fire-and-forget; failures never reach the caller. */
  speak(text: string, language: LanguageTag): void;
}

export type RelayHttpOptions = {
  readonly baseUrl: string;
  readonly timeoutMs: number;
};

async function postJson(
  opts: RelayHttpOptions,
  path: string,
  body: Record<string, unknown>,
): Promise<{ status: number; ok: boolean; payload: unknown }> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts.timeoutMs);
  try {
    const response = await fetch(new URL(path, opts.baseUrl), {
      method: "POST",
      signal: controller.signal,
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });
    let payload: unknown = undefined;
    try {
      payload = await response.json();
    } catch {
      payload = undefined;
    }
    return { status: response.status, ok: response.ok, payload };
  } finally {
    clearTimeout(timer);
  }
}

export class RelayTranslationClient implements TurnTranslator {
  public constructor(private readonly opts: RelayHttpOptions) {}

  public async translate(
    text: string,
    sourceLanguage: LanguageTag,
    targetLanguage: LanguageTag,
  ): Promise<string> {
    let result: Awaited<ReturnType<typeof postJson>>;
    try {
      result = await postJson(this.opts, "/api/v1/translate/text", {
        text,
        source_lang: sourceLanguage,
        target_lang: targetLanguage,
      });
    } catch (error) {
      throw new TranslationFailureError(`Translation request failed: ${describeError(error)}`);
    }

    if (!result.ok) {
      throw new TranslationFailureError(`Translation failed with status ${result.status}`, result.status);
    }
    const translation = isJsonObject(result.payload) ? result.payload.translation : undefined;
    if (typeof translation !== "string") {
      throw new TranslationFailureError("Translation response was malformed", result.status);
    }
    return translation;
  }
}

export type SpeechPlayback = (audio: SpeechAudio) => void;

export class RelaySpeechClient implements SpeechOutput {
  public constructor(
    private readonly opts: RelayHttpOptions,
    private readonly playback: SpeechPlayback,
    private readonly logger: Logger,
  ) {}

  public speak(text: string, language: LanguageTag): void {
    void this.synthesize(text, language);
  }

  /** Resolves to the audio handed to playback, or null when synthesis failed. */
  public async synthesize(text: string, language: LanguageTag): Promise<SpeechAudio | null> {
    try {
      const result = await postJson(this.opts, "/api/v1/tts", { text, lang: language });
      const audio = result.ok ? readSpeechAudio(result.payload) : null;
      if (!audio) {
        this.logger.warn("speech synthesis failed", { status: result.status, language });
        return null;
      }
      this.playback(audio);
      return audio;
    } catch (error) {
      this.logger.warn("speech synthesis request failed", { language, error: describeError(error) });
      return null;
    }
  }
}

function readSpeechAudio(payload: unknown): SpeechAudio | null {
  if (!isJsonObject(payload)) return null;
  const { audio_base64: audioBase64, sample_rate_hz: sampleRateHz, voice } = payload;
  if (typeof audioBase64 !== "string" || audioBase64.length === 0) return null;
  if (typeof sampleRateHz !== "number" || typeof voice !== "string") return null;
  return {
    encoding: "pcm_s16le",
    sampleRateHz,
    voice,
    payload: Buffer.from(audioBase64, "base64"),
  };
}
