import type { TtsProvider } from "../../domain/providers.js";
import type { LanguageTag, SpeechAudio, SpeechRequest } from "../../domain/types.js";
import type { Logger } from "../../server/logger.js";
import { PollyClient, SynthesizeSpeechCommand, type VoiceId } from "@aws-sdk/client-polly";

export const DEFAULT_POLLY_VOICE: VoiceId = "Joanna";

// Standard-engine voices keyed by primary language subtag.
const POLLY_VOICES: Readonly<Record<string, VoiceId>> = {
  zh: "Zhiyu",
  en: "Joanna",
  ja: "Mizuki",
  ko: "Seoyeon",
  es: "Lupe",
  fr: "Celine",
  de: "Marlene",
};

export function selectPollyVoice(language: LanguageTag): VoiceId {
  const primary = language.trim().toLowerCase().split(/[-_]/)[0] ?? "";
  return POLLY_VOICES[primary] ?? DEFAULT_POLLY_VOICE;
}

async function toBuffer(audioStream: unknown): Promise<Buffer> {
  if (!audioStream || typeof audioStream !== "object") {
    return Buffer.alloc(0);
  }

  if ("transformToByteArray" in audioStream && typeof audioStream.transformToByteArray === "function") {
    const bytes: unknown = await audioStream.transformToByteArray();
    return bytes instanceof Uint8Array ? Buffer.from(bytes) : Buffer.alloc(0);
  }

  if (Symbol.asyncIterator in audioStream) {
    const chunks: Buffer[] = [];
    for await (const chunk of audioStream as AsyncIterable<Uint8Array>) {
      chunks.push(Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }

  return Buffer.alloc(0);
}

export class StubPollyProvider implements TtsProvider {
  public readonly name = "aws-polly-stub";

  public async synthesize(request: SpeechRequest): Promise<SpeechAudio | null> {
    if (!request.text.trim()) return null;

    return {
      encoding: "pcm_s16le",
      sampleRateHz: 16000,
      voice: selectPollyVoice(request.language),
      payload: Buffer.from([0x00, 0x00, 0x00, 0x00]),
    };
  }
}

export type PollyOptions = {
  readonly region: string;
  readonly timeoutMs: number;
  readonly logger: Logger;
};

export class PollyStandardProvider implements TtsProvider {
  public readonly name = "aws-polly-standard";
  private readonly client: PollyClient;

  public constructor(private readonly opts: PollyOptions) {
    this.client = new PollyClient({ region: opts.region });
  }

  public async synthesize(request: SpeechRequest): Promise<SpeechAudio | null> {
    if (!request.text.trim()) return null;

    const voice = selectPollyVoice(request.language);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.timeoutMs);
    let payload: Buffer;
    try {
      const command = new SynthesizeSpeechCommand({
        Engine: "standard",
        OutputFormat: "pcm",
        SampleRate: "16000",
        Text: request.text,
        TextType: "text",
        VoiceId: voice,
      });
      const out = await this.client.send(command, { abortSignal: controller.signal });
      payload = await toBuffer(out.AudioStream);
    } catch (error) {
      this.opts.logger.warn("polly synthesis failed", {
        voice,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    } finally {
      clearTimeout(timer);
    }

    if (payload.length === 0) return null;

    return {
      encoding: "pcm_s16le",
      sampleRateHz: 16000,
      voice,
      payload,
    };
  }
}
