import type { SpeechAudio, SpeechRequest, TranslationRequest } from "./types.js";

export interface TranslationProvider {
  readonly name: string;
  /** Resolves to null when the provider answered with nothing usable. */
  translate(request: TranslationRequest): Promise<string | null>;
}

export interface TtsProvider {
  readonly name: string;
  synthesize(request: SpeechRequest): Promise<SpeechAudio | null>;
}
