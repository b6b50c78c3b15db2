export type Side = "A" | "B";

export type SessionMode = "fixed_sides" | "auto_detect";

/** BCP-47-ish tag as reported by the recognizer or picked by the user ("zh", "en-US"). */
export type LanguageTag = string;

export type SessionPhase = "idle" | "awaiting" | "recording" | "finalizing";

export type TurnStatus = "open" | "finalizing" | "completed" | "abandoned";

export interface SessionConfiguration {
  readonly mode: SessionMode;
  readonly sideALanguage: LanguageTag;
  readonly sideBLanguage: LanguageTag;
  readonly model: string;
}

export interface RoutingDecision {
  readonly side: Side;
  readonly sourceLanguage: LanguageTag;
  readonly targetLanguage: LanguageTag;
}

export type TranslationOutcome =
  | { readonly status: "pending" }
  | { readonly status: "done"; readonly text: string }
  | { readonly status: "failed"; readonly reason: string };

export interface Turn {
  readonly id: string;
  readonly createdAtMs: number;
  side?: Side;
  sourceLanguage?: LanguageTag;
  targetLanguage?: LanguageTag;
  partialText: string;
  finalText?: string;
  detectedLanguage?: LanguageTag;
  translation?: TranslationOutcome;
  status: TurnStatus;
  endReason?: string;
}

export interface SpeechRequest {
  readonly text: string;
  readonly language: LanguageTag;
}

export interface SpeechAudio {
  readonly encoding: "pcm_s16le";
  readonly sampleRateHz: number;
  readonly voice: string;
  readonly payload: Buffer;
}

export interface TranslationRequest {
  readonly text: string;
  readonly sourceLanguage: LanguageTag;
  readonly targetLanguage: LanguageTag;
}
