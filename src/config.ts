import { isLogLevel, type LogLevel } from "./server/logger.js";

export type TtsProviderKind = "polly" | "stub";

export interface AppConfig {
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly upstreamApiKey?: string;
  readonly upstreamRealtimeUrl: string;
  readonly defaultRecognitionModel: string;
  readonly relayMaxPendingMessages: number;
  readonly translationApiKey?: string;
  readonly translationApiUrl: string;
  readonly translationModel: string;
  readonly translationTimeoutMs: number;
  readonly ttsProvider: TtsProviderKind;
  readonly awsRegion: string;
  readonly ttsTimeoutMs: number;
}

export const DEFAULT_REALTIME_URL = "wss://dashscope-intl.aliyuncs.com/api-ws/v1/realtime";
export const DEFAULT_RECOGNITION_MODEL = "qwen3-asr-flash-realtime";
export const DEFAULT_TRANSLATION_URL = "https://ark.cn-beijing.volces.com/api/v3/chat/completions";
export const DEFAULT_TRANSLATION_MODEL = "doubao-seed-1-6-flash-250828";

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: string, min = 1): number {
  const raw = env[key] ?? fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${key}: ${env[key]}`);
  }
  return value;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const port = Number(env.PORT ?? "8080");
  if (!Number.isFinite(port) || port < 0) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  const logLevel = env.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}`);
  }

  const upstreamRealtimeUrl = nonEmpty(env.REALTIME_ASR_WS_URL) ?? DEFAULT_REALTIME_URL;
  if (!/^wss?:\/\//.test(upstreamRealtimeUrl)) {
    throw new Error(`Invalid REALTIME_ASR_WS_URL: ${env.REALTIME_ASR_WS_URL}`);
  }

  const ttsProvider = env.TTS_PROVIDER ?? "polly";
  if (ttsProvider !== "polly" && ttsProvider !== "stub") {
    throw new Error(`Invalid TTS_PROVIDER: ${env.TTS_PROVIDER}`);
  }

  return {
    port,
    logLevel,
    // A missing key is reported per connection, not at startup.
    upstreamApiKey: nonEmpty(env.DASHSCOPE_API_KEY),
    upstreamRealtimeUrl,
    defaultRecognitionModel: nonEmpty(env.REALTIME_ASR_MODEL) ?? DEFAULT_RECOGNITION_MODEL,
    relayMaxPendingMessages: readPositiveInt(env, "RELAY_MAX_PENDING_MESSAGES", "256"),
    translationApiKey: nonEmpty(env.TRANSLATION_API_KEY),
    translationApiUrl: nonEmpty(env.TRANSLATION_API_URL) ?? DEFAULT_TRANSLATION_URL,
    translationModel: nonEmpty(env.TRANSLATION_MODEL) ?? DEFAULT_TRANSLATION_MODEL,
    translationTimeoutMs: readPositiveInt(env, "TRANSLATION_TIMEOUT_MS", "30000", 100),
    ttsProvider,
    awsRegion: env.AWS_REGION ?? "us-west-2",
    ttsTimeoutMs: readPositiveInt(env, "TTS_TIMEOUT_MS", "30000", 100),
  };
}
