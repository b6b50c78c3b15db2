import type { AppConfig } from "../config.js";
import type { Logger } from "../server/logger.js";
import type { TranslationProvider, TtsProvider } from "../domain/providers.js";
import {
  ChatCompletionsTranslationProvider,
  StubTranslationProvider,
} from "./translation/chat-completions.js";
import { PollyStandardProvider, StubPollyProvider } from "./tts/polly.js";

export type ProviderBundle = {
  readonly translator: TranslationProvider;
  readonly tts: TtsProvider;
};

export function makeProviders(config: AppConfig, logger: Logger): ProviderBundle {
  const translator = config.translationApiKey
    ? new ChatCompletionsTranslationProvider({
        apiKey: config.translationApiKey,
        endpoint: config.translationApiUrl,
        model: config.translationModel,
        timeoutMs: config.translationTimeoutMs,
        logger,
      })
    : new StubTranslationProvider();

  const tts: TtsProvider =
    config.ttsProvider === "stub"
      ? new StubPollyProvider()
      : new PollyStandardProvider({
          region: config.awsRegion,
          timeoutMs: config.ttsTimeoutMs,
          logger,
        });

  logger.info("provider selection", {
    translation: translator.name,
    tts: tts.name,
    upstreamCredential: config.upstreamApiKey ? "present" : "missing",
  });

  return { translator, tts };
}
