import type { TranslationProvider } from "../../domain/providers.js";
import type { LanguageTag, TranslationRequest } from "../../domain/types.js";
import { isJsonObject } from "../../protocol/messages.js";
import type { Logger } from "../../server/logger.js";

export class StubTranslationProvider implements TranslationProvider {
  public readonly name = "translation-stub";

  public async translate(request: TranslationRequest): Promise<string | null> {
    if (!request.text.trim()) return null;
    return request.text;
  }
}

export type ChatCompletionsOptions = {
  readonly apiKey: string;
  readonly endpoint: string;
  readonly model: string;
  readonly timeoutMs: number;
  readonly logger: Logger;
};

const displayNames = new Intl.DisplayNames(["en"], { type: "language" });

export function languageName(tag: LanguageTag): string {
  try {
    return displayNames.of(tag) ?? tag;
  } catch {
    return tag;
  }
}

export function buildTranslationPrompt(request: TranslationRequest): string {
  return [
    `Translate the following ${languageName(request.sourceLanguage)} text into ${languageName(
      request.targetLanguage,
    )}.`,
    "Reply with the translation only, without any explanation.",
    "",
    `Text: ${request.text}`,
    "",
    "Translation:",
  ].join("\n");
}

/** Translates through an OpenAI-compatible chat completions endpoint. */
export class ChatCompletionsTranslationProvider implements TranslationProvider {
  public readonly name = "chat-completions";

  public constructor(private readonly opts: ChatCompletionsOptions) {}

  public async translate(request: TranslationRequest): Promise<string | null> {
    if (!request.text.trim()) return null;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.timeoutMs);
    try {
      const response = await fetch(this.opts.endpoint, {
        method: "POST",
        signal: controller.signal,
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.opts.apiKey}`,
        },
        body: JSON.stringify({
          model: this.opts.model,
          stream: false,
          temperature: 0.1,
          max_tokens: 1024,
          messages: [{ role: "user", content: buildTranslationPrompt(request) }],
        }),
      });

      if (!response.ok) {
        const detail = await response.text().catch(() => "");
        this.opts.logger.warn("translation provider rejected request", {
          status: response.status,
          detail: detail.slice(0, 200),
        });
        return null;
      }

      const translated = readFirstChoice(await response.json());
      return translated ? translated : null;
    } catch (error) {
      this.opts.logger.warn("translation request failed", {
        error: error instanceof Error ? error.message : String(error),
        timedOut: controller.signal.aborted,
      });
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}

function readFirstChoice(data: unknown): string | undefined {
  if (!isJsonObject(data) || !Array.isArray(data.choices)) return undefined;
  const choice: unknown = data.choices[0];
  if (!isJsonObject(choice) || !isJsonObject(choice.message)) return undefined;
  const content = choice.message.content;
  return typeof content === "string" ? content.trim() : undefined;
}
