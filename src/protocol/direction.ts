import type { LanguageTag, RoutingDecision } from "../domain/types.js";

/**
 * Resolves which side spoke an utterance from the language the recognizer
 * reported. Precedence is exact A, exact B, prefix A, prefix B; an unknown
 * language stays attributed to side A but keeps the detected tag as source.
 */
export function decideDirection(
  sideALanguage: LanguageTag,
  sideBLanguage: LanguageTag,
  detectedLanguage: LanguageTag | undefined,
): RoutingDecision {
  const toB = { side: "A", sourceLanguage: sideALanguage, targetLanguage: sideBLanguage } as const;
  const toA = { side: "B", sourceLanguage: sideBLanguage, targetLanguage: sideALanguage } as const;

  if (!detectedLanguage) return toB;
  if (detectedLanguage === sideALanguage) return toB;
  if (detectedLanguage === sideBLanguage) return toA;
  if (detectedLanguage.startsWith(sideALanguage)) return toB;
  if (detectedLanguage.startsWith(sideBLanguage)) return toA;

  return { side: "A", sourceLanguage: detectedLanguage, targetLanguage: sideBLanguage };
}

/** Languages for a side the user picked explicitly. */
export function routeForSide(
  side: RoutingDecision["side"],
  sideALanguage: LanguageTag,
  sideBLanguage: LanguageTag,
): RoutingDecision {
  return side === "A"
    ? { side, sourceLanguage: sideALanguage, targetLanguage: sideBLanguage }
    : { side, sourceLanguage: sideBLanguage, targetLanguage: sideALanguage };
}
