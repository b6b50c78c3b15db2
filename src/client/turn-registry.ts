import { randomUUID } from "node:crypto";
import type {
  LanguageTag,
  RoutingDecision,
  Side,
  TranslationOutcome,
  Turn,
} from "../domain/types.js";

export type OpenTurnInput = {
  readonly side?: Side;
  readonly routing?: RoutingDecision;
};

export class TurnRegistry {
  private readonly turns = new Map<string, Turn>();
  private activeId: string | undefined;

  public constructor(private readonly makeId: () => string = randomUUID) {}

  /** Opens a turn and makes it the active one. Callers check `active()` first. */
  public open(input: OpenTurnInput = {}): Turn {
    if (this.activeId !== undefined) {
      throw new Error(`Turn ${this.activeId} is still active`);
    }
    const turn: Turn = {
      id: this.makeId(),
      createdAtMs: Date.now(),
      side: input.routing?.side ?? input.side,
      sourceLanguage: input.routing?.sourceLanguage,
      targetLanguage: input.routing?.targetLanguage,
      partialText: "",
      status: "open",
    };
    this.turns.set(turn.id, turn);
    this.activeId = turn.id;
    return turn;
  }

  public get(id: string): Turn | undefined {
    return this.turns.get(id);
  }

  public active(): Turn | undefined {
    return this.activeId === undefined ? undefined : this.turns.get(this.activeId);
  }

  public isActive(id: string): boolean {
    return this.activeId === id;
  }

  /**
   * The turn an event bound to `boundTurnId` belongs to: the active turn when
   * the ids still match, otherwise a new archived turn built from the event.
   */
  public resolveForEvent(boundTurnId: string, routing?: RoutingDecision): Turn {
    const active = this.active();
    if (active && active.id === boundTurnId) return active;

    const turn: Turn = {
      id: this.makeId(),
      createdAtMs: Date.now(),
      side: routing?.side,
      sourceLanguage: routing?.sourceLanguage,
      targetLanguage: routing?.targetLanguage,
      partialText: "",
      status: "completed",
    };
    this.turns.set(turn.id, turn);
    return turn;
  }

  public applyPartial(id: string, text: string): boolean {
    const turn = this.turns.get(id);
    if (!turn || turn.finalText !== undefined || turn.status === "abandoned") return false;
    turn.partialText = text;
    return true;
  }

  public applyFinal(
    id: string,
    transcript: string,
    detectedLanguage: LanguageTag | undefined,
    routing: RoutingDecision | undefined,
  ): Turn | undefined {
    const turn = this.turns.get(id);
    if (!turn || turn.finalText !== undefined) return undefined;
    turn.finalText = transcript;
    turn.partialText = "";
    turn.detectedLanguage = detectedLanguage;
    if (routing) {
      turn.side = routing.side;
      turn.sourceLanguage = routing.sourceLanguage;
      turn.targetLanguage = routing.targetLanguage;
    }
    return turn;
  }

  public markFinalizing(id: string): void {
    const turn = this.turns.get(id);
    if (turn && turn.status === "open") turn.status = "finalizing";
  }

  public complete(id: string): Turn | undefined {
    const turn = this.turns.get(id);
    if (!turn) return undefined;
    turn.status = "completed";
    this.release(id);
    return turn;
  }

  public abandon(id: string, reason: string): Turn | undefined {
    const turn = this.turns.get(id);
    if (!turn) return undefined;
    turn.status = "abandoned";
    turn.endReason = reason;
    this.release(id);
    return turn;
  }

  public setTranslation(id: string, outcome: TranslationOutcome): Turn | undefined {
    const turn = this.turns.get(id);
    if (!turn) return undefined;
    if (turn.translation && turn.translation.status !== "pending") return undefined;
    turn.translation = outcome;
    return turn;
  }

  /** Copies of every turn, oldest first. */
  public all(): Turn[] {
    return [...this.turns.values()]
      .sort((a, b) => a.createdAtMs - b.createdAtMs)
      .map((turn) => ({ ...turn }));
  }

  private release(id: string): void {
    if (this.activeId === id) this.activeId = undefined;
  }
}
