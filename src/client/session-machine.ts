import { describeError } from "../domain/errors.js";
import type {
  RoutingDecision,
  SessionConfiguration,
  SessionPhase,
  Side,
  TranslationOutcome,
  Turn,
} from "../domain/types.js";
import { decideDirection, routeForSide } from "../protocol/direction.js";
import {
  audioAppendMessage,
  audioCommitMessage,
  sessionFinishMessage,
  sessionUpdateMessage,
  type RelayEvent,
} from "../protocol/messages.js";
import type { Logger } from "../server/logger.js";
import type { AudioPipeline } from "./audio/pipeline.js";
import type { ClientConfig } from "./config.js";
import type { SpeechOutput, TurnTranslator } from "./relay-clients.js";
import type { RelayConnection, RelayConnector } from "./relay-socket.js";
import { SerialExecutor } from "./serial-executor.js";
import { TurnRegistry } from "./turn-registry.js";

export type ConversationSessionDeps = {
  readonly config: ClientConfig;
  readonly logger: Logger;
  readonly audio: AudioPipeline;
  readonly connect: RelayConnector;
  readonly translator: TurnTranslator;
  readonly speech?: SpeechOutput;
  readonly turns?: TurnRegistry;
  readonly onTurnChanged?: (turn: Turn) => void;
  readonly onPhaseChanged?: (phase: SessionPhase) => void;
};

type CompletedEvent = Extract<RelayEvent, { kind: "completed" }>;

/**
 * Hold-to-talk session. Gestures, relay events, audio frames and the finalize
 * timer all funnel through one serial executor, so state below is only ever
 * touched by one task at a time.
 */
export class ConversationSession {
  private readonly logger: Logger;
  private readonly executor: SerialExecutor;
  private readonly turns: TurnRegistry;
  private readonly inflight = new Set<Promise<void>>();
  private phase: SessionPhase = "idle";
  private connection: RelayConnection | undefined;
  private configSent = false;
  private finalizeTimer: NodeJS.Timeout | undefined;

  public constructor(private readonly deps: ConversationSessionDeps) {
    this.logger = deps.logger.child({ component: "conversation-session" });
    this.executor = new SerialExecutor(this.logger);
    this.turns = deps.turns ?? new TurnRegistry();
  }

  public getPhase(): SessionPhase {
    return this.phase;
  }

  public listTurns(): Turn[] {
    return this.turns.all();
  }

  public activeTurn(): Turn | undefined {
    const turn = this.turns.active();
    return turn ? { ...turn } : undefined;
  }

  /** Press on the control for `side`; auto-detect mode ignores the side. */
  public pressDown(side: Side = "A"): Promise<void> {
    return this.executor.run("pressDown", () => this.beginTurn(side));
  }

  public pressUp(): Promise<void> {
    return this.executor.run("pressUp", () => this.endRecording());
  }

  public dispose(): Promise<void> {
    return this.executor.run("dispose", () => {
      const active = this.turns.active();
      if (active) {
        this.abandonTurn(active.id, "disposed");
        return;
      }
      this.clearFinalizeTimer();
      this.closeConnection("terminate");
    });
  }

  /** Resolves when queued tasks and pending translations have all settled. */
  public async settled(): Promise<void> {
    do {
      await this.executor.drain();
      await Promise.all([...this.inflight]);
    } while (this.executor.pending() > 0 || this.inflight.size > 0);
  }

  private sessionConfiguration(): SessionConfiguration {
    const { mode, sideALanguage, sideBLanguage, model } = this.deps.config;
    return { mode, sideALanguage, sideBLanguage, model };
  }

  private async beginTurn(side: Side): Promise<void> {
    if (this.phase !== "idle") {
      this.logger.info("press ignored, turn in progress", {
        phase: this.phase,
        activeTurnId: this.turns.active()?.id,
      });
      return;
    }

    const { mode, sideALanguage, sideBLanguage } = this.deps.config;
    const turn =
      mode === "fixed_sides"
        ? this.turns.open({ routing: routeForSide(side, sideALanguage, sideBLanguage) })
        : this.turns.open();
    this.setPhase("awaiting");
    this.notify(turn);

    let connection: RelayConnection;
    try {
      connection = await this.openConnection(turn.id);
    } catch (error) {
      this.logger.warn("relay connect failed", { turnId: turn.id, error: describeError(error) });
      this.abandonTurn(turn.id, "relay_unreachable");
      return;
    }

    if (!this.configSent) {
      const language = mode === "fixed_sides" ? turn.sourceLanguage : undefined;
      connection.send(sessionUpdateMessage(this.sessionConfiguration(), language));
      this.configSent = true;
    }

    try {
      await this.deps.audio.start((frame) => {
        this.executor.dispatch("audioFrame", () => this.forwardFrame(turn.id, frame));
      });
    } catch (error) {
      this.logger.warn("audio capture unavailable", { turnId: turn.id, error: describeError(error) });
      this.abandonTurn(turn.id, "device_unavailable");
      return;
    }

    this.setPhase("recording");
    this.logger.debug("turn recording", { turnId: turn.id, side: turn.side });
  }

  private endRecording(): void {
    if (this.phase !== "recording") {
      this.logger.debug("release ignored", { phase: this.phase });
      return;
    }
    const turn = this.turns.active();
    if (!turn) {
      this.setPhase("idle");
      return;
    }

    this.deps.audio.stop();
    if (turn.finalText !== undefined) {
      this.finishTurn(turn.id);
      return;
    }

    this.connection?.send(audioCommitMessage());
    this.connection?.send(sessionFinishMessage());
    this.turns.markFinalizing(turn.id);
    this.setPhase("finalizing");
    this.notify(turn);
    this.armFinalizeTimer(turn.id);
  }

  private async openConnection(turnId: string): Promise<RelayConnection> {
    this.closeConnection();
    const connection = await this.deps.connect({
      onEvent: (event) => {
        this.executor.dispatch(`relay:${event.kind}`, () => this.handleRelayEvent(turnId, event));
      },
      onClose: (code, reason) => {
        this.executor.dispatch("relay:close", () =>
          this.handleRelayEnded(turnId, `relay_closed:${code}${reason ? `:${reason}` : ""}`),
        );
      },
      onError: (error) => {
        this.logger.warn("relay socket error", { turnId, error: error.message });
      },
    });
    this.connection = connection;
    return connection;
  }

  private closeConnection(mode: "close" | "terminate" = "close"): void {
    const connection = this.connection;
    this.connection = undefined;
    this.configSent = false;
    if (mode === "terminate") connection?.terminate();
    else connection?.close();
  }

  private forwardFrame(turnId: string, frame: string): void {
    if (this.phase !== "recording" || !this.turns.isActive(turnId)) return;
    this.connection?.send(audioAppendMessage(frame));
  }

  private handleRelayEvent(turnId: string, event: RelayEvent): void {
    switch (event.kind) {
      case "partial":
        if (this.turns.isActive(turnId) && this.turns.applyPartial(turnId, event.text)) {
          const turn = this.turns.get(turnId);
          if (turn) this.notify(turn);
        }
        return;
      case "completed":
        this.applyCompleted(turnId, event);
        return;
      case "finished":
        this.handleRelayEnded(turnId, `session_finished${event.reason ? `:${event.reason}` : ""}`);
        return;
      case "error":
        this.logger.warn("relay reported error", {
          turnId,
          message: event.message,
          code: event.code,
          detail: event.detail,
        });
        this.handleRelayEnded(turnId, `relay_error:${event.code ?? "unknown"}`);
        return;
    }
  }

  private routingFor(turnId: string, event: CompletedEvent): RoutingDecision | undefined {
    const { mode, sideALanguage, sideBLanguage } = this.deps.config;
    if (mode === "fixed_sides" && this.turns.isActive(turnId)) return undefined;
    return event.routing ?? decideDirection(sideALanguage, sideBLanguage, event.language);
  }

  private applyCompleted(turnId: string, event: CompletedEvent): void {
    const routing = this.routingFor(turnId, event);
    const target = this.turns.resolveForEvent(turnId, routing);
    const turn = this.turns.applyFinal(target.id, event.transcript, event.language, routing);
    if (!turn) {
      this.logger.debug("duplicate completed transcript ignored", { turnId: target.id });
      return;
    }
    this.notify(turn);

    if (this.turns.isActive(turn.id) && this.phase === "finalizing") {
      this.finishTurn(turn.id);
    }
    this.startTranslation(turn);
  }

  private handleRelayEnded(turnId: string, reason: string): void {
    if (!this.turns.isActive(turnId)) return;
    const turn = this.turns.get(turnId);
    if (turn?.finalText !== undefined) {
      if (this.phase === "recording") this.deps.audio.stop();
      this.finishTurn(turnId);
      return;
    }
    this.logger.info("turn abandoned", { turnId, reason });
    this.abandonTurn(turnId, reason);
  }

  private armFinalizeTimer(turnId: string): void {
    this.clearFinalizeTimer();
    this.finalizeTimer = setTimeout(() => {
      this.finalizeTimer = undefined;
      this.executor.dispatch("finalizeTimeout", () => this.onFinalizeTimeout(turnId));
    }, this.deps.config.finalizeTimeoutMs);
  }

  private clearFinalizeTimer(): void {
    if (this.finalizeTimer) {
      clearTimeout(this.finalizeTimer);
      this.finalizeTimer = undefined;
    }
  }

  private onFinalizeTimeout(turnId: string): void {
    if (this.phase !== "finalizing" || !this.turns.isActive(turnId)) return;
    this.logger.warn("finalize timed out", {
      turnId,
      timeoutMs: this.deps.config.finalizeTimeoutMs,
    });
    this.abandonTurn(turnId, "finalize_timeout");
  }

  private finishTurn(turnId: string): void {
    this.clearFinalizeTimer();
    this.closeConnection();
    const turn = this.turns.complete(turnId);
    this.setPhase("idle");
    if (turn) this.notify(turn);
  }

  private abandonTurn(turnId: string, reason: string): void {
    this.clearFinalizeTimer();
    if (this.deps.audio.isRunning()) this.deps.audio.stop();
    this.closeConnection("terminate");
    const turn = this.turns.abandon(turnId, reason);
    this.setPhase("idle");
    if (turn) this.notify(turn);
  }

  private startTranslation(turn: Turn): void {
    const text = turn.finalText?.trim();
    if (!text) return;
    const { sourceLanguage, targetLanguage } = turn;
    if (!sourceLanguage || !targetLanguage) {
      this.applyTranslation(turn.id, { status: "failed", reason: "unknown_direction" });
      return;
    }

    this.turns.setTranslation(turn.id, { status: "pending" });
    this.notify(turn);

    const task = this.deps.translator.translate(text, sourceLanguage, targetLanguage).then(
      (translated) => {
        this.executor.dispatch("translationDone", () =>
          this.applyTranslation(turn.id, { status: "done", text: translated }, targetLanguage),
        );
      },
      (error: unknown) => {
        this.logger.warn("translation failed", { turnId: turn.id, error: describeError(error) });
        this.executor.dispatch("translationFailed", () =>
          this.applyTranslation(turn.id, { status: "failed", reason: describeError(error) }),
        );
      },
    );
    const tracked = task.finally(() => {
      this.inflight.delete(tracked);
    });
    this.inflight.add(tracked);
  }

  private applyTranslation(turnId: string, outcome: TranslationOutcome, language?: string): void {
    const turn = this.turns.setTranslation(turnId, outcome);
    if (!turn) return;
    this.notify(turn);
    if (outcome.status === "done" && language && this.deps.config.speakTranslations) {
      this.deps.speech?.speak(outcome.text, language);
    }
  }

  private setPhase(next: SessionPhase): void {
    if (this.phase === next) return;
    this.logger.debug("phase change", { from: this.phase, to: next });
    this.phase = next;
    this.safely("onPhaseChanged", () => this.deps.onPhaseChanged?.(next));
  }

  private notify(turn: Turn): void {
    this.safely("onTurnChanged", () => this.deps.onTurnChanged?.({ ...turn }));
  }

  private safely(hook: string, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.warn("session observer failed", { hook, error: describeError(error) });
    }
  }
}
