import assert from "node:assert/strict";
import test from "node:test";
import { setTimeout as delay } from "node:timers/promises";
import { AudioPipeline, type AudioInputDevice } from "../client/audio/pipeline.js";
import type { CaptureBuffer, InputFormat } from "../client/audio/pcm-converter.js";
import { resolveClientConfig, type ClientConfig } from "../client/config.js";
import type { SpeechOutput, TurnTranslator } from "../client/relay-clients.js";
import type {
  RelayConnection,
  RelayConnectionHandlers,
  RelayConnector,
} from "../client/relay-socket.js";
import { ConversationSession } from "../client/session-machine.js";
import { TurnRegistry } from "../client/turn-registry.js";
import { RelayConnectError, TranslationFailureError } from "../domain/errors.js";
import type { SessionPhase, Turn } from "../domain/types.js";
import type { ClientMessage, RelayEvent } from "../protocol/messages.js";
import { makeLogger } from "../server/logger.js";

class FakeRelay implements RelayConnection {
  public readonly sent: ClientMessage[] = [];
  public readonly endings: Array<"close" | "terminate"> = [];
  private open = true;

  public constructor(private readonly handlers: RelayConnectionHandlers) {}

  public send(message: ClientMessage): void {
    this.sent.push(message);
  }

  public close(): void {
    this.open = false;
    this.endings.push("close");
  }

  public terminate(): void {
    this.open = false;
    this.endings.push("terminate");
  }

  public isOpen(): boolean {
    return this.open;
  }

  public emit(event: RelayEvent): void {
    this.handlers.onEvent(event);
  }

  public types(): string[] {
    return this.sent.map((message) => message.type);
  }
}

class FakeMicrophone implements AudioInputDevice {
  public failStart = false;
  private tap: ((buffer: CaptureBuffer) => void) | undefined;

  public inputFormat(): InputFormat {
    return { sampleRateHz: 16000, channels: 1 };
  }

  public installTap(_windowFrames: number, tap: (buffer: CaptureBuffer) => void): void {
    this.tap = tap;
  }

  public removeTap(): void {
    this.tap = undefined;
  }

  public start(): void {
    if (this.failStart) throw new Error("no input device");
  }

  public stop(): void {}

  public speak(frames: number): void {
    this.tap?.({ frameLength: frames, channelData: [new Float32Array(frames).fill(0.25)] });
  }
}

type Harness = {
  session: ConversationSession;
  relays: FakeRelay[];
  microphone: FakeMicrophone;
  audio: AudioPipeline;
  spoken: Array<{ text: string; language: string }>;
  phases: SessionPhase[];
  updates: Turn[];
};

type HarnessOptions = {
  config?: Partial<ClientConfig>;
  translator?: TurnTranslator;
  connect?: RelayConnector;
};

function makeHarness(options: HarnessOptions = {}): Harness {
  const logger = makeLogger("error");
  const relays: FakeRelay[] = [];
  const microphone = new FakeMicrophone();
  const audio = new AudioPipeline(microphone, logger);
  const spoken: Array<{ text: string; language: string }> = [];
  const phases: SessionPhase[] = [];
  const updates: Turn[] = [];
  let nextId = 0;

  const speech: SpeechOutput = {
    speak: (text, language) => {
      spoken.push({ text, language });
    },
  };
  const translator: TurnTranslator = options.translator ?? {
    translate: async (text, _source, target) => `${target}:${text}`,
  };
  const connect: RelayConnector =
    options.connect ??
    (async (handlers) => {
      const relay = new FakeRelay(handlers);
      relays.push(relay);
      return relay;
    });

  const session = new ConversationSession({
    config: resolveClientConfig({
      ...options.config,
      relayUrl: "ws://relay.test/api/v1/asr/realtime",
    }),
    logger,
    audio,
    connect,
    translator,
    speech,
    turns: new TurnRegistry(() => `turn-${++nextId}`),
    onPhaseChanged: (phase) => phases.push(phase),
    onTurnChanged: (turn) => updates.push(turn),
  });

  return { session, relays, microphone, audio, spoken, phases, updates };
}

function relayAt(harness: Harness, index: number): FakeRelay {
  const relay = harness.relays[index];
  assert.ok(relay, `expected relay connection #${index}`);
  return relay;
}

function turnAt(harness: Harness, index: number): Turn {
  const turn = harness.session.listTurns()[index];
  assert.ok(turn, `expected turn #${index}`);
  return turn;
}

test("a fixed-sides turn records, finalizes, translates and speaks", async () => {
  const harness = makeHarness();
  const { session, microphone } = harness;

  await session.pressDown("B");
  assert.equal(session.getPhase(), "recording");
  const relay = relayAt(harness, 0);
  assert.deepEqual(relay.sent[0], {
    type: "session.update",
    session: {
      mode: "fixed_sides",
      side_a_lang: "zh",
      side_b_lang: "en",
      model: "qwen3-asr-flash-realtime",
      input_audio_format: "pcm",
      sample_rate: 16000,
      input_audio_transcription: { language: "en" },
    },
  });

  microphone.speak(1024);
  relay.emit({ kind: "partial", text: "hel" });
  await session.settled();
  assert.equal(session.activeTurn()?.partialText, "hel");

  await session.pressUp();
  assert.equal(session.getPhase(), "finalizing");
  assert.deepEqual(relay.types(), [
    "session.update",
    "input_audio_buffer.append",
    "input_audio_buffer.commit",
    "session.finish",
  ]);

  relay.emit({ kind: "completed", transcript: "hello", language: "en" });
  await session.settled();

  const turn = turnAt(harness, 0);
  assert.equal(session.getPhase(), "idle");
  assert.equal(turn.status, "completed");
  assert.equal(turn.side, "B");
  assert.equal(turn.finalText, "hello");
  assert.equal(turn.partialText, "");
  assert.deepEqual(turn.translation, { status: "done", text: "zh:hello" });
  assert.deepEqual(harness.spoken, [{ text: "zh:hello", language: "zh" }]);
  assert.deepEqual(relay.endings, ["close"]);
  assert.deepEqual(harness.phases, ["awaiting", "recording", "finalizing", "idle"]);
});

test("pressing again while a turn is in flight changes nothing", async () => {
  const harness = makeHarness();
  const { session } = harness;

  await session.pressDown("A");
  await session.pressDown("B");

  assert.equal(harness.relays.length, 1);
  assert.deepEqual(relayAt(harness, 0).types(), ["session.update"]);
  assert.equal(session.listTurns().length, 1);
  assert.equal(turnAt(harness, 0).side, "A");
  await session.dispose();
});

test("releasing while idle is ignored", async () => {
  const harness = makeHarness();

  await harness.session.pressUp();

  assert.equal(harness.session.getPhase(), "idle");
  assert.equal(harness.relays.length, 0);
  assert.deepEqual(harness.phases, []);
});

test("auto-detect turns take their direction from the relay annotation", async () => {
  const harness = makeHarness({ config: { mode: "auto_detect" } });
  const { session } = harness;

  await session.pressDown();
  const relay = relayAt(harness, 0);
  const update = relay.sent[0];
  assert.equal(update?.type, "session.update");
  if (update?.type === "session.update") {
    assert.equal(update.session.mode, "auto_detect");
    assert.equal(update.session.input_audio_transcription, undefined);
  }

  await session.pressUp();
  relay.emit({
    kind: "completed",
    transcript: "good morning",
    language: "en",
    routing: { side: "B", sourceLanguage: "en", targetLanguage: "zh" },
    mode: "auto_detect",
  });
  await session.settled();

  const turn = turnAt(harness, 0);
  assert.equal(turn.side, "B");
  assert.equal(turn.sourceLanguage, "en");
  assert.deepEqual(turn.translation, { status: "done", text: "zh:good morning" });
});

test("auto-detect falls back to the detected language without an annotation", async () => {
  const harness = makeHarness({ config: { mode: "auto_detect" } });
  const { session } = harness;

  await session.pressDown();
  await session.pressUp();
  relayAt(harness, 0).emit({ kind: "completed", transcript: "早上好", language: "zh-CN" });
  await session.settled();

  const turn = turnAt(harness, 0);
  assert.equal(turn.side, "A");
  assert.equal(turn.detectedLanguage, "zh-CN");
  assert.deepEqual(turn.translation, { status: "done", text: "en:早上好" });
});

test("finalize timeout abandons the turn and late transcripts become their own turn", async () => {
  const harness = makeHarness({ config: { finalizeTimeoutMs: 30 } });
  const { session } = harness;

  await session.pressDown("A");
  await session.pressUp();
  await delay(80);
  await session.settled();

  const abandoned = turnAt(harness, 0);
  assert.equal(abandoned.status, "abandoned");
  assert.equal(abandoned.endReason, "finalize_timeout");
  assert.equal(session.getPhase(), "idle");
  assert.deepEqual(relayAt(harness, 0).endings, ["terminate"]);

  relayAt(harness, 0).emit({ kind: "completed", transcript: "sorry I am late", language: "en" });
  await session.settled();

  assert.equal(session.listTurns().length, 2);
  const late = turnAt(harness, 1);
  assert.equal(late.status, "completed");
  assert.equal(late.finalText, "sorry I am late");
  assert.equal(late.side, "B");
  assert.deepEqual(late.translation, { status: "done", text: "zh:sorry I am late" });
  assert.equal(abandoned.finalText, undefined);
  assert.equal(session.activeTurn(), undefined);

  await session.pressDown("A");
  assert.equal(harness.relays.length, 2);
  await session.dispose();
});

test("a relay error before the transcript abandons the turn and stops capture", async () => {
  const harness = makeHarness();
  const { session } = harness;

  await session.pressDown("A");
  assert.equal(harness.audio.isRunning(), true);
  relayAt(harness, 0).emit({
    kind: "error",
    message: "Upstream handshake failed: 401",
    code: "upstream_handshake_failed",
    detail: "unauthorized",
  });
  await session.settled();

  const turn = turnAt(harness, 0);
  assert.equal(turn.status, "abandoned");
  assert.equal(turn.endReason, "relay_error:upstream_handshake_failed");
  assert.equal(harness.audio.isRunning(), false);
  assert.equal(session.getPhase(), "idle");
});

test("an unreachable relay abandons the turn", async () => {
  const harness = makeHarness({
    connect: async () => {
      throw new RelayConnectError("Relay connect timed out after 5000ms");
    },
  });

  await harness.session.pressDown("A");

  const turn = turnAt(harness, 0);
  assert.equal(turn.status, "abandoned");
  assert.equal(turn.endReason, "relay_unreachable");
  assert.equal(harness.session.getPhase(), "idle");
});

test("an unavailable microphone abandons the turn and closes the relay", async () => {
  const harness = makeHarness();
  harness.microphone.failStart = true;

  await harness.session.pressDown("A");

  const turn = turnAt(harness, 0);
  assert.equal(turn.endReason, "device_unavailable");
  assert.deepEqual(relayAt(harness, 0).endings, ["terminate"]);
  assert.equal(harness.session.getPhase(), "idle");
});

test("a transcript that lands while recording completes the turn on release", async () => {
  const harness = makeHarness();
  const { session } = harness;

  await session.pressDown("A");
  const relay = relayAt(harness, 0);
  relay.emit({ kind: "completed", transcript: "你好", language: "zh" });
  relay.emit({ kind: "partial", text: "你好吗" });
  await session.settled();

  assert.equal(session.getPhase(), "recording");
  assert.equal(session.activeTurn()?.partialText, "");

  await session.pressUp();

  assert.equal(session.getPhase(), "idle");
  assert.equal(turnAt(harness, 0).status, "completed");
  assert.deepEqual(relay.types(), ["session.update"]);
});

test("a failed translation is recorded on the turn and nothing is spoken", async () => {
  const harness = makeHarness({
    translator: {
      translate: async () => {
        throw new TranslationFailureError("Translation failed with status 502", 502);
      },
    },
  });
  const { session } = harness;

  await session.pressDown("A");
  await session.pressUp();
  relayAt(harness, 0).emit({ kind: "completed", transcript: "你好", language: "zh" });
  await session.settled();

  assert.deepEqual(turnAt(harness, 0).translation, {
    status: "failed",
    reason: "Translation failed with status 502",
  });
  assert.deepEqual(harness.spoken, []);
});

test("translations are not spoken when speech is turned off", async () => {
  const harness = makeHarness({ config: { speakTranslations: false } });
  const { session } = harness;

  await session.pressDown("A");
  await session.pressUp();
  relayAt(harness, 0).emit({ kind: "completed", transcript: "你好", language: "zh" });
  await session.settled();

  assert.deepEqual(turnAt(harness, 0).translation, { status: "done", text: "en:你好" });
  assert.deepEqual(harness.spoken, []);
});

test("observers receive copies of the turn as it changes", async () => {
  const harness = makeHarness();
  const { session } = harness;

  await session.pressDown("A");
  relayAt(harness, 0).emit({ kind: "partial", text: "你" });
  await session.settled();
  await session.dispose();

  assert.deepEqual(
    harness.updates.map((turn) => [turn.status, turn.partialText]),
    [
      ["open", ""],
      ["open", "你"],
      ["abandoned", "你"],
    ],
  );
  assert.equal(turnAt(harness, 0).endReason, "disposed");
});

test("turns handed to callers are copies that cannot rewrite session state", async () => {
  const harness = makeHarness();
  const { session } = harness;

  await session.pressDown("A");
  const active = session.activeTurn();
  assert.ok(active);
  active.partialText = "tampered";
  await session.pressUp();
  relayAt(harness, 0).emit({ kind: "completed", transcript: "你好", language: "zh" });
  await session.settled();

  const listed = turnAt(harness, 0);
  listed.finalText = "rewritten";
  assert.equal(turnAt(harness, 0).finalText, "你好");
  assert.equal(turnAt(harness, 0).partialText, "");
  assert.deepEqual(turnAt(harness, 0).translation, { status: "done", text: "en:你好" });
});
