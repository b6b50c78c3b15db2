import assert from "node:assert/strict";
import test from "node:test";
import { PcmConverter, toInt16, type CaptureBuffer } from "../client/audio/pcm-converter.js";
import { WIRE_SAMPLE_RATE_HZ, sessionUpdateMessage } from "../protocol/messages.js";

function constant(frames: number, value: number, channels = 1): CaptureBuffer {
  return {
    frameLength: frames,
    channelData: Array.from({ length: channels }, () => new Float32Array(frames).fill(value)),
  };
}

function samples(pcm: Buffer): number[] {
  const out: number[] = [];
  for (let offset = 0; offset < pcm.length; offset += 2) {
    out.push(pcm.readInt16LE(offset));
  }
  return out;
}

test("48 kHz input yields one output sample per three input frames", () => {
  const converter = new PcmConverter({ sampleRateHz: 48000, channels: 1 });
  const pcm = converter.convert(constant(4800, 0.5));

  assert.equal(pcm.length, 1600 * 2);
  assert.equal(pcm.readInt16LE(0), 16384);
  assert.equal(pcm.readInt16LE(pcm.length - 2), 16384);
});

test("consecutive windows carry the read position across buffers", () => {
  const converter = new PcmConverter({ sampleRateHz: 48000, channels: 1 });
  const sizes = [0, 1, 2].map(() => converter.convert(constant(1024, 0.1)).length / 2);

  assert.deepEqual(sizes, [341, 342, 341]);
  assert.equal(sizes.reduce((a, b) => a + b, 0), 1024);
});

test("the first sample of a window interpolates from the previous window's tail", () => {
  const converter = new PcmConverter({ sampleRateHz: 48000, channels: 1 });
  converter.convert(constant(1024, 0.25));
  const next = samples(converter.convert(constant(1024, -0.25)));

  assert.equal(next[0], 8192);
  assert.equal(next[1], -8192);
});

test("stereo input is averaged down to mono", () => {
  const converter = new PcmConverter({ sampleRateHz: 16000, channels: 2 });
  const pcm = converter.convert({
    frameLength: 4,
    channelData: [new Float32Array(4).fill(1), new Float32Array(4).fill(0)],
  });

  assert.deepEqual(samples(pcm), [16384, 16384, 16384]);
});

test("empty windows produce no output", () => {
  const converter = new PcmConverter({ sampleRateHz: 44100, channels: 1 });
  assert.equal(converter.convert(constant(0, 0)).length, 0);
});

test("capacityFor bounds the output of a window", () => {
  const converter = new PcmConverter({ sampleRateHz: 44100, channels: 1 });
  const pcm = converter.convert(constant(1024, 0));
  assert.ok(pcm.length / 2 <= converter.capacityFor(1024));
  assert.equal(converter.capacityFor(1024), 372);
});

test("invalid input formats are rejected", () => {
  assert.throws(() => new PcmConverter({ sampleRateHz: 0, channels: 1 }), /Invalid input sample rate: 0/);
  assert.throws(() => new PcmConverter({ sampleRateHz: 48000, channels: 0 }), /Invalid input channel count: 0/);
});

test("toInt16 clamps out-of-range samples", () => {
  assert.equal(toInt16(1.5), 32767);
  assert.equal(toInt16(-2), -32767);
  assert.equal(toInt16(0), 0);
});

test("the converter's default output rate is the rate announced in session.update", () => {
  const update = sessionUpdateMessage({
    mode: "fixed_sides",
    sideALanguage: "zh",
    sideBLanguage: "en",
    model: "m",
  });
  assert.equal(update.session.sample_rate, WIRE_SAMPLE_RATE_HZ);

  const converter = new PcmConverter({ sampleRateHz: WIRE_SAMPLE_RATE_HZ * 3, channels: 1 });
  assert.equal(converter.capacityFor(300), 101);
});
