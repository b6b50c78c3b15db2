import { WIRE_SAMPLE_RATE_HZ } from "../../protocol/messages.js";

export type InputFormat = {
  readonly sampleRateHz: number;
  readonly channels: number;
};

/** Planar float32 samples in [-1, 1], one array per channel. */
export type CaptureBuffer = {
  readonly frameLength: number;
  readonly channelData: readonly Float32Array[];
};

export const BYTES_PER_SAMPLE = 2;

/**
 * Converts native capture buffers to 16 kHz mono s16le. Linear interpolation
 * carries its read position and the previous buffer's last sample across
 * calls so consecutive windows join without a seam.
 */
export class PcmConverter {
  private readonly ratio: number;
  private position = 0;
  private tail = 0;

  public constructor(
    private readonly input: InputFormat,
    private readonly outputRateHz: number = WIRE_SAMPLE_RATE_HZ,
  ) {
    if (!Number.isFinite(input.sampleRateHz) || input.sampleRateHz <= 0) {
      throw new Error(`Invalid input sample rate: ${input.sampleRateHz}`);
    }
    if (!Number.isInteger(input.channels) || input.channels < 1) {
      throw new Error(`Invalid input channel count: ${input.channels}`);
    }
    this.ratio = input.sampleRateHz / outputRateHz;
  }

  /** Upper bound of output frames for an input window. */
  public capacityFor(frameLength: number): number {
    return Math.floor(frameLength / this.ratio) + 1;
  }

  public convert(buffer: CaptureBuffer): Buffer {
    const frames = buffer.frameLength;
    if (frames <= 0 || buffer.channelData.length === 0) return Buffer.alloc(0);

    const mono = this.downmix(buffer);
    const capacity = this.capacityFor(frames);
    const out = Buffer.alloc(capacity * BYTES_PER_SAMPLE);
    let written = 0;
    let pos = this.position;

    while (written < capacity) {
      const index = Math.floor(pos);
      if (index + 1 >= frames) break;
      const frac = pos - index;
      const left = index < 0 ? this.tail : (mono[index] ?? 0);
      const right = mono[index + 1] ?? 0;
      out.writeInt16LE(toInt16(left + (right - left) * frac), written * BYTES_PER_SAMPLE);
      written += 1;
      pos += this.ratio;
    }

    this.position = pos - frames;
    this.tail = mono[frames - 1] ?? 0;
    return out.subarray(0, written * BYTES_PER_SAMPLE);
  }

  private downmix(buffer: CaptureBuffer): Float32Array {
    const channels = buffer.channelData.slice(0, this.input.channels);
    const first = channels[0];
    if (channels.length === 1 && first) return first;

    const mono = new Float32Array(buffer.frameLength);
    for (const channel of channels) {
      for (let i = 0; i < buffer.frameLength; i += 1) {
        mono[i] = (mono[i] ?? 0) + (channel[i] ?? 0) / channels.length;
      }
    }
    return mono;
  }
}

export function toInt16(sample: number): number {
  const clamped = Math.max(-1, Math.min(1, sample));
  return Math.round(clamped * 0x7fff);
}
