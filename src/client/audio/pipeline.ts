import { DeviceUnavailableError, describeError } from "../../domain/errors.js";
import type { Logger } from "../../server/logger.js";
import { PcmConverter, type CaptureBuffer, type InputFormat } from "./pcm-converter.js";

export const CAPTURE_WINDOW_FRAMES = 1024;

/**
 * Platform microphone. Taps are invoked on the device's own capture context,
 * strictly one after another.
 */
export interface AudioInputDevice {
  inputFormat(): InputFormat;
  installTap(windowFrames: number, tap: (buffer: CaptureBuffer) => void): void;
  removeTap(): void;
  start(): Promise<void> | void;
  stop(): void;
}

/** Receives one base64 s16le frame; must return without blocking. */
export type FrameSink = (audioBase64: string) => void;

export class AudioPipeline {
  private running = false;
  private emitted = 0;

  public constructor(
    private readonly device: AudioInputDevice,
    private readonly logger: Logger,
  ) {}

  public isRunning(): boolean {
    return this.running;
  }

  public framesEmitted(): number {
    return this.emitted;
  }

  public async start(onFrame: FrameSink): Promise<void> {
    try {
      const format = this.device.inputFormat();
      const converter = new PcmConverter(format);
      this.device.installTap(CAPTURE_WINDOW_FRAMES, (buffer) => {
        const pcm = converter.convert(buffer);
        if (pcm.length === 0) return;
        this.emitted += 1;
        onFrame(pcm.toString("base64"));
      });
      await this.device.start();
      this.running = true;
      this.logger.debug("audio capture started", {
        nativeSampleRateHz: format.sampleRateHz,
        channels: format.channels,
      });
    } catch (error) {
      this.stop();
      throw new DeviceUnavailableError(`Audio input unavailable: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  public stop(): void {
    this.release("removeTap", () => this.device.removeTap());
    this.release("stop", () => this.device.stop());
    this.running = false;
  }

  private release(step: string, action: () => void): void {
    try {
      action();
    } catch (error) {
      this.logger.warn("audio device release failed", { step, error: describeError(error) });
    }
  }
}
