import { describeError } from "../domain/errors.js";
import type { Logger } from "../server/logger.js";

type Task = () => unknown;

/**
 * Runs tasks one at a time in submission order. A task that returns a promise
 * holds the queue until it settles. Every mutation of client session state
 * goes through one instance.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private depth = 0;

  public constructor(private readonly logger: Logger) {}

  public dispatch(label: string, task: Task): void {
    this.depth += 1;
    this.tail = this.tail
      .then(task)
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error("serial task failed", { task: label, error: describeError(error) });
        },
      )
      .finally(() => {
        this.depth -= 1;
      });
  }

  public run<T>(label: string, task: () => T | Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.dispatch(label, async () => {
        try {
          resolve(await task());
        } catch (error) {
          reject(error);
        }
      });
    });
  }

  public pending(): number {
    return this.depth;
  }

  /** Resolves once everything dispatched so far, and anything they dispatch, has run. */
  public async drain(): Promise<void> {
    while (this.depth > 0) {
      await this.tail;
    }
  }
}
