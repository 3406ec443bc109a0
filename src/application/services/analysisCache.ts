import { err, ok, type Result } from "neverthrow";
import {
  analysisFailure,
  type AnalysisFailure,
} from "../../core/entities/appError";
import { logger } from "../../shared/logger/logger";

export type Computation<T> = (
  signal: AbortSignal,
) => Promise<Result<T, AnalysisFailure>>;

type InFlight<T> = {
  promise: Promise<Result<T, AnalysisFailure>>;
  controller: AbortController;
  waiters: number;
};

const cancelledFailure = (): AnalysisFailure =>
  analysisFailure("cancelled", "text_layer", "The analysis was cancelled by the caller");

/**
 * Keyed results with per-key single flight.
 * Late callers join the computation already running for their key. A caller's signal only
 * releases that caller; the shared computation is aborted once every waiter has left.
 * Failed computations are not kept.
 */
export class AnalysisCache<T> {
  private readonly ready = new Map<string, T>();
  private readonly inFlight = new Map<string, InFlight<T>>();

  peek(key: string): T | undefined {
    return this.ready.get(key);
  }

  async getOrCompute(
    key: string,
    compute: Computation<T>,
    signal?: AbortSignal,
  ): Promise<Result<T, AnalysisFailure>> {
    if (signal?.aborted) {
      return err(cancelledFailure());
    }

    const cached = this.ready.get(key);
    if (cached !== undefined) {
      logger.debug({ key }, "Analysis cache hit");
      return ok(cached);
    }

    const running = this.inFlight.get(key);
    if (running && !running.controller.signal.aborted) {
      logger.debug({ key, waiters: running.waiters }, "Joining in-flight analysis");
      return this.wait(running, signal);
    }

    return this.wait(this.start(key, compute), signal);
  }

  /** Drops the cached result and aborts any computation in flight for `key`. */
  invalidate(key: string): void {
    this.ready.delete(key);
    const running = this.inFlight.get(key);
    if (running) {
      this.inFlight.delete(key);
      running.controller.abort();
    }
  }

  private start(key: string, compute: Computation<T>): InFlight<T> {
    const controller = new AbortController();
    const entry: InFlight<T> = {
      controller,
      waiters: 0,
      promise: compute(controller.signal)
        .then((result) => {
          if (result.isOk() && this.inFlight.get(key) === entry) {
            this.ready.set(key, result.value);
          }
          return result;
        })
        .finally(() => {
          if (this.inFlight.get(key) === entry) {
            this.inFlight.delete(key);
          }
        }),
    };

    this.inFlight.set(key, entry);
    return entry;
  }

  private wait(
    entry: InFlight<T>,
    signal?: AbortSignal,
  ): Promise<Result<T, AnalysisFailure>> {
    entry.waiters += 1;

    return new Promise((resolve, reject) => {
      let settled = false;
      const leave = () => {
        settled = true;
        entry.waiters -= 1;
        signal?.removeEventListener("abort", onAbort);
      };
      const onAbort = () => {
        if (settled) {
          return;
        }
        leave();
        if (entry.waiters === 0) {
          entry.controller.abort();
        }
        resolve(err(cancelledFailure()));
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      entry.promise.then(
        (result) => {
          if (!settled) {
            leave();
            resolve(result);
          }
        },
        (error: unknown) => {
          if (!settled) {
            leave();
            reject(error);
          }
        },
      );
    });
  }
}
