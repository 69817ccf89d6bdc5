import { setTimeout as sleep } from "node:timers/promises";
import { ClassificationError, SourceUnavailableError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import { RetryPolicy } from "../retry.js";
import { classifyPhoto, type PhotoEvent } from "./classifier.js";
import type { PhotoQueue } from "./queue.js";
import type { PhotoArrival, PhotoSource } from "./source.js";

export type PhotoWatcherOptions = {
  /** Backoff between reconnects; its attempt budget bounds consecutive failures. */
  reconnect?: RetryPolicy;
  log?: Logger;
  onSourceUnavailable?: (err: SourceUnavailableError, attempt: number) => void;
};

const defaultReconnect = () =>
  new RetryPolicy({ maxAttempts: Number.MAX_SAFE_INTEGER, baseDelayMs: 1_000, maxDelayMs: 30_000 });

/**
 * Turns raw arrivals into classified PhotoEvents on the queue, at most once
 * per filename, in the order the source reports them.
 */
export class PhotoWatcher {
  private readonly seen = new Set<string>();
  private readonly reconnect: RetryPolicy;
  private readonly log: Logger;

  constructor(
    private readonly source: PhotoSource,
    private readonly queue: PhotoQueue<PhotoEvent>,
    private readonly options: PhotoWatcherOptions = {},
  ) {
    this.reconnect = options.reconnect ?? defaultReconnect();
    this.log = options.log ?? createLogger("watcher");
  }

  /**
   * Resolves when the source ends or `signal` aborts. Rejects with
   * SourceUnavailableError once reconnect attempts are spent.
   */
  async run(signal: AbortSignal): Promise<void> {
    let failures = 0;
    this.log.info(`watching ${this.source.target}`);

    while (!signal.aborted) {
      try {
        for await (const arrival of this.source.arrivals(signal)) {
          failures = 0;
          this.accept(arrival);
        }
        return;
      } catch (err) {
        if (signal.aborted) return;
        if (!(err instanceof SourceUnavailableError)) throw err;

        failures += 1;
        this.options.onSourceUnavailable?.(err, failures);
        if (failures >= this.reconnect.maxAttempts) throw err;

        const delay = this.reconnect.delayFor(failures);
        this.log.warn(`${err.message}; retrying in ${delay}ms (attempt ${failures})`);
        try {
          await sleep(delay, undefined, { signal });
        } catch (sleepErr) {
          if (signal.aborted) return;
          throw sleepErr;
        }
      }
    }
  }

  /** Returns the queued event, or undefined when the arrival was skipped. */
  accept(arrival: PhotoArrival): PhotoEvent | undefined {
    if (this.seen.has(arrival.filename)) return undefined;
    this.seen.add(arrival.filename);

    let event: PhotoEvent;
    try {
      event = classifyPhoto(arrival.path);
    } catch (err) {
      if (err instanceof ClassificationError) {
        this.log.warn(`skipping ${err.message}`);
        return undefined;
      }
      throw err;
    }

    this.log.info(`new ${event.flag} photo ${event.filename}`);
    this.queue.push(event);
    return event;
  }
}
