import { readdir, stat, watch } from "node:fs/promises";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { SourceUnavailableError } from "../errors.js";
import { isPhotoFile } from "./classifier.js";

export type PhotoArrival = {
  path: string;
  filename: string;
};

export interface PhotoSource {
  /** Human-readable watch target, for logs. */
  readonly target: string;
  arrivals(signal: AbortSignal): AsyncIterable<PhotoArrival>;
}

type DatedArrival = PhotoArrival & { mtimeMs: number };

type Change = { done: boolean } | { failed: unknown };

const isAbort = (err: unknown): boolean => err instanceof Error && err.name === "AbortError";

/**
 * Image files in `dir`, oldest first by modification time, then by name.
 * Throws SourceUnavailableError when the directory cannot be read.
 */
export const listPhotos = async (dir: string): Promise<PhotoArrival[]> => {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    throw new SourceUnavailableError(dir, { cause: err });
  }

  const entries = await Promise.all(
    names.filter(isPhotoFile).map(async (filename): Promise<DatedArrival | null> => {
      const path = join(dir, filename);
      try {
        const info = await stat(path);
        return info.isFile() ? { path, filename, mtimeMs: info.mtimeMs } : null;
      } catch {
        // removed between readdir and stat
        return null;
      }
    }),
  );

  return entries
    .filter((entry): entry is DatedArrival => entry !== null)
    .sort((a, b) => a.mtimeMs - b.mtimeMs || a.filename.localeCompare(b.filename))
    .map(({ path, filename }) => ({ path, filename }));
};

/**
 * Watches a directory the capture device syncs photos into. Yields what is
 * already there, then rescans after each change notification once
 * `settleMs` has passed so half-written files are not picked up. The watch
 * is attached before the first scan, so the same file may be yielded more
 * than once; consumers deduplicate.
 */
export class DirectoryPhotoSource implements PhotoSource {
  constructor(
    readonly target: string,
    private readonly settleMs = 500,
  ) {}

  async *arrivals(signal: AbortSignal): AsyncIterable<PhotoArrival> {
    if (signal.aborted) return;
    const watching = new AbortController();
    const forwardAbort = () => watching.abort();
    signal.addEventListener("abort", forwardAbort, { once: true });
    const changes = watch(this.target, { signal: watching.signal })[Symbol.asyncIterator]();
    // next() starts the watcher; settle it into a value so a scan failure leaves no stray rejection
    const nextChange = (): Promise<Change> =>
      changes.next().then(
        ({ done }) => ({ done: done === true }),
        (failed: unknown) => ({ failed }),
      );

    try {
      let change = nextChange();
      yield* await listPhotos(this.target);
      for (;;) {
        const outcome = await change;
        if ("failed" in outcome) throw outcome.failed;
        if (outcome.done) return;
        if (this.settleMs > 0) await sleep(this.settleMs, undefined, { signal });
        change = nextChange();
        yield* await listPhotos(this.target);
      }
    } catch (err) {
      if (isAbort(err)) return;
      if (err instanceof SourceUnavailableError) throw err;
      throw new SourceUnavailableError(this.target, { cause: err });
    } finally {
      signal.removeEventListener("abort", forwardAbort);
      watching.abort();
    }
  }
}
