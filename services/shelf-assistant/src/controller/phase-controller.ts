import type { ProductCatalog, ProductRecord, UserChoice } from "@shelf-guide/shared";
import type { AssistantConfig } from "../config.js";
import { FormatError, StoreRejectedError, StoreUnavailableError, VisionParseError, VisionUnavailableError } from "../errors.js";
import type { FeedbackEmitter } from "../feedback/emitter.js";
import { isOnTarget, toOffset, translate } from "../guidance/translator.js";
import { createLogger, type Logger } from "../logger.js";
import type { PhotoEvent } from "../photo/classifier.js";
import { loadPhoto, type PhotoImage } from "../photo/image.js";
import { RetryPolicy, withRetry } from "../retry.js";
import type { CatalogStore } from "../store/client.js";
import type { VisionAnalyzer } from "../vision/client.js";
import { PHRASES, cannotSeeTarget, catalogSummary, guideTo, reached, targetLost } from "./phrases.js";
import { findItem, initialSession, type Phase, type SessionState } from "./session.js";

export type ControllerSettings = AssistantConfig["controller"];

export type PhaseTransition = {
  from: Phase;
  to: Phase;
  reason: string;
};

export type PhaseControllerOptions = {
  vision: VisionAnalyzer;
  store: CatalogStore;
  emitter: FeedbackEmitter;
  settings: ControllerSettings;
  /** Retries for background publish and acknowledge calls. */
  storeRetry?: RetryPolicy;
  loadPhoto?: (path: string) => Promise<PhotoImage>;
  onTransition?: (transition: PhaseTransition) => void;
  log?: Logger;
};

const isStoreUnavailable = (err: unknown) => err instanceof StoreUnavailableError;

/**
 * The shopping-session state machine. Photos, poll results and background
 * completions all run through one serial task chain, so at most one vision
 * call is in flight and session state has a single writer. `reset()` bumps
 * the session epoch; anything that finishes for an older epoch is dropped.
 */
export class PhaseController {
  private state: SessionState = initialSession();
  private epoch = 0;
  private chain: Promise<void> = Promise.resolve();
  private readonly background = new Set<Promise<void>>();
  private pollTimer: NodeJS.Timeout | null = null;
  private activePoll: Promise<void> | null = null;

  private readonly storeRetry: RetryPolicy;
  private readonly loadPhoto: (path: string) => Promise<PhotoImage>;
  private readonly log: Logger;

  constructor(private readonly options: PhaseControllerOptions) {
    this.storeRetry = options.storeRetry ?? new RetryPolicy({ maxAttempts: 4, baseDelayMs: 500 });
    this.loadPhoto = options.loadPhoto ?? loadPhoto;
    this.log = options.log ?? createLogger("controller");
  }

  get phase(): Phase {
    return this.state.phase;
  }

  get isPolling(): boolean {
    return this.pollTimer !== null;
  }

  snapshot(): Readonly<SessionState> {
    return { ...this.state };
  }

  /** Consumes photo events until the queue ends. Close the queue to stop. */
  async run(photos: AsyncIterable<PhotoEvent>, signal?: AbortSignal): Promise<void> {
    try {
      for await (const event of photos) {
        if (signal?.aborted) break;
        await this.handlePhoto(event);
      }
    } finally {
      this.stop();
    }
  }

  handlePhoto(event: PhotoEvent): Promise<void> {
    return this.enqueue(() => this.onPhoto(event));
  }

  /**
   * One AwaitingSelection poll. The timer calls this; ticks overlapping a
   * running poll are skipped, and nothing is polled before the catalog is published.
   */
  pollNow(): Promise<void> {
    if (this.state.phase !== "awaitingSelection" || !this.state.publishedCatalogId) return Promise.resolve();
    if (this.activePoll) return this.activePoll;

    const epoch = this.epoch;
    const poll = this.pollOnce(epoch).finally(() => {
      if (this.activePoll === poll) this.activePoll = null;
    });
    this.activePoll = poll;
    this.track(poll);
    return poll;
  }

  /** User stop: drops the session at once and speaks the confirmation in turn. */
  cancel(): Promise<void> {
    this.reset("cancelled by user");
    return this.enqueue(() => this.say(PHRASES.cancelled));
  }

  /**
   * Drops the session. In-flight vision and store results for it are
   * discarded when they land. A choice being served is acknowledged so the
   * next session does not pick it up again.
   */
  reset(reason = "reset requested"): void {
    this.epoch += 1;
    this.stopPolling();
    this.activePoll = null;
    const { phase: from, activeChoice } = this.state;
    this.state = initialSession();
    if (activeChoice) this.acknowledgeInBackground(activeChoice);
    if (from !== "positioning") this.emitTransition(from, "positioning", reason);
  }

  /** Stops the poll timer and abandons the current session. Pending work still drains. */
  stop(): void {
    this.epoch += 1;
    this.stopPolling();
  }

  /** Resolves once the task chain and all background work have drained. */
  async idle(): Promise<void> {
    for (;;) {
      const chain = this.chain;
      await Promise.all([chain, ...this.background]);
      if (chain === this.chain && this.background.size === 0) return;
    }
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    this.chain = this.chain.then(task).catch((err: unknown) => {
      this.log.error("unexpected failure while handling an event", err);
    });
    return this.chain;
  }

  private track(work: Promise<void>): void {
    const tracked: Promise<void> = work
      .catch((err: unknown) => this.log.error("background task failed", err))
      .finally(() => this.background.delete(tracked));
    this.background.add(tracked);
  }

  private async onPhoto(event: PhotoEvent): Promise<void> {
    const { phase } = this.state;
    switch (phase) {
      case "positioning":
        if (event.flag !== "positioning") return this.ignore(event);
        return this.onPositioningPhoto(event);
      case "identifying":
        if (event.flag !== "identification") return this.ignore(event);
        return this.onIdentificationPhoto(event);
      case "guiding":
        if (event.flag !== "positioning") return this.ignore(event);
        return this.onGuidingPhoto(event);
      case "awaitingSelection":
      case "completed":
        return this.ignore(event);
    }
  }

  private ignore(event: PhotoEvent): void {
    this.log.info(`ignoring ${event.flag} photo ${event.filename} while ${this.state.phase}`);
  }

  private async onPositioningPhoto(event: PhotoEvent): Promise<void> {
    const verdict = await this.analyze(event, (image) => this.options.vision.assessFraming(image));
    if (!verdict) return;

    if (!verdict.framed) {
      await this.say(verdict.correction.trim() || PHRASES.adjustFraming);
      return;
    }

    const { selectedItem } = this.state;
    if (selectedItem) {
      this.state.reachedStreak = 0;
      this.state.lostTargetStreak = 0;
      this.transition("guiding", "shelf framed again for the selected item");
      await this.say(guideTo(selectedItem));
      return;
    }
    this.transition("identifying", "shelf framed");
    await this.say(PHRASES.shelfFramed);
  }

  private async onIdentificationPhoto(event: PhotoEvent): Promise<void> {
    const catalog = await this.analyze(event, (image) => this.options.vision.identifyProducts(image));
    if (!catalog) return;

    if (catalog.length === 0) {
      this.transition("positioning", "no products identified");
      await this.say(PHRASES.noProducts);
      return;
    }

    this.state.activeCatalog = catalog;
    this.transition("awaitingSelection", `identified ${catalog.length} product(s)`);
    this.publishInBackground(catalog, this.epoch);
  }

  private async onGuidingPhoto(event: PhotoEvent): Promise<void> {
    const target = this.state.selectedItem;
    if (!target) {
      this.reset("guiding without a selected item");
      return;
    }
    const reading = await this.analyze(event, (image) => this.options.vision.locateTarget(image, target));
    if (!reading) return;

    const { settings } = this.options;
    if (!reading.targetVisible) {
      this.state.reachedStreak = 0;
      this.state.lostTargetStreak += 1;
      if (this.state.lostTargetStreak >= settings.lostTargetCycles) {
        this.state.lostTargetStreak = 0;
        this.transition("positioning", "target lost");
        await this.say(targetLost(target));
        return;
      }
      await this.say(cannotSeeTarget(target));
      return;
    }

    this.state.lostTargetStreak = 0;
    this.state.lastGuidanceOffset = toOffset(reading);

    if (isOnTarget(reading, settings.reachedToleranceDegrees)) {
      this.state.reachedStreak += 1;
      if (this.state.reachedStreak >= settings.reachedConsecutiveCycles) {
        await this.complete(target);
        return;
      }
    } else {
      this.state.reachedStreak = 0;
    }
    await this.say(translate(reading));
  }

  private async complete(target: ProductRecord): Promise<void> {
    await this.say(reached(target));
    this.transition("completed", `reached ${target.name}`);
    this.reset("ready for the next item");
  }

  /**
   * Loads the photo and runs one vision call. Returns undefined when the
   * photo produced nothing usable: the failure has been spoken or logged, or
   * the session moved on while the call was in flight.
   */
  private async analyze<T>(event: PhotoEvent, call: (image: PhotoImage) => Promise<T>): Promise<T | undefined> {
    const epoch = this.epoch;
    let image: PhotoImage;
    try {
      image = await this.loadPhoto(event.path);
    } catch (err) {
      this.log.warn(`cannot read ${event.filename}: ${String(err)}`);
      await this.say(PHRASES.retakePhoto);
      return undefined;
    }

    try {
      const result = await call(image);
      if (epoch !== this.epoch) {
        this.log.info(`discarding result for ${event.filename} from an ended session`);
        return undefined;
      }
      return result;
    } catch (err) {
      if (epoch !== this.epoch) return undefined;
      if (err instanceof VisionUnavailableError) {
        this.log.warn(`${event.filename}: ${err.message}`);
        await this.say(PHRASES.visionApology);
        return undefined;
      }
      if (err instanceof VisionParseError || err instanceof FormatError) {
        this.log.warn(`${event.filename}: ${err.message}`);
        await this.say(PHRASES.retakePhoto);
        return undefined;
      }
      throw err;
    }
  }

  private publishInBackground(catalog: ProductCatalog, epoch: number): void {
    const publish = withRetry(() => this.options.store.publishCatalog(catalog), this.storeRetry, {
      shouldRetry: isStoreUnavailable,
      onRetry: (err, attempt, delay) =>
        this.log.warn(`catalog publish attempt ${attempt} failed (${String(err)}); retrying in ${delay}ms`),
    });

    this.track(
      publish.then(
        (published) =>
          this.enqueue(async () => {
            if (epoch !== this.epoch || this.state.phase !== "awaitingSelection") return;
            this.state.storeFailures = 0;
            this.state.publishedCatalogId = published.id;
            this.log.info(`published ${published.filename} as ${published.id}`);
            await this.say(catalogSummary(catalog));
            this.startPolling();
          }),
        (err: unknown) =>
          this.enqueue(async () => {
            if (epoch !== this.epoch) return;
            this.log.error(`catalog publish failed: ${String(err)}`);
            await this.say(PHRASES.tryLater);
            this.reset("catalog publish failed");
          }),
      ),
    );
  }

  private acknowledgeInBackground(choice: UserChoice): void {
    const ack = withRetry(() => this.options.store.acknowledgeChoice(choice.id), this.storeRetry, {
      shouldRetry: isStoreUnavailable,
    });
    this.track(
      ack.then(
        () => this.log.info(`acknowledged choice ${choice.id}`),
        (err: unknown) => this.log.error(`could not acknowledge choice ${choice.id}: ${String(err)}`),
      ),
    );
  }

  private async pollOnce(epoch: number): Promise<void> {
    let choice: UserChoice | null;
    try {
      choice = await this.options.store.pollLatestChoice();
    } catch (err) {
      await this.enqueue(() => this.onStoreFailure(err, epoch));
      return;
    }

    const outcome: { unmatched?: UserChoice } = {};
    await this.enqueue(async () => {
      if (epoch !== this.epoch || this.state.phase !== "awaitingSelection") return;
      this.state.storeFailures = 0;
      if (choice) outcome.unmatched = await this.applyChoice(choice);
    });
    const { unmatched } = outcome;
    if (!unmatched) return;

    // consume the unmatched choice so the next poll does not match it again
    try {
      await this.options.store.acknowledgeChoice(unmatched.id);
    } catch (err) {
      await this.enqueue(() => this.onStoreFailure(err, epoch));
    }
  }

  /** Returns the choice when it matched nothing in the catalog. */
  private async applyChoice(choice: UserChoice): Promise<UserChoice | undefined> {
    const item = findItem(this.state.activeCatalog ?? [], choice.itemName);
    if (!item) {
      this.log.info(`choice "${choice.itemName}" is not in the catalog`);
      await this.say(PHRASES.notRecognized);
      return choice;
    }
    this.state.selectedItem = item;
    this.state.activeChoice = choice;
    this.state.reachedStreak = 0;
    this.state.lostTargetStreak = 0;
    this.transition("guiding", `selected ${item.name}`);
    await this.say(guideTo(item));
    return undefined;
  }

  private async onStoreFailure(err: unknown, epoch: number): Promise<void> {
    if (epoch !== this.epoch) return;
    if (err instanceof StoreRejectedError) {
      this.log.error(`backend rejected a request: ${err.message}`);
      return;
    }
    if (!(err instanceof StoreUnavailableError)) throw err;

    this.state.storeFailures += 1;
    const { storeFailureCeiling } = this.options.settings;
    this.log.warn(`${err.message} (${this.state.storeFailures}/${storeFailureCeiling})`);
    if (this.state.storeFailures >= storeFailureCeiling) {
      await this.say(PHRASES.tryLater);
      this.reset("backend unavailable");
    }
  }

  private transition(to: Phase, reason: string): void {
    const from = this.state.phase;
    if (from === to) return;
    this.state.phase = to;
    if (to !== "awaitingSelection") this.stopPolling();
    this.emitTransition(from, to, reason);
  }

  private emitTransition(from: Phase, to: Phase, reason: string): void {
    this.log.info(`${from} -> ${to} (${reason})`);
    this.options.onTransition?.({ from, to, reason });
  }

  private startPolling(): void {
    if (this.pollTimer || this.state.phase !== "awaitingSelection") return;
    this.pollTimer = setInterval(() => {
      void this.pollNow();
    }, this.options.settings.pollIntervalMs);
  }

  private stopPolling(): void {
    if (!this.pollTimer) return;
    clearInterval(this.pollTimer);
    this.pollTimer = null;
  }

  private async say(phrase: string): Promise<void> {
    try {
      await this.options.emitter.speak(phrase);
    } catch (err) {
      this.log.error(`could not speak "${phrase}"`, err);
    }
  }
}
