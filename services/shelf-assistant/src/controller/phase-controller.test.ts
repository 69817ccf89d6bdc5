import type { ProductCatalog, ProductRecord, UserChoice } from "@shelf-guide/shared";
import { afterEach, describe, expect, it, vi } from "vitest";
import { FormatError, StoreRejectedError, StoreUnavailableError } from "../errors.js";
import type { FeedbackEmitter } from "../feedback/emitter.js";
import { createLogger, silentSink } from "../logger.js";
import type { PhotoEvent } from "../photo/classifier.js";
import type { PhotoImage } from "../photo/image.js";
import { PhotoQueue } from "../photo/queue.js";
import { RetryPolicy } from "../retry.js";
import type { CatalogStore, PublishedCatalog } from "../store/client.js";
import { VisionClient, type FramingVerdict, type GuidanceReading, type VisionAnalyzer } from "../vision/client.js";
import type { VisionProvider } from "../vision/provider.js";
import { PhaseController, type ControllerSettings, type PhaseTransition } from "./phase-controller.js";
import { PHRASES, catalogSummary } from "./phrases.js";

type Step<T> = { ok: T } | { fail: Error } | { wait: Promise<T> };

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

class FakeVision implements VisionAnalyzer {
  readonly framing: Step<FramingVerdict>[] = [];
  readonly catalogs: Step<ProductCatalog>[] = [];
  readonly readings: Step<GuidanceReading>[] = [];
  readonly targets: ProductRecord[] = [];
  calls = 0;
  maxInFlight = 0;
  private inFlight = 0;

  assessFraming(): Promise<FramingVerdict> {
    return this.play(this.framing);
  }

  identifyProducts(): Promise<ProductCatalog> {
    return this.play(this.catalogs);
  }

  locateTarget(_image: PhotoImage, target: ProductRecord): Promise<GuidanceReading> {
    this.targets.push(target);
    return this.play(this.readings);
  }

  private async play<T>(steps: Step<T>[]): Promise<T> {
    this.calls += 1;
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const step = steps.shift();
      if (!step) throw new Error("vision script exhausted");
      if ("fail" in step) throw step.fail;
      if ("wait" in step) return await step.wait;
      return step.ok;
    } finally {
      this.inFlight -= 1;
    }
  }
}

class FakeStore implements CatalogStore {
  readonly published: ProductCatalog[] = [];
  readonly publishFailures: Error[] = [];
  readonly polls: Array<UserChoice | null | Error> = [];
  readonly acknowledged: string[] = [];
  publishGate?: Promise<void>;
  publishAttempts = 0;
  pollCalls = 0;

  async publishCatalog(catalog: ProductCatalog): Promise<PublishedCatalog> {
    this.publishAttempts += 1;
    if (this.publishGate) await this.publishGate;
    const failure = this.publishFailures.shift();
    if (failure) throw failure;
    this.published.push(catalog);
    return { id: `catalog-${this.published.length}`, filename: "shelf_items_20260117_140500.csv" };
  }

  async pollLatestChoice(): Promise<UserChoice | null> {
    this.pollCalls += 1;
    const step = this.polls.shift();
    if (step instanceof Error) throw step;
    // the backend only serves unprocessed choices
    if (step && this.acknowledged.includes(step.id)) return null;
    return step ?? null;
  }

  async acknowledgeChoice(id: string): Promise<void> {
    this.acknowledged.push(id);
  }
}

class RecordingEmitter implements FeedbackEmitter {
  readonly phrases: string[] = [];

  async speak(phrase: string): Promise<void> {
    this.phrases.push(phrase);
  }
}

const cola: ProductRecord = { itemNumber: 1, name: "Cola", brand: "Coca-Cola", location: "top shelf", price: 1.99 };
const water: ProductRecord = { itemNumber: 2, name: "Still Water", brand: "Aqua", location: "bottom shelf, left", price: null };

const framed: Step<FramingVerdict> = { ok: { framed: true, confidence: 0.92, correction: "" } };
const unframed = (correction: string): Step<FramingVerdict> => ({ ok: { framed: false, confidence: 0.8, correction } });
const reading = (angleDegrees: number, distanceHint: "near" | "far"): Step<GuidanceReading> => ({
  ok: { angleDegrees, distanceHint, targetVisible: true },
});
const notVisible: Step<GuidanceReading> = { ok: { angleDegrees: 0, distanceHint: "far", targetVisible: false } };

const choice = (itemName: string): UserChoice => ({
  id: `choice-${itemName.trim()}`,
  itemName,
  itemLocation: null,
  processed: false,
  createdAt: "2026-01-17T14:05:00Z",
});

let photoCount = 0;
const photo = (marker: "low" | "high"): PhotoEvent => {
  photoCount += 1;
  const filename = `shelf_2026-01-17T14-03-${String(photoCount % 60).padStart(2, "0")}Z_${marker}.jpg`;
  return {
    path: `/photos/${filename}`,
    filename,
    flag: marker === "low" ? "positioning" : "identification",
    observedAt: new Date("2026-01-17T14:03:00Z"),
  };
};

const image: PhotoImage = { data: Buffer.from("jpeg-bytes"), mimeType: "image/jpeg" };

const baseSettings: ControllerSettings = {
  pollIntervalMs: 60_000,
  framingConfidenceThreshold: 0.7,
  reachedToleranceDegrees: 20,
  reachedConsecutiveCycles: 1,
  lostTargetCycles: 2,
  storeFailureCeiling: 3,
};

const started: PhaseController[] = [];

afterEach(() => {
  for (const controller of started.splice(0)) controller.stop();
});

type SetupOverrides = {
  settings?: Partial<ControllerSettings>;
  vision?: VisionAnalyzer;
  emitter?: FeedbackEmitter;
  storeRetry?: RetryPolicy;
};

const setup = (overrides: SetupOverrides = {}) => {
  const vision = new FakeVision();
  const store = new FakeStore();
  const emitter = new RecordingEmitter();
  const transitions: PhaseTransition[] = [];
  const controller = new PhaseController({
    vision: overrides.vision ?? vision,
    store,
    emitter: overrides.emitter ?? emitter,
    settings: { ...baseSettings, ...overrides.settings },
    storeRetry: overrides.storeRetry ?? RetryPolicy.immediate(3),
    loadPhoto: async () => image,
    onTransition: (transition) => transitions.push(transition),
    log: createLogger("controller", silentSink),
  });
  started.push(controller);
  const steps = () => transitions.map(({ from, to }) => `${from}>${to}`);
  return { controller, vision, store, emitter, steps };
};

type Harness = ReturnType<typeof setup>;

const toSelection = async ({ controller, vision, emitter }: Harness, catalog: ProductCatalog = [cola, water]) => {
  vision.framing.push(framed);
  vision.catalogs.push({ ok: catalog });
  await controller.handlePhoto(photo("low"));
  await controller.handlePhoto(photo("high"));
  await controller.idle();
  emitter.phrases.splice(0);
};

const toGuiding = async (harness: Harness) => {
  await toSelection(harness);
  harness.store.polls.push(choice("Cola"));
  await harness.controller.pollNow();
  harness.emitter.phrases.splice(0);
};

describe("PhaseController", () => {
  it("walks a shopper from framing to their chosen product", async () => {
    const { controller, vision, store, emitter, steps } = setup();
    vision.framing.push(framed);
    vision.catalogs.push({ ok: [cola] });
    vision.readings.push(reading(90, "far"), reading(45, "far"), reading(0, "near"));

    await controller.handlePhoto(photo("low"));
    expect(controller.phase).toBe("identifying");

    await controller.handlePhoto(photo("high"));
    expect(controller.phase).toBe("awaitingSelection");
    await controller.idle();
    expect(store.published).toEqual([[cola]]);
    expect(controller.isPolling).toBe(true);

    store.polls.push(choice("Cola"));
    await controller.pollNow();
    expect(controller.phase).toBe("guiding");
    expect(controller.isPolling).toBe(false);

    for (let i = 0; i < 3; i++) await controller.handlePhoto(photo("low"));
    await controller.idle();

    expect(controller.phase).toBe("positioning");
    expect(vision.targets).toEqual([cola, cola, cola]);
    expect(store.acknowledged).toEqual(["choice-Cola"]);
    expect(steps()).toEqual([
      "positioning>identifying",
      "identifying>awaitingSelection",
      "awaitingSelection>guiding",
      "guiding>completed",
      "completed>positioning",
    ]);
    expect(emitter.phrases).toEqual([
      PHRASES.shelfFramed,
      "I found 1 product. 1: Cola by Coca-Cola, top shelf, 1.99. Which one would you like?",
      "Let's find the Cola. Hold your hand up in front of the shelf.",
      "Reach toward 3 o'clock, a bit further.",
      "Reach toward 2 o'clock, a bit further.",
      "You've reached the Cola.",
    ]);
    expect(controller.snapshot().activeCatalog).toBeUndefined();
  });

  it("never leaves positioning on unframed photos", async () => {
    const { controller, vision, emitter, steps } = setup();
    const corrections = ["Move a little to the right", "Tilt up slightly", "Step back", "", "Step back"];
    vision.framing.push(...corrections.map(unframed));

    for (let i = 0; i < corrections.length; i++) {
      await controller.handlePhoto(photo("low"));
      expect(controller.phase).toBe("positioning");
    }

    expect(steps()).toEqual([]);
    expect(emitter.phrases).toEqual([
      "Move a little to the right",
      "Tilt up slightly",
      "Step back",
      PHRASES.adjustFraming,
      "Step back",
    ]);
  });

  it("ignores identification photos until the shelf is framed", async () => {
    const { controller, vision } = setup();
    await controller.handlePhoto(photo("high"));
    expect(vision.calls).toBe(0);
    expect(controller.phase).toBe("positioning");
  });

  it("issues one vision call at a time", async () => {
    const { controller, vision } = setup();
    const first = deferred<FramingVerdict>();
    vision.framing.push({ wait: first.promise }, unframed("Step back"));

    const a = controller.handlePhoto(photo("low"));
    const b = controller.handlePhoto(photo("low"));
    await vi.waitFor(() => expect(vision.calls).toBe(1));
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(vision.calls).toBe(1);

    first.resolve({ framed: false, confidence: 0.3, correction: "Tilt up slightly" });
    await Promise.all([a, b]);
    expect(vision.calls).toBe(2);
    expect(vision.maxInFlight).toBe(1);
  });

  it("sends an empty shelf back to positioning", async () => {
    const { controller, vision, store, emitter } = setup();
    vision.framing.push(framed);
    vision.catalogs.push({ ok: [] });
    await controller.handlePhoto(photo("low"));
    await controller.handlePhoto(photo("high"));
    await controller.idle();

    expect(controller.phase).toBe("positioning");
    expect(store.publishAttempts).toBe(0);
    expect(emitter.phrases.at(-1)).toBe(PHRASES.noProducts);
  });

  it("asks for another photo when the catalog cannot be read", async () => {
    const { controller, vision, emitter } = setup();
    vision.framing.push(framed);
    vision.catalogs.push({ fail: new FormatError("row 2: expected 5 fields, found 3") });
    await controller.handlePhoto(photo("low"));
    await controller.handlePhoto(photo("high"));

    expect(controller.phase).toBe("identifying");
    expect(emitter.phrases.at(-1)).toBe(PHRASES.retakePhoto);
  });

  it("apologises after the vision retry budget and recovers on the next photo", async () => {
    const answers: Array<string | Error> = [
      '{"framed": true, "confidence": 0.9, "correction": ""}',
      new Error("deadline exceeded"),
      new Error("deadline exceeded"),
      new Error("deadline exceeded"),
      "item_number,product_name,brand,location,price\n1,Cola,Coca-Cola,top shelf,1.99\n",
    ];
    const provider: VisionProvider = {
      name: "flaky",
      describe: async () => {
        const answer = answers.shift() ?? new Error("script exhausted");
        if (answer instanceof Error) throw answer;
        return answer;
      },
    };
    const vision = new VisionClient(provider, {
      timeoutMs: 1_000,
      retry: RetryPolicy.immediate(3),
      framingConfidenceThreshold: 0.7,
      log: createLogger("vision", silentSink),
    });
    const { controller, emitter, store } = setup({ vision });

    await controller.handlePhoto(photo("low"));
    await controller.handlePhoto(photo("high"));
    expect(controller.phase).toBe("identifying");
    expect(emitter.phrases).toEqual([PHRASES.shelfFramed, PHRASES.visionApology]);

    await controller.handlePhoto(photo("high"));
    await controller.idle();
    expect(controller.phase).toBe("awaitingSelection");
    expect(store.published).toEqual([[cola]]);
    expect(answers).toEqual([]);
  });

  it("reports an unknown choice, consumes it, and keeps waiting", async () => {
    const harness = setup();
    await toSelection(harness, [cola]);
    const { controller, store, emitter } = harness;

    store.polls.push(choice("Sprite"));
    await controller.pollNow();

    expect(controller.phase).toBe("awaitingSelection");
    expect(controller.isPolling).toBe(true);
    expect(emitter.phrases).toEqual([PHRASES.notRecognized]);
    expect(store.acknowledged).toEqual(["choice-Sprite"]);
  });

  it("matches choices ignoring case and surrounding space", async () => {
    const harness = setup();
    await toSelection(harness);
    harness.store.polls.push(choice("  still WATER "));
    await harness.controller.pollNow();

    expect(harness.controller.phase).toBe("guiding");
    expect(harness.controller.snapshot().selectedItem).toEqual(water);
  });

  it("polls on its own timer while awaiting a selection", async () => {
    const harness = setup({ settings: { pollIntervalMs: 5 } });
    harness.store.polls.push(null, choice("Cola"));
    await toSelection(harness);

    await vi.waitFor(() => expect(harness.controller.phase).toBe("guiding"));
    expect(harness.controller.isPolling).toBe(false);
    const calls = harness.store.pollCalls;
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(harness.store.pollCalls).toBe(calls);
  });

  it("gives up after consecutive backend outages", async () => {
    const harness = setup();
    await toSelection(harness);
    const { controller, store, emitter } = harness;
    const down = () => new StoreUnavailableError("GET /user-choice/latest failed: connect ECONNREFUSED");
    store.polls.push(down(), null, down(), down(), new StoreRejectedError("bad request", 400));

    for (let i = 0; i < 5; i++) await controller.pollNow();
    expect(controller.phase).toBe("awaitingSelection");
    expect(controller.snapshot().storeFailures).toBe(2);

    store.polls.push(down());
    await controller.pollNow();
    expect(controller.phase).toBe("positioning");
    expect(controller.isPolling).toBe(false);
    expect(emitter.phrases).toEqual([PHRASES.tryLater]);
  });

  it("resets when the catalog cannot be published", async () => {
    const { controller, vision, store, emitter } = setup({ storeRetry: RetryPolicy.immediate(2) });
    store.publishFailures.push(new StoreUnavailableError("503"), new StoreUnavailableError("503"));
    vision.framing.push(framed);
    vision.catalogs.push({ ok: [cola] });

    await controller.handlePhoto(photo("low"));
    await controller.handlePhoto(photo("high"));
    await controller.idle();

    expect(store.publishAttempts).toBe(2);
    expect(controller.phase).toBe("positioning");
    expect(emitter.phrases).toEqual([PHRASES.shelfFramed, PHRASES.tryLater]);
  });

  it("does not retry a rejected publish", async () => {
    const { controller, vision, store } = setup();
    store.publishFailures.push(new StoreRejectedError("catalog is missing required columns: brand", 400));
    vision.framing.push(framed);
    vision.catalogs.push({ ok: [cola] });

    await controller.handlePhoto(photo("low"));
    await controller.handlePhoto(photo("high"));
    await controller.idle();

    expect(store.publishAttempts).toBe(1);
    expect(controller.phase).toBe("positioning");
  });

  it("holds off on choices until the catalog is published", async () => {
    const { controller, vision, store, emitter } = setup();
    const gate = deferred<void>();
    store.publishGate = gate.promise;
    vision.framing.push(framed);
    vision.catalogs.push({ ok: [cola, water] });
    store.polls.push(choice("Cola"));

    await controller.handlePhoto(photo("low"));
    await controller.handlePhoto(photo("high"));
    await controller.pollNow();
    expect(controller.phase).toBe("awaitingSelection");
    expect(controller.isPolling).toBe(false);
    expect(store.pollCalls).toBe(0);

    gate.resolve();
    await controller.idle();
    expect(controller.isPolling).toBe(true);
    await controller.pollNow();

    expect(controller.phase).toBe("guiding");
    expect(emitter.phrases).toEqual([
      PHRASES.shelfFramed,
      catalogSummary([cola, water]),
      "Let's find the Cola. Hold your hand up in front of the shelf.",
    ]);
  });

  it("cancels a pending selection", async () => {
    const harness = setup();
    await toSelection(harness);
    const { controller, store, emitter, steps } = harness;

    await controller.cancel();
    await controller.pollNow();

    expect(controller.phase).toBe("positioning");
    expect(controller.isPolling).toBe(false);
    expect(store.pollCalls).toBe(0);
    expect(emitter.phrases).toEqual([PHRASES.cancelled]);
    expect(steps().at(-1)).toBe("awaitingSelection>positioning");
  });

  it("consumes the choice being guided to when the session is cancelled", async () => {
    const harness = setup();
    await toGuiding(harness);
    const { controller, store, emitter } = harness;

    await controller.cancel();
    await controller.idle();
    expect(controller.phase).toBe("positioning");
    expect(store.acknowledged).toEqual(["choice-Cola"]);
    expect(emitter.phrases).toEqual([PHRASES.cancelled]);

    await toSelection(harness);
    store.polls.push(choice("Cola"));
    await controller.pollNow();
    expect(store.pollCalls).toBe(2);
    expect(controller.phase).toBe("awaitingSelection");
    expect(emitter.phrases).toEqual([]);
  });

  it("speaks the cancellation after the phrase already being spoken", async () => {
    const spoken: string[] = [];
    const held = deferred<void>();
    const emitter: FeedbackEmitter = {
      speak: async (phrase) => {
        spoken.push(`start ${phrase}`);
        if (phrase === PHRASES.shelfFramed) await held.promise;
        spoken.push(`end ${phrase}`);
      },
    };
    const { controller, vision } = setup({ emitter });
    vision.framing.push(framed);

    const framing = controller.handlePhoto(photo("low"));
    await vi.waitFor(() => expect(spoken).toEqual([`start ${PHRASES.shelfFramed}`]));
    const cancelled = controller.cancel();
    expect(controller.phase).toBe("positioning");
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(spoken).toEqual([`start ${PHRASES.shelfFramed}`]);

    held.resolve();
    await Promise.all([framing, cancelled]);
    expect(spoken).toEqual([
      `start ${PHRASES.shelfFramed}`,
      `end ${PHRASES.shelfFramed}`,
      `start ${PHRASES.cancelled}`,
      `end ${PHRASES.cancelled}`,
    ]);
  });

  it("discards a vision result that lands after a reset", async () => {
    const { controller, vision, store, emitter } = setup();
    const identified = deferred<ProductCatalog>();
    vision.framing.push(framed);
    vision.catalogs.push({ wait: identified.promise });

    await controller.handlePhoto(photo("low"));
    const pending = controller.handlePhoto(photo("high"));
    await vi.waitFor(() => expect(vision.calls).toBe(2));

    controller.reset();
    identified.resolve([cola]);
    await pending;
    await controller.idle();

    expect(controller.phase).toBe("positioning");
    expect(store.publishAttempts).toBe(0);
    expect(emitter.phrases).toEqual([PHRASES.shelfFramed]);
  });

  it("needs the configured number of on-target readings", async () => {
    const harness = setup({ settings: { reachedConsecutiveCycles: 2 } });
    await toGuiding(harness);
    const { controller, vision, emitter } = harness;
    vision.readings.push(reading(0, "near"), reading(90, "far"), reading(10, "near"), reading(350, "near"));

    for (let i = 0; i < 4; i++) await controller.handlePhoto(photo("low"));

    expect(controller.phase).toBe("positioning");
    expect(emitter.phrases).toEqual([
      "Reach toward 12 o'clock, close.",
      "Reach toward 3 o'clock, a bit further.",
      "Reach toward 12 o'clock, close.",
      "You've reached the Cola.",
    ]);
  });

  it("re-frames the shelf when the target drops out of view", async () => {
    const harness = setup();
    await toGuiding(harness);
    const { controller, vision, emitter, steps } = harness;
    vision.readings.push(notVisible, notVisible);

    await controller.handlePhoto(photo("low"));
    expect(controller.phase).toBe("guiding");
    await controller.handlePhoto(photo("low"));
    expect(controller.phase).toBe("positioning");
    expect(controller.snapshot().selectedItem).toEqual(cola);

    vision.framing.push(framed);
    vision.readings.push(reading(0, "near"));
    await controller.handlePhoto(photo("low"));
    expect(controller.phase).toBe("guiding");
    await controller.handlePhoto(photo("low"));
    await controller.idle();

    expect(steps().slice(-4)).toEqual([
      "guiding>positioning",
      "positioning>guiding",
      "guiding>completed",
      "completed>positioning",
    ]);
    expect(emitter.phrases).toEqual([
      "I can't see the Cola. Move your hand slowly along the shelf.",
      "I've lost the Cola. Point the camera at the shelf again.",
      "Let's find the Cola. Hold your hand up in front of the shelf.",
      "You've reached the Cola.",
    ]);
    expect(harness.store.acknowledged).toEqual(["choice-Cola"]);
  });

  it("keeps going when speech fails", async () => {
    const vision = new FakeVision();
    vision.framing.push(framed);
    const controller = new PhaseController({
      vision,
      store: new FakeStore(),
      emitter: {
        speak: async () => {
          throw new Error("audio device busy");
        },
      },
      settings: baseSettings,
      loadPhoto: async () => image,
      log: createLogger("controller", silentSink),
    });
    started.push(controller);

    await controller.handlePhoto(photo("low"));
    expect(controller.phase).toBe("identifying");
  });

  it("asks for another photo when one cannot be read", async () => {
    const vision = new FakeVision();
    const emitter = new RecordingEmitter();
    const controller = new PhaseController({
      vision,
      store: new FakeStore(),
      emitter,
      settings: baseSettings,
      loadPhoto: async (path) => {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      },
      log: createLogger("controller", silentSink),
    });
    started.push(controller);

    await controller.handlePhoto(photo("low"));
    expect(vision.calls).toBe(0);
    expect(controller.phase).toBe("positioning");
    expect(emitter.phrases).toEqual([PHRASES.retakePhoto]);
  });

  it("consumes a photo queue until it is closed", async () => {
    const { controller, vision } = setup();
    vision.framing.push(unframed("Step back"), framed);
    const queue = new PhotoQueue<PhotoEvent>(4);
    queue.push(photo("low"));
    queue.push(photo("low"));
    queue.close();

    await controller.run(queue);
    expect(vision.calls).toBe(2);
    expect(controller.phase).toBe("identifying");
  });
});
