import "dotenv/config";
import { mkdir } from "node:fs/promises";
import { loadConfig, type AssistantConfig } from "./config.js";
import { PhaseController } from "./controller/phase-controller.js";
import { ConfigError } from "./errors.js";
import { ConsoleFeedbackEmitter, type FeedbackEmitter } from "./feedback/emitter.js";
import { SpeechFileEmitter, geminiSynthesizer } from "./feedback/speech-file.js";
import { createLogger } from "./logger.js";
import type { PhotoEvent } from "./photo/classifier.js";
import { PhotoQueue } from "./photo/queue.js";
import { DirectoryPhotoSource } from "./photo/source.js";
import { PhotoWatcher } from "./photo/watcher.js";
import { RetryPolicy } from "./retry.js";
import { BackendStoreClient } from "./store/client.js";
import { VisionClient } from "./vision/client.js";
import { GeminiVisionProvider } from "./vision/provider.js";

const log = createLogger("assistant");

const buildEmitter = (config: AssistantConfig): FeedbackEmitter =>
  config.speechOutputDir
    ? new SpeechFileEmitter(
        config.speechOutputDir,
        geminiSynthesizer(config.googleApiKey, config.speechModel, config.speechVoice),
      )
    : new ConsoleFeedbackEmitter();

const startAssistant = async (config: AssistantConfig, signal: AbortSignal): Promise<void> => {
  const vision = new VisionClient(new GeminiVisionProvider(config.googleApiKey, config.visionModel), {
    timeoutMs: config.vision.timeoutMs,
    retry: new RetryPolicy({ maxAttempts: config.vision.maxAttempts, baseDelayMs: config.vision.baseDelayMs }),
    framingConfidenceThreshold: config.controller.framingConfidenceThreshold,
  });
  const store = new BackendStoreClient({ baseUrl: config.apiBaseUrl, timeoutMs: config.store.timeoutMs });
  const controller = new PhaseController({
    vision,
    store,
    emitter: buildEmitter(config),
    settings: config.controller,
    storeRetry: new RetryPolicy({ maxAttempts: config.store.maxAttempts, baseDelayMs: config.store.baseDelayMs }),
  });

  const queue = new PhotoQueue<PhotoEvent>(config.queueCapacity, (dropped) =>
    log.warn(`dropping stale photo ${dropped.filename}`),
  );
  const watcher = new PhotoWatcher(new DirectoryPhotoSource(config.photoDir, config.watchSettleMs), queue, {
    onSourceUnavailable: (err, attempt) =>
      log.warn(`session paused: ${err.message} (reconnect attempt ${attempt})`),
  });

  await mkdir(config.photoDir, { recursive: true });
  signal.addEventListener("abort", () => queue.close(), { once: true });
  log.info(`vision=${config.visionModel} backend=${config.apiBaseUrl} photos=${config.photoDir}`);

  await Promise.all([
    watcher.run(signal).finally(() => queue.close()),
    controller.run(queue, signal),
  ]);
  await controller.idle();
};

const main = async () => {
  let config: AssistantConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const shutdown = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    log.info(`${signal} received, shutting down`);
    shutdown.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  await startAssistant(config, shutdown.signal);
  log.info("stopped");
};

main().catch((err: unknown) => {
  log.error("assistant crashed", err);
  process.exitCode = 1;
});
