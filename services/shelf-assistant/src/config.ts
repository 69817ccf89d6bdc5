import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  GOOGLE_API_KEY: z.string().trim().min(1, "GOOGLE_API_KEY is required"),
  VISION_MODEL: z.string().min(1).default("gemini-2.0-flash"),
  SPEECH_MODEL: z.string().min(1).default("gemini-2.5-flash-preview-tts"),
  SPEECH_VOICE: z.string().min(1).default("Kore"),
  SPEECH_OUTPUT_DIR: z.string().min(1).optional(),
  API_BASE_URL: z.string().url().default("http://localhost:8000"),
  PHOTO_DIR: z.string().min(1).default(join(homedir(), "Documents", "ShelfPhotos")),
  WATCH_SETTLE_MS: nonNegativeInt(500),
  QUEUE_CAPACITY: positiveInt(8),
  VISION_TIMEOUT_MS: positiveInt(20_000),
  VISION_MAX_ATTEMPTS: positiveInt(3),
  VISION_BASE_DELAY_MS: nonNegativeInt(500),
  STORE_TIMEOUT_MS: positiveInt(10_000),
  STORE_MAX_ATTEMPTS: positiveInt(4),
  STORE_BASE_DELAY_MS: nonNegativeInt(500),
  POLL_INTERVAL_MS: positiveInt(2_000),
  FRAMING_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  REACHED_TOLERANCE_DEGREES: z.coerce.number().min(0).max(180).default(20),
  REACHED_CONSECUTIVE_CYCLES: positiveInt(2),
  LOST_TARGET_CYCLES: positiveInt(3),
  STORE_FAILURE_CEILING: positiveInt(5),
});

export type AssistantConfig = {
  googleApiKey: string;
  visionModel: string;
  speechModel: string;
  speechVoice: string;
  speechOutputDir?: string;
  apiBaseUrl: string;
  photoDir: string;
  watchSettleMs: number;
  queueCapacity: number;
  vision: { timeoutMs: number; maxAttempts: number; baseDelayMs: number };
  store: { timeoutMs: number; maxAttempts: number; baseDelayMs: number };
  controller: {
    pollIntervalMs: number;
    framingConfidenceThreshold: number;
    reachedToleranceDegrees: number;
    reachedConsecutiveCycles: number;
    lostTargetCycles: number;
    storeFailureCeiling: number;
  };
};

// Unset and blank variables both fall back to defaults.
const withoutBlanks = (env: NodeJS.ProcessEnv): Record<string, string> =>
  Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== ""),
  );

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AssistantConfig => {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`invalid configuration:\n  ${problems.join("\n  ")}`);
  }
  const e = parsed.data;
  return {
    googleApiKey: e.GOOGLE_API_KEY,
    visionModel: e.VISION_MODEL,
    speechModel: e.SPEECH_MODEL,
    speechVoice: e.SPEECH_VOICE,
    speechOutputDir: e.SPEECH_OUTPUT_DIR,
    apiBaseUrl: e.API_BASE_URL.replace(/\/+$/, ""),
    photoDir: e.PHOTO_DIR,
    watchSettleMs: e.WATCH_SETTLE_MS,
    queueCapacity: e.QUEUE_CAPACITY,
    vision: {
      timeoutMs: e.VISION_TIMEOUT_MS,
      maxAttempts: e.VISION_MAX_ATTEMPTS,
      baseDelayMs: e.VISION_BASE_DELAY_MS,
    },
    store: {
      timeoutMs: e.STORE_TIMEOUT_MS,
      maxAttempts: e.STORE_MAX_ATTEMPTS,
      baseDelayMs: e.STORE_BASE_DELAY_MS,
    },
    controller: {
      pollIntervalMs: e.POLL_INTERVAL_MS,
      framingConfidenceThreshold: e.FRAMING_CONFIDENCE_THRESHOLD,
      reachedToleranceDegrees: e.REACHED_TOLERANCE_DEGREES,
      reachedConsecutiveCycles: e.REACHED_CONSECUTIVE_CYCLES,
      lostTargetCycles: e.LOST_TARGET_CYCLES,
      storeFailureCeiling: e.STORE_FAILURE_CEILING,
    },
  };
};
