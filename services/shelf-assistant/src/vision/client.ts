import { decodeCatalog, validateCatalog, type ProductCatalog, type ProductRecord } from "@shelf-guide/shared";
import { z } from "zod";
import { VisionParseError, VisionUnavailableError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { PhotoImage } from "../photo/image.js";
import { RetryExhaustedError, withRetry, type RetryPolicy } from "../retry.js";
import {
  IDENTIFICATION_INSTRUCTIONS,
  IDENTIFICATION_PROMPT,
  POSITIONING_INSTRUCTIONS,
  POSITIONING_PROMPT,
  guidanceInstructions,
  guidancePrompt,
} from "./prompts.js";
import type { VisionProvider, VisionRequest } from "./provider.js";

export type DistanceHint = "near" | "far";

export type FramingVerdict = {
  framed: boolean;
  confidence: number;
  correction: string;
};

export type GuidanceReading = {
  /** Direction from hand to target, clockwise from straight up. */
  angleDegrees: number;
  distanceHint: DistanceHint;
  targetVisible: boolean;
};

export type AnalysisContext =
  | { phase: "positioning" }
  | { phase: "identifying" }
  | { phase: "guiding"; target: ProductRecord };

export type VisionResult =
  | { phase: "positioning"; verdict: FramingVerdict }
  | { phase: "identifying"; catalog: ProductCatalog }
  | { phase: "guiding"; reading: GuidanceReading };

export interface VisionAnalyzer {
  assessFraming(image: PhotoImage): Promise<FramingVerdict>;
  identifyProducts(image: PhotoImage): Promise<ProductCatalog>;
  locateTarget(image: PhotoImage, target: ProductRecord): Promise<GuidanceReading>;
}

export type VisionClientOptions = {
  timeoutMs: number;
  retry: RetryPolicy;
  /** Minimum model confidence for a "framed" verdict to count. */
  framingConfidenceThreshold: number;
  log?: Logger;
};

const framingSchema = z.object({
  framed: z.boolean(),
  confidence: z.number().min(0).max(1),
  correction: z.string().default(""),
});

const guidanceSchema = z.object({
  target_visible: z.boolean(),
  angle_degrees: z.number().min(0).max(360),
  distance: z.enum(["near", "far"]),
});

class VisionTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`vision call timed out after ${timeoutMs}ms`);
    this.name = "VisionTimeoutError";
  }
}

const stripFences = (text: string): string =>
  text
    .trim()
    .replace(/^```[a-z]*\s*\n?/i, "")
    .replace(/\n?```\s*$/, "")
    .trim();

export const parseModelJson = <T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T => {
  const body = stripFences(text);
  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start === -1 || end < start) {
    throw new VisionParseError(`model answer holds no JSON object: ${JSON.stringify(body.slice(0, 120))}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(body.slice(start, end + 1));
  } catch (err) {
    throw new VisionParseError("model answer is not valid JSON", { cause: err });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new VisionParseError(`model answer has the wrong shape: ${parsed.error.issues[0]?.message ?? "unknown"}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
};

/**
 * Phase-specific questions to a vision provider. Each provider call is cut
 * off after `timeoutMs`; timeouts and provider failures are retried per the
 * policy and end in VisionUnavailableError. Parse failures are never retried.
 */
export class VisionClient implements VisionAnalyzer {
  private readonly log: Logger;

  constructor(
    private readonly provider: VisionProvider,
    private readonly options: VisionClientOptions,
  ) {
    this.log = options.log ?? createLogger("vision");
  }

  async analyze(image: PhotoImage, context: AnalysisContext): Promise<VisionResult> {
    switch (context.phase) {
      case "positioning":
        return { phase: "positioning", verdict: await this.assessFraming(image) };
      case "identifying":
        return { phase: "identifying", catalog: await this.identifyProducts(image) };
      case "guiding":
        return { phase: "guiding", reading: await this.locateTarget(image, context.target) };
    }
  }

  async assessFraming(image: PhotoImage): Promise<FramingVerdict> {
    const text = await this.ask({
      image,
      instructions: POSITIONING_INSTRUCTIONS,
      prompt: POSITIONING_PROMPT,
      responseFormat: "json",
    });
    const verdict = parseModelJson(text, framingSchema);
    return { ...verdict, framed: verdict.framed && verdict.confidence >= this.options.framingConfidenceThreshold };
  }

  /** Throws FormatError when the CSV breaks the catalog rules. */
  async identifyProducts(image: PhotoImage): Promise<ProductCatalog> {
    const text = await this.ask({
      image,
      instructions: IDENTIFICATION_INSTRUCTIONS,
      prompt: IDENTIFICATION_PROMPT,
      responseFormat: "text",
    });
    return validateCatalog(decodeCatalog(stripFences(text)));
  }

  async locateTarget(image: PhotoImage, target: ProductRecord): Promise<GuidanceReading> {
    const text = await this.ask({
      image,
      instructions: guidanceInstructions(target),
      prompt: guidancePrompt(target),
      responseFormat: "json",
    });
    const reading = parseModelJson(text, guidanceSchema);
    return {
      angleDegrees: reading.angle_degrees,
      distanceHint: reading.distance,
      targetVisible: reading.target_visible,
    };
  }

  private async ask(request: VisionRequest): Promise<string> {
    try {
      return await withRetry(() => this.callOnce(request), this.options.retry, {
        onRetry: (err, attempt, delay) =>
          this.log.warn(`${this.provider.name} attempt ${attempt} failed (${String(err)}); retrying in ${delay}ms`),
      });
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new VisionUnavailableError(err.attempts, { cause: err.lastError });
      }
      throw err;
    }
  }

  private async callOnce(request: VisionRequest): Promise<string> {
    const controller = new AbortController();
    const timedOut = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(new VisionTimeoutError(this.options.timeoutMs)), {
        once: true,
      });
    });
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      return await Promise.race([this.provider.describe(request, controller.signal), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }
}
