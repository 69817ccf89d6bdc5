import { basename, extname } from "node:path";
import { ClassificationError } from "../errors.js";

export type PhotoFlag = "positioning" | "identification";

export type PhotoEvent = {
  readonly path: string;
  readonly filename: string;
  readonly flag: PhotoFlag;
  readonly observedAt: Date;
};

export const PHOTO_EXTENSIONS = [".jpg", ".jpeg", ".png"] as const;

const MARKERS: Record<string, PhotoFlag> = {
  low: "positioning",
  high: "identification",
};

// ISO 8601 with "-" standing in for ":" (filesystem-safe), e.g. 2026-01-17T14-03-22Z
const TIMESTAMP = /^(\d{4}-\d{2}-\d{2})T(\d{2})-(\d{2})-(\d{2})(\.\d+)?(Z|[+-]\d{2}-?\d{2})?$/i;

const PHOTO_EXTENSION_SET: ReadonlySet<string> = new Set(PHOTO_EXTENSIONS);

export const isPhotoFile = (filename: string): boolean => PHOTO_EXTENSION_SET.has(extname(filename).toLowerCase());

const parseTimestamp = (token: string): Date | undefined => {
  const match = TIMESTAMP.exec(token);
  if (!match) return undefined;
  const [, date, hh, mm, ss, fraction = "", zone = "Z"] = match;
  const offset = zone.toUpperCase() === "Z" ? "Z" : `${zone.slice(0, 3)}:${zone.slice(-2)}`;
  const parsed = new Date(`${date}T${hh}:${mm}:${ss}${fraction}${offset}`);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

/**
 * Reads capture intent and capture time from a photo's filename,
 * `prefix_<timestamp>_<low|high>.<jpg|jpeg|png>`.
 */
export const classifyPhoto = (path: string): PhotoEvent => {
  const filename = basename(path);
  if (!isPhotoFile(filename)) {
    throw new ClassificationError(filename, "not a jpg/jpeg/png photo");
  }

  const tokens = basename(filename, extname(filename)).split("_");
  const flags = new Set(tokens.map((token) => MARKERS[token.toLowerCase()]).filter((flag) => flag !== undefined));
  if (flags.size === 0) {
    throw new ClassificationError(filename, "no capture marker (low/high)");
  }
  if (flags.size > 1) {
    throw new ClassificationError(filename, "both capture markers present");
  }
  const [flag] = flags;

  const observedAt = tokens.map(parseTimestamp).find((date) => date !== undefined);
  if (!observedAt) {
    throw new ClassificationError(filename, "no capture timestamp");
  }

  return { path, filename, flag, observedAt };
};
