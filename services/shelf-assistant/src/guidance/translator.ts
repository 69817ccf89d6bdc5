import type { DistanceHint, GuidanceReading } from "../vision/client.js";

export type ClockPosition = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12;

export type Offset = {
  angleClockPosition: ClockPosition;
  distanceHint: DistanceHint;
};

const CLOCK_POSITIONS: readonly ClockPosition[] = [12, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11];

const QUALIFIERS: Record<DistanceHint, string> = {
  near: "close",
  far: "a bit further",
};

const normalise = (angleDegrees: number): number => ((angleDegrees % 360) + 360) % 360;

/**
 * Nearest hour on a clock face, 0° = 12 o'clock, clockwise. A reading
 * exactly between two hours goes to the clockwise one.
 */
export const clockPositionFor = (angleDegrees: number): ClockPosition => {
  if (!Number.isFinite(angleDegrees)) {
    throw new RangeError(`angle must be finite, got ${angleDegrees}`);
  }
  const hour = Math.floor(normalise(angleDegrees) / 30 + 0.5) % 12;
  return CLOCK_POSITIONS[hour];
};

export const toOffset = (reading: Pick<GuidanceReading, "angleDegrees" | "distanceHint">): Offset => ({
  angleClockPosition: clockPositionFor(reading.angleDegrees),
  distanceHint: reading.distanceHint,
});

export const translate = (reading: Pick<GuidanceReading, "angleDegrees" | "distanceHint">): string => {
  const offset = toOffset(reading);
  return `Reach toward ${offset.angleClockPosition} o'clock, ${QUALIFIERS[offset.distanceHint]}.`;
};

/** Angular distance from straight up, 0..180. */
export const deviationFromTwelve = (angleDegrees: number): number => {
  const angle = normalise(angleDegrees);
  return Math.min(angle, 360 - angle);
};

export const isOnTarget = (
  reading: Pick<GuidanceReading, "angleDegrees" | "distanceHint">,
  toleranceDegrees: number,
): boolean => reading.distanceHint === "near" && deviationFromTwelve(reading.angleDegrees) <= toleranceDegrees;
