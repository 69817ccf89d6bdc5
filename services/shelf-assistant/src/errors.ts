export { FormatError } from "@shelf-guide/shared";

/** Filename does not follow `prefix_<timestamp>_<low|high>.<ext>`. The event is dropped. */
export class ClassificationError extends Error {
  constructor(
    readonly filename: string,
    message: string,
  ) {
    super(`${filename}: ${message}`);
    this.name = "ClassificationError";
  }
}

export class VisionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "VisionError";
  }
}

/** Timeouts or transport failures outlasted the retry budget. */
export class VisionUnavailableError extends VisionError {
  constructor(
    readonly attempts: number,
    options?: ErrorOptions,
  ) {
    super(`vision provider unavailable after ${attempts} attempt(s)`, options);
    this.name = "VisionUnavailableError";
  }
}

/** The model answered, but not in the expected shape. Retrying the same image will not help. */
export class VisionParseError extends VisionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "VisionParseError";
  }
}

export class StoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreError";
  }
}

export class StoreUnavailableError extends StoreError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

export class StoreRejectedError extends StoreError {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "StoreRejectedError";
  }
}

export class SourceUnavailableError extends Error {
  constructor(
    readonly target: string,
    options?: ErrorOptions,
  ) {
    super(`photo source unavailable: ${target}`, options);
    this.name = "SourceUnavailableError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
