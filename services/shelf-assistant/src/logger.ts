export type LogSink = Pick<Console, "log" | "warn" | "error">;

export type Logger = {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
};

export const createLogger = (scope: string, sink: LogSink = console): Logger => ({
  info: (message, ...details) => sink.log(`[${scope}] ${message}`, ...details),
  warn: (message, ...details) => sink.warn(`[${scope}] ${message}`, ...details),
  error: (message, ...details) => sink.error(`[${scope}] ${message}`, ...details),
});

export const silentSink: LogSink = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
