import { buildServer } from "./server.js";

const DEFAULT_PORT = 8000;

const parsePort = (raw: string | undefined): number => {
  if (!raw || raw.trim().length === 0) return DEFAULT_PORT;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0 || !Number.isInteger(n)) return DEFAULT_PORT;
  return n;
};

const port = parsePort(process.env.PORT);
const host = process.env.HOST && process.env.HOST.trim().length > 0 ? process.env.HOST : "0.0.0.0";

const app = buildServer();

const shutdown = (signal: NodeJS.Signals) => {
  console.log(`[api] ${signal} received, closing`);
  app.close().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error("[api] close failed", err);
      process.exit(1);
    },
  );
};
process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);

app
  .listen({ port, host })
  .then((address) => {
    console.log(`[api] shelf backend listening on ${address}`);
  })
  .catch((err: unknown) => {
    console.error("[api] listen failed", err);
    process.exit(1);
  });
