import multipart from "@fastify/multipart";
import sensible from "@fastify/sensible";
import Fastify from "fastify";
import { ZodError } from "zod";
import { MemoryStore } from "./domain/memory-store.js";
import type { ShelfStore } from "./domain/store.js";
import { registerCatalogRoutes } from "./routes/csv.js";
import { registerUserChoiceRoutes } from "./routes/user-choice.js";

const MAX_CATALOG_BYTES = 1024 * 1024;

export const buildServer = (store: ShelfStore = new MemoryStore()) => {
  const app = Fastify({ logger: false });

  void app.register(sensible);
  void app.register(multipart, { limits: { fileSize: MAX_CATALOG_BYTES, files: 1 } });

  app.setErrorHandler((err, _request, reply) => {
    if (err instanceof ZodError) {
      const detail = err.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`).join("; ");
      return reply.send(app.httpErrors.badRequest(detail));
    }
    if ((err.statusCode ?? 500) >= 500) console.error("[api] request failed", err);
    return reply.send(err);
  });

  app.get("/healthz", async () => ({ ok: true }));
  void app.register(async (instance) => {
    registerCatalogRoutes(instance, store);
    registerUserChoiceRoutes(instance, store);
  });

  return app;
};
