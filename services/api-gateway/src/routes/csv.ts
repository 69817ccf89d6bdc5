import { FormatError, decodeCatalog, type CatalogSummaryResponse, type CatalogUploadResponse } from "@shelf-guide/shared";
import type { FastifyInstance } from "fastify";
import type { ShelfStore } from "../domain/store.js";

export const registerCatalogRoutes = (app: FastifyInstance, store: ShelfStore) => {
  app.post("/csv/upload", async (request, reply) => {
    const file = await request.file();
    if (!file) return reply.badRequest('multipart field "file" is required');

    const bytes = await file.toBuffer();
    const content = bytes.toString("utf8");
    if (content.trim().length === 0) return reply.badRequest("File content is empty");

    try {
      decodeCatalog(content);
    } catch (err) {
      if (err instanceof FormatError) return reply.badRequest(err.message);
      throw err;
    }

    const catalog = store.saveCatalog(file.filename || "uploaded.csv", content, bytes.length);
    console.log(`[api] catalog ${catalog.filename} stored as ${catalog.id}`);
    const body: CatalogUploadResponse = {
      message: "CSV file uploaded successfully",
      id: catalog.id,
      filename: catalog.filename,
    };
    return reply.send(body);
  });

  app.get("/csv/get-summary", async (_request, reply) => {
    const catalog = store.latestCatalog();
    if (!catalog) return reply.notFound("No catalog has been uploaded yet");
    const body: CatalogSummaryResponse = {
      id: catalog.id,
      filename: catalog.filename,
      content: catalog.content,
      file_size_bytes: catalog.fileSizeBytes,
      created_at: catalog.createdAt,
      updated_at: catalog.updatedAt,
    };
    return reply.send(body);
  });
};
