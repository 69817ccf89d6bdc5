import { encodeCatalog, type ProductCatalog, type UserChoice } from "@shelf-guide/shared";
import { z } from "zod";
import { StoreRejectedError, StoreUnavailableError } from "../errors.js";

export type PublishedCatalog = {
  id: string;
  filename: string;
};

export interface CatalogStore {
  publishCatalog(catalog: ProductCatalog): Promise<PublishedCatalog>;
  /** Latest unprocessed choice, or null when none is pending. */
  pollLatestChoice(): Promise<UserChoice | null>;
  /** Idempotent. */
  acknowledgeChoice(id: string): Promise<void>;
}

export type BackendStoreClientOptions = {
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
  now?: () => Date;
};

const uploadSchema = z.object({
  id: z.string().min(1),
  filename: z.string(),
  message: z.string().optional(),
});

const choiceSchema = z.object({
  id: z.string().min(1),
  item_name: z.string(),
  item_location: z.string().nullish(),
  processed: z.boolean().default(false),
  created_at: z.string().default(""),
});

const latestSchema = choiceSchema.nullable();

const pad = (n: number) => String(n).padStart(2, "0");

/** `shelf_items_YYYYMMDD_HHMMSS.csv`, UTC. */
export const catalogFilename = (at: Date): string =>
  `shelf_items_${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}_` +
  `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}.csv`;

const isRetryableStatus = (status: number) => status === 408 || status === 429 || status >= 500;

/**
 * HTTP client for the backend REST contract. One request per call: retries
 * belong to the caller.
 */
export class BackendStoreClient implements CatalogStore {
  private readonly fetch: typeof fetch;
  private readonly now: () => Date;
  private readonly baseUrl: string;

  constructor(private readonly options: BackendStoreClientOptions) {
    this.fetch = options.fetch ?? globalThis.fetch;
    this.now = options.now ?? (() => new Date());
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  async publishCatalog(catalog: ProductCatalog): Promise<PublishedCatalog> {
    const filename = catalogFilename(this.now());
    const form = new FormData();
    form.append("file", new Blob([encodeCatalog(catalog)], { type: "text/csv" }), filename);

    const response = await this.request("POST", "/csv/upload", { body: form });
    const body = await this.readJson(response, uploadSchema, "/csv/upload");
    return { id: body.id, filename: body.filename || filename };
  }

  async pollLatestChoice(): Promise<UserChoice | null> {
    const response = await this.request("GET", "/user-choice/latest?unprocessed_only=true", { allowNotFound: true });
    if (response.status === 404 || response.status === 204) return null;

    const body = await this.readJson(response, latestSchema, "/user-choice/latest");
    if (!body) return null;
    return {
      id: body.id,
      itemName: body.item_name,
      itemLocation: body.item_location ?? null,
      processed: body.processed,
      createdAt: body.created_at,
    };
  }

  async acknowledgeChoice(id: string): Promise<void> {
    const path = `/user-choice/${encodeURIComponent(id)}/processed`;
    const response = await this.request("PATCH", path);
    // drain so the connection can be reused
    await response.arrayBuffer();
  }

  private async request(
    method: string,
    path: string,
    init: { body?: FormData; allowNotFound?: boolean } = {},
  ): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetch(`${this.baseUrl}${path}`, {
        method,
        body: init.body,
        headers: { accept: "application/json" },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new StoreUnavailableError(`${method} ${path} failed: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }

    if (response.ok || (init.allowNotFound && response.status === 404)) return response;

    const detail = (await response.text().catch(() => "")).slice(0, 200);
    const message = `${method} ${path} answered ${response.status}${detail ? `: ${detail}` : ""}`;
    if (isRetryableStatus(response.status)) throw new StoreUnavailableError(message);
    throw new StoreRejectedError(message, response.status);
  }

  private async readJson<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>, path: string): Promise<T> {
    let raw: unknown;
    try {
      const text = await response.text();
      raw = text.trim() === "" ? null : JSON.parse(text);
    } catch (err) {
      throw new StoreRejectedError(`${path} answered with a body that is not JSON: ${String(err)}`, response.status);
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreRejectedError(
        `${path} answered with an unexpected body: ${parsed.error.issues[0]?.message ?? "unknown"}`,
        response.status,
      );
    }
    return parsed.data;
  }
}
