import type { ProductCatalog, ProductRecord, UserChoice } from "@shelf-guide/shared";
import type { Offset } from "../guidance/translator.js";

export type Phase = "positioning" | "identifying" | "awaitingSelection" | "guiding" | "completed";

export type SessionState = {
  phase: Phase;
  activeCatalog?: ProductCatalog;
  /** Set once the backend holds the catalog; choices are polled only after that. */
  publishedCatalogId?: string;
  selectedItem?: ProductRecord;
  lastGuidanceOffset?: Offset;
  /** The choice being served; acknowledged when the session ends, reached or not. */
  activeChoice?: UserChoice;
  reachedStreak: number;
  lostTargetStreak: number;
  storeFailures: number;
};

export const initialSession = (): SessionState => ({
  phase: "positioning",
  reachedStreak: 0,
  lostTargetStreak: 0,
  storeFailures: 0,
});

const normalizeName = (name: string) => name.trim().toLowerCase();

/** Case-insensitive, whitespace-trimmed name match; first hit wins. */
export const findItem = (catalog: ProductCatalog, itemName: string): ProductRecord | undefined => {
  const wanted = normalizeName(itemName);
  if (wanted === "") return undefined;
  return catalog.find((item) => normalizeName(item.name) === wanted);
};
