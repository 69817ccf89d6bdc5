import type { CatalogFile, ChoiceRecord } from "./models.js";

export interface ShelfStore {
  saveCatalog(filename: string, content: string, fileSizeBytes: number): CatalogFile;
  latestCatalog(): CatalogFile | undefined;
  createChoice(itemName: string, itemLocation: string | null): ChoiceRecord;
  latestChoice(unprocessedOnly: boolean): ChoiceRecord | undefined;
  /** Returns undefined when no choice has this id. Marking twice is harmless. */
  markChoiceProcessed(choiceId: string): ChoiceRecord | undefined;
}
