import { randomUUID } from "node:crypto";
import type { CatalogFile, ChoiceRecord } from "./models.js";
import type { ShelfStore } from "./store.js";

const now = () => new Date().toISOString();

export class MemoryStore implements ShelfStore {
  // insertion order doubles as creation order
  private catalogs: CatalogFile[] = [];
  private choices: ChoiceRecord[] = [];

  saveCatalog(filename: string, content: string, fileSizeBytes: number): CatalogFile {
    const createdAt = now();
    const catalog: CatalogFile = { id: randomUUID(), filename, content, fileSizeBytes, createdAt, updatedAt: createdAt };
    this.catalogs.push(catalog);
    return catalog;
  }

  latestCatalog(): CatalogFile | undefined {
    return this.catalogs.at(-1);
  }

  createChoice(itemName: string, itemLocation: string | null): ChoiceRecord {
    const choice: ChoiceRecord = {
      id: randomUUID(),
      itemName,
      itemLocation,
      catalogId: this.latestCatalog()?.id ?? null,
      processed: false,
      createdAt: now(),
    };
    this.choices.push(choice);
    return choice;
  }

  latestChoice(unprocessedOnly: boolean): ChoiceRecord | undefined {
    for (let i = this.choices.length - 1; i >= 0; i--) {
      const choice = this.choices[i];
      if (!unprocessedOnly || !choice.processed) return choice;
    }
    return undefined;
  }

  markChoiceProcessed(choiceId: string): ChoiceRecord | undefined {
    const index = this.choices.findIndex((choice) => choice.id === choiceId);
    if (index === -1) return undefined;
    const updated = { ...this.choices[index], processed: true };
    this.choices[index] = updated;
    return updated;
  }
}
