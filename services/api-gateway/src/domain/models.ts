export type CatalogFile = {
  id: string;
  filename: string;
  content: string;
  fileSizeBytes: number;
  createdAt: string;
  updatedAt: string;
};

export type ChoiceRecord = {
  id: string;
  itemName: string;
  itemLocation: string | null;
  /** Latest catalog at the time the choice was made, if any. */
  catalogId: string | null;
  processed: boolean;
  createdAt: string;
};
