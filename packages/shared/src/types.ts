export type ProductRecord = {
  itemNumber: number;
  name: string;
  brand: string;
  location: string;
  /** null when no price label was readable */
  price: number | null;
};

/** Ordered by identification order. Item numbers are unique. */
export type ProductCatalog = readonly ProductRecord[];

export type UserChoice = {
  id: string;
  itemName: string;
  itemLocation: string | null;
  processed: boolean;
  createdAt: string;
};

// Wire shapes of the backend REST contract (snake_case on the wire).

export type CatalogUploadResponse = {
  message: string;
  id: string;
  filename: string;
};

export type CatalogSummaryResponse = {
  id: string;
  filename: string;
  content: string;
  file_size_bytes: number;
  created_at: string;
  updated_at: string;
};

export type UserChoiceRequest = {
  item_name: string;
  item_location?: string | null;
};

export type UserChoiceCreatedResponse = {
  message: string;
  id: string;
};

export type UserChoiceDetail = {
  id: string;
  item_name: string;
  item_location: string | null;
  processed: boolean;
  created_at: string;
};
