export type * from "./types.js";
export { CATALOG_COLUMNS, FormatError, decodeCatalog, encodeCatalog, validateCatalog } from "./catalog-codec.js";
