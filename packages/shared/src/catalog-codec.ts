import type { ProductCatalog, ProductRecord } from "./types.js";

export const CATALOG_COLUMNS = ["item_number", "product_name", "brand", "location", "price"] as const;

type CatalogColumn = (typeof CATALOG_COLUMNS)[number];

const DELIMITER = ",";
const QUOTE = '"';
const UNKNOWN_PRICE = "N/A";

export class FormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormatError";
  }
}

const needsQuoting = (value: string): boolean =>
  value.includes(DELIMITER) ||
  value.includes(QUOTE) ||
  value.includes("\n") ||
  value.includes("\r") ||
  value !== value.trim();

const escapeField = (value: string): string => {
  if (!needsQuoting(value)) return value;
  return `${QUOTE}${value.replaceAll(QUOTE, QUOTE + QUOTE)}${QUOTE}`;
};

const formatPrice = (price: number | null): string => (price === null ? UNKNOWN_PRICE : String(price));

const checkEncodable = (item: ProductRecord): void => {
  if (!Number.isSafeInteger(item.itemNumber)) {
    throw new FormatError(`item_number ${item.itemNumber} is not an integer`);
  }
  if (item.price !== null && !Number.isFinite(item.price)) {
    throw new FormatError(`price ${item.price} of item ${item.itemNumber} is not a finite number`);
  }
};

/** Throws FormatError for item numbers and prices that would not read back. */
export const encodeCatalog = (catalog: ProductCatalog): string => {
  const rows = catalog.map((item) => {
    checkEncodable(item);
    return [String(item.itemNumber), item.name, item.brand, item.location, formatPrice(item.price)]
      .map(escapeField)
      .join(DELIMITER);
  });
  return [CATALOG_COLUMNS.join(DELIMITER), ...rows].join("\n") + "\n";
};

type ParsedField = { value: string; quoted: boolean };

/**
 * Splits CSV text into records. Quoted fields may span lines; a blank
 * physical line outside quotes produces no record.
 */
const parseRecords = (text: string): ParsedField[][] => {
  const records: ParsedField[][] = [];
  let fields: ParsedField[] = [];
  let value = "";
  let quoted = false;
  let inQuotes = false;
  let lineHasContent = false;
  let i = 0;

  const endField = () => {
    fields.push({ value, quoted });
    value = "";
    quoted = false;
  };
  const endRecord = () => {
    if (lineHasContent) {
      endField();
      records.push(fields);
    }
    fields = [];
    value = "";
    quoted = false;
    lineHasContent = false;
  };

  while (i < text.length) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === QUOTE) {
        if (text[i + 1] === QUOTE) {
          value += QUOTE;
          i += 2;
          continue;
        }
        inQuotes = false;
        i += 1;
        continue;
      }
      value += ch;
      i += 1;
      continue;
    }

    if (ch === QUOTE && value.trim().length === 0) {
      inQuotes = true;
      quoted = true;
      lineHasContent = true;
      value = "";
      i += 1;
    } else if (ch === DELIMITER) {
      lineHasContent = true;
      endField();
      i += 1;
    } else if (ch === "\r" || ch === "\n") {
      endRecord();
      i += ch === "\r" && text[i + 1] === "\n" ? 2 : 1;
    } else {
      if (quoted) {
        // text after a closing quote is tolerated only as whitespace
        if (ch.trim().length > 0) {
          throw new FormatError(`unexpected character after quoted field at offset ${i}`);
        }
      } else {
        value += ch;
        if (ch.trim().length > 0) lineHasContent = true;
      }
      i += 1;
    }
  }

  if (inQuotes) {
    throw new FormatError("unterminated quoted field");
  }
  endRecord();
  return records;
};

const fieldText = (field: ParsedField): string => (field.quoted ? field.value : field.value.trim());

const parseItemNumber = (raw: string, row: number): number => {
  if (!/^-?\d+$/.test(raw)) {
    throw new FormatError(`row ${row}: item_number "${raw}" is not an integer`);
  }
  return Number.parseInt(raw, 10);
};

const parsePrice = (raw: string, row: number): number | null => {
  if (raw.length === 0 || raw.toUpperCase() === UNKNOWN_PRICE) return null;
  const numeric = raw.replace(/^[$€£¥]\s*/, "");
  const price = Number(numeric);
  if (numeric.length === 0 || !Number.isFinite(price)) {
    throw new FormatError(`row ${row}: price "${raw}" is not a number`);
  }
  return price;
};

export const decodeCatalog = (text: string): ProductCatalog => {
  const records = parseRecords(text.replace(/^\uFEFF/, ""));
  const header = records[0];
  if (!header) {
    throw new FormatError("catalog has no header row");
  }

  const names = header.map((field) => fieldText(field).toLowerCase());
  const missing = CATALOG_COLUMNS.filter((column) => !names.includes(column));
  if (missing.length > 0) {
    throw new FormatError(`catalog is missing required columns: ${missing.join(", ")}`);
  }

  const seen = new Set<number>();
  const catalog: ProductRecord[] = [];
  records.slice(1).forEach((fields, idx) => {
    const row = idx + 2;
    if (fields.length !== header.length) {
      throw new FormatError(`row ${row}: expected ${header.length} fields, found ${fields.length}`);
    }
    const get = (column: CatalogColumn) => fieldText(fields[names.indexOf(column)]);

    const itemNumber = parseItemNumber(get("item_number"), row);
    if (seen.has(itemNumber)) {
      throw new FormatError(`row ${row}: duplicate item_number ${itemNumber}`);
    }
    seen.add(itemNumber);

    catalog.push({
      itemNumber,
      name: get("product_name"),
      brand: get("brand"),
      location: get("location"),
      price: parsePrice(get("price"), row),
    });
  });
  return catalog;
};

/**
 * Identification catalogs number their items 1..n in order.
 */
export const validateCatalog = (catalog: ProductCatalog): ProductCatalog => {
  catalog.forEach((item, idx) => {
    if (item.itemNumber !== idx + 1) {
      throw new FormatError(`item numbers must run 1..${catalog.length} in order, found ${item.itemNumber} at ${idx + 1}`);
    }
  });
  return catalog;
};
