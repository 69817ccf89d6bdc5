import { readFile } from "node:fs/promises";
import { extname } from "node:path";

export type PhotoImage = {
  data: Buffer;
  mimeType: "image/jpeg" | "image/png";
};

export const mimeTypeFor = (path: string): PhotoImage["mimeType"] =>
  extname(path).toLowerCase() === ".png" ? "image/png" : "image/jpeg";

export const loadPhoto = async (path: string): Promise<PhotoImage> => ({
  data: await readFile(path),
  mimeType: mimeTypeFor(path),
});
