import { extname } from "node:path";
import type { Logger } from "../core/logger.js";
import { CsvSheetStore } from "./csv.js";
import { ExcelSheetStore } from "./excel.js";
import type { SheetStore } from "./table.js";

export const SUPPORTED = [".xlsx", ".csv"] as const;

/** Pick the store for a spreadsheet by its extension */
export function openSheet(path: string, log?: Logger): SheetStore {
  const ext = extname(path).toLowerCase();

  switch (ext) {
    case ".xlsx":
      return new ExcelSheetStore(path);
    case ".csv":
      return new CsvSheetStore(path, log);
    default:
      throw new Error(`Unsupported format '${ext}'. Supported: ${SUPPORTED.join(", ")}`);
  }
}

export { ProfileTable, FIRST_DATA_ROW, type SheetStore, type SheetFormat } from "./table.js";
