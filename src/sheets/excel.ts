import ExcelJS from "exceljs";
import type { CellValue, Workbook, Worksheet } from "exceljs";
import { existsSync } from "node:fs";
import { ProfileTable, FIRST_DATA_ROW, type SheetStore } from "./table.js";

/** Plain text for any exceljs cell value; hyperlinks give their target */
export function cellText(value: CellValue): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  if (typeof value !== "object") return String(value);

  if ("hyperlink" in value) return value.hyperlink;
  if ("richText" in value) return value.richText.map((run) => run.text).join("");
  if ("formula" in value || "sharedFormula" in value) return cellText(value.result ?? null);
  if ("error" in value) return String(value.error);
  return "";
}

/** Headers name columns, so a hyperlinked header gives its text */
export function headerText(value: CellValue): string {
  if (typeof value === "object" && value !== null && !(value instanceof Date) && "hyperlink" in value) {
    return value.text;
  }
  return cellText(value);
}

/**
 * First worksheet of an .xlsx file. The loaded workbook is kept so that a save
 * only rewrites the columns this run wrote to; other cells, sheets and styling
 * stay as they were.
 */
export class ExcelSheetStore implements SheetStore {
  readonly format = "excel" as const;
  private workbook: Workbook | null = null;

  constructor(readonly path: string) {}

  private sheet(workbook: Workbook): Worksheet {
    const sheet = workbook.worksheets[0];
    if (!sheet) throw new Error(`No worksheets in ${this.path}`);
    return sheet;
  }

  async load(): Promise<ProfileTable> {
    if (!existsSync(this.path)) {
      throw new Error(`File not found: ${this.path}`);
    }

    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.readFile(this.path);
    } catch (err) {
      throw new Error(`Excel parsing failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    const sheet = this.sheet(workbook);

    const headerRow = sheet.getRow(1);
    const width = headerRow.cellCount;
    const headers: string[] = [];
    for (let c = 1; c <= width; c++) {
      headers.push(headerText(headerRow.getCell(c).value).trim() || `Col${c}`);
    }

    const rows: string[][] = [];
    for (let r = FIRST_DATA_ROW; r <= sheet.rowCount; r++) {
      const row = sheet.getRow(r);
      const values: string[] = [];
      for (let c = 1; c <= width; c++) {
        values.push(cellText(row.getCell(c).value).trim());
      }
      rows.push(values);
    }

    // Trailing rows that only carry formatting are not data
    while (rows.length > 0 && rows[rows.length - 1]?.every((v) => v === "")) {
      rows.pop();
    }

    this.workbook = workbook;
    return new ProfileTable(headers, rows);
  }

  async save(table: ProfileTable): Promise<void> {
    if (!this.workbook) {
      throw new Error(`Cannot save ${this.path} before it is loaded`);
    }
    const sheet = this.sheet(this.workbook);

    for (const c of table.touchedColumns) {
      sheet.getRow(1).getCell(c + 1).value = table.headers[c] ?? "";
      table.rows.forEach((values, i) => {
        const text = values[c] ?? "";
        sheet.getRow(FIRST_DATA_ROW + i).getCell(c + 1).value = text === "" ? null : text;
      });
    }

    await this.workbook.xlsx.writeFile(this.path);
  }
}
