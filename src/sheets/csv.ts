import Papa from "papaparse";
import { readFile, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { Logger } from "../core/logger.js";
import { ProfileTable, type SheetStore } from "./table.js";

export class CsvSheetStore implements SheetStore {
  readonly format = "csv" as const;

  constructor(
    readonly path: string,
    private readonly log: Logger = new Logger()
  ) {}

  async load(): Promise<ProfileTable> {
    if (!existsSync(this.path)) {
      throw new Error(`File not found: ${this.path}`);
    }

    const raw = await readFile(this.path, "utf-8");
    // Blank lines are rows with a blank URL; dropping them would shift row numbers
    const parsed = Papa.parse<string[]>(raw, { delimiter: ",", skipEmptyLines: false });

    const firstErr = parsed.errors[0];
    if (firstErr) {
      this.log.warn(`CSV parse warning (row ${firstErr.row}): ${firstErr.message}`);
    }

    const [headers = [], ...data] = parsed.data;
    const width = headers.length;
    const rows = data.map((row) => {
      const values = row.map((v) => v.trim());
      while (values.length < width) values.push("");
      return values;
    });

    while (rows.length > 0 && rows[rows.length - 1]?.every((v) => v === "")) {
      rows.pop();
    }

    return new ProfileTable(
      headers.map((h, i) => h.trim() || `Col${i + 1}`),
      rows
    );
  }

  async save(table: ProfileTable): Promise<void> {
    const width = table.headers.length;
    const rows = table.rows.map((row) => {
      const values = [...row];
      while (values.length < width) values.push("");
      return values;
    });
    await writeFile(this.path, Papa.unparse([table.headers, ...rows], { newline: "\n" }) + "\n", "utf-8");
  }
}
