/**
 * A header row plus data rows, all cells as text. Row numbers used by callers
 * are sheet row numbers: the header is row 1, the first data row is row 2.
 */
export const FIRST_DATA_ROW = 2;

export class ProfileTable {
  readonly headers: string[];
  readonly rows: string[][];
  /** Columns written through set() or ensureColumn(); the xlsx store rewrites only these */
  private readonly touched = new Set<number>();

  constructor(headers: string[], rows: string[][]) {
    this.headers = headers;
    this.rows = rows;
  }

  get rowCount(): number {
    return this.rows.length;
  }

  get lastRow(): number {
    return FIRST_DATA_ROW + this.rows.length - 1;
  }

  get touchedColumns(): number[] {
    return [...this.touched].sort((a, b) => a - b);
  }

  /** Column index by header (exact, then case-insensitive), or -1 */
  column(name: string): number {
    const exact = this.headers.indexOf(name);
    if (exact !== -1) return exact;
    const lower = name.toLowerCase();
    return this.headers.findIndex((h) => h.trim().toLowerCase() === lower);
  }

  /** Index of the named column, appending it (blank in every row) if absent */
  ensureColumn(name: string): number {
    const existing = this.column(name);
    if (existing !== -1) return existing;

    this.headers.push(name);
    const index = this.headers.length - 1;
    this.touched.add(index);
    return index;
  }

  private dataIndex(rowNumber: number): number {
    const index = rowNumber - FIRST_DATA_ROW;
    if (index < 0 || index >= this.rows.length) {
      throw new Error(`Row ${rowNumber} is outside the sheet (rows ${FIRST_DATA_ROW}-${this.lastRow})`);
    }
    return index;
  }

  get(rowNumber: number, column: number): string {
    return this.rows[this.dataIndex(rowNumber)]?.[column] ?? "";
  }

  set(rowNumber: number, column: number, value: string): void {
    const row = this.rows[this.dataIndex(rowNumber)];
    if (!row) return;
    while (row.length <= column) row.push("");
    row[column] = value;
    this.touched.add(column);
  }
}

export type SheetFormat = "excel" | "csv";

/** Reads a spreadsheet into a table and writes it back to the same file */
export interface SheetStore {
  readonly path: string;
  readonly format: SheetFormat;
  load(): Promise<ProfileTable>;
  save(table: ProfileTable): Promise<void>;
}
