import { resolve } from "node:path";
import { ERROR_PREFIX, NO_PHONE, NO_URL, PHONE1 } from "../core/processor.js";
import { findLastRun } from "../core/run-log.js";
import { openSheet, FIRST_DATA_ROW, type ProfileTable } from "../sheets/index.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export interface SheetStats {
  rows: number;
  withPhone: number;
  noPhone: number;
  noUrl: number;
  errors: number;
  pending: number;
  /** First row with an empty Phone1, a good --start-row for resuming */
  nextPending: number | null;
}

/** Tally Phone1 outcomes across a table */
export function sheetStats(table: ProfileTable): SheetStats {
  const stats: SheetStats = {
    rows: table.rowCount,
    withPhone: 0,
    noPhone: 0,
    noUrl: 0,
    errors: 0,
    pending: 0,
    nextPending: null,
  };
  const col = table.column(PHONE1);

  for (let row = FIRST_DATA_ROW; row <= table.lastRow; row++) {
    const value = col === -1 ? "" : table.get(row, col).trim();
    if (value === "") {
      stats.pending++;
      stats.nextPending ??= row;
    } else if (value === NO_PHONE) stats.noPhone++;
    else if (value === NO_URL) stats.noUrl++;
    else if (value.startsWith(ERROR_PREFIX)) stats.errors++;
    else stats.withPhone++;
  }

  return stats;
}

export async function status(file: string): Promise<void> {
  let table: ProfileTable;
  const path = resolve(file);
  try {
    table = await openSheet(path).load();
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
    return;
  }

  const stats = sheetStats(table);
  console.log(`${BOLD}${file}${RESET}`);
  console.log(`  Rows:        ${stats.rows}`);
  console.log(`  With phone:  ${stats.withPhone}`);
  console.log(`  No phone:    ${stats.noPhone}`);
  console.log(`  No URL:      ${stats.noUrl}`);
  console.log(`  Errors:      ${stats.errors}`);
  console.log(`  Pending:     ${stats.pending}`);
  if (stats.nextPending !== null) {
    console.log(`${DIM}  Resume with: phone-sweep extract ${file} --start-row ${stats.nextPending}${RESET}`);
  }

  const last = findLastRun(path);
  if (last) {
    const state = last.finished ? "finished" : "interrupted";
    console.log(`\n  Last run:    ${last.startedAt} (${last.rows} rows, ${state})`);
    console.log(`${DIM}  ${last.file}${RESET}`);
  }
}
