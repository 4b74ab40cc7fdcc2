import { appendFileSync, mkdirSync, existsSync, readdirSync, readFileSync } from "node:fs";
import { join, basename } from "node:path";
import { appHome } from "./config.js";

export function runsDir(): string {
  return join(appHome(), "runs");
}

export interface RunLogEntry {
  type: "run_start" | "row" | "checkpoint" | "run_end";
  timestamp: string;
  [key: string]: unknown;
}

export type RowOutcome = "phones" | "no_phone" | "no_url" | "error";

/**
 * RunLog appends JSONL to a per-run journal file.
 * Each write is appendFileSync, so an interrupted run keeps every line written so far.
 */
export class RunLog {
  private filepath: string;

  constructor(sheetPath: string, runsDirectory?: string) {
    const dir = runsDirectory ?? runsDir();
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

    const ts = new Date().toISOString().replace(/[:.]/g, "-");
    this.filepath = join(dir, `${ts}_${basename(sheetPath)}.jsonl`);
  }

  get path(): string {
    return this.filepath;
  }

  private append(entry: RunLogEntry): void {
    appendFileSync(this.filepath, JSON.stringify(entry) + "\n", "utf-8");
  }

  logStart(metadata: { sheet: string; startRow: number; endRow: number }): void {
    this.append({ type: "run_start", timestamp: new Date().toISOString(), ...metadata });
  }

  logRow(row: number, outcome: RowOutcome, phones: string[], detail?: string): void {
    this.append({
      type: "row",
      timestamp: new Date().toISOString(),
      row,
      outcome,
      phones,
      detail: detail ?? null,
    });
  }

  logCheckpoint(processed: number): void {
    this.append({ type: "checkpoint", timestamp: new Date().toISOString(), processed });
  }

  logEnd(summary: Record<string, unknown>, durationMs: number): void {
    this.append({ type: "run_end", timestamp: new Date().toISOString(), ...summary, durationMs });
  }
}

export interface LastRun {
  file: string;
  startedAt: string;
  rows: number;
  finished: boolean;
}

/** Most recent journal for a spreadsheet, by file name */
export function findLastRun(sheetPath: string, runsDirectory?: string): LastRun | null {
  const dir = runsDirectory ?? runsDir();
  if (!existsSync(dir)) return null;

  const suffix = `_${basename(sheetPath)}.jsonl`;
  const files = readdirSync(dir)
    .filter((f) => f.endsWith(suffix))
    .sort();
  const latest = files[files.length - 1];
  if (!latest) return null;

  const lines = readFileSync(join(dir, latest), "utf-8").trim().split("\n");
  let startedAt = "";
  let rows = 0;
  let finished = false;

  for (const line of lines) {
    if (!line) continue;
    let entry: unknown;
    try {
      entry = JSON.parse(line);
    } catch {
      continue; // torn last line of an interrupted run
    }
    if (typeof entry !== "object" || entry === null || !("type" in entry)) continue;
    if (entry.type === "run_start" && "timestamp" in entry && typeof entry.timestamp === "string") {
      startedAt = entry.timestamp;
    }
    if (entry.type === "row") rows++;
    if (entry.type === "run_end") finished = true;
  }

  return { file: join(dir, latest), startedAt, rows, finished };
}
