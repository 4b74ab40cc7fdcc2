import { describe, it, expect } from "vitest";
import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { RunLog, findLastRun } from "../../src/core/run-log.js";
import { tmpDir } from "./helpers.js";

describe("Run log", () => {
  it("appends one JSON line per event", () => {
    const dir = tmpDir("test-runlog");
    const log = new RunLog("/data/doctors.xlsx", dir);

    log.logStart({ sheet: "/data/doctors.xlsx", startRow: 2, endRow: 3 });
    log.logRow(2, "phones", ["55 1234 5678"]);
    log.logRow(3, "error", [], "boom");
    log.logCheckpoint(1);
    log.logEnd({ processed: 1 }, 1500);

    expect(log.path.endsWith("_doctors.xlsx.jsonl")).toBe(true);
    const entries = readFileSync(log.path, "utf-8").trim().split("\n").map((l) => JSON.parse(l));
    expect(entries.map((e) => e.type)).toEqual(["run_start", "row", "row", "checkpoint", "run_end"]);
    expect(entries[1]).toMatchObject({ row: 2, outcome: "phones", phones: ["55 1234 5678"], detail: null });
    expect(entries[2]).toMatchObject({ row: 3, outcome: "error", detail: "boom" });
    expect(entries[4]).toMatchObject({ processed: 1, durationMs: 1500 });
  });

  it("finds the latest run for a sheet", () => {
    const dir = tmpDir("test-runlog-last");
    writeFileSync(
      join(dir, "2024-01-01T00-00-00-000Z_doctors.xlsx.jsonl"),
      '{"type":"run_start","timestamp":"2024-01-01T00:00:00.000Z"}\n{"type":"row","row":2}\n{"type":"run_end"}\n'
    );
    writeFileSync(
      join(dir, "2024-02-01T00-00-00-000Z_doctors.xlsx.jsonl"),
      '{"type":"run_start","timestamp":"2024-02-01T00:00:00.000Z"}\n{"type":"row","row":2}\n{"type":"row","row":3}\n{"type":"ro'
    );
    writeFileSync(join(dir, "2024-03-01T00-00-00-000Z_other.csv.jsonl"), '{"type":"run_end"}\n');

    const last = findLastRun("/elsewhere/doctors.xlsx", dir);

    expect(last).toEqual({
      file: join(dir, "2024-02-01T00-00-00-000Z_doctors.xlsx.jsonl"),
      startedAt: "2024-02-01T00:00:00.000Z",
      rows: 2,
      finished: false,
    });
  });

  it("returns null when there is no run for the sheet", () => {
    expect(findLastRun("doctors.xlsx", tmpDir("test-runlog-empty"))).toBeNull();
  });
});
