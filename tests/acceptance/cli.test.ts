import { describe, it, expect } from "vitest";
import { createProgram, VERSION } from "../../src/cli.js";
import { formatSummary, resolveRun } from "../../src/commands/extract.js";
import { sheetStats } from "../../src/commands/status.js";
import { DEFAULT_PHONE_POLICY } from "../../src/core/normalize.js";
import { ProfileTable } from "../../src/sheets/table.js";

const config = {
  headless: true,
  proxy: "10.0.0.2:3128",
  browserPath: "/opt/chromium/chrome",
  checkpointEvery: 10,
  phone: DEFAULT_PHONE_POLICY,
};

describe("CLI", () => {
  it("registers extract, status and config", () => {
    const program = createProgram();
    expect(program.name()).toBe("phone-sweep");
    expect(program.version()).toBe(VERSION);
    expect(program.commands.map((c) => c.name())).toEqual(["extract", "status", "config"]);
  });

  it("documents the extract options", () => {
    const extract = createProgram().commands.find((c) => c.name() === "extract");
    const help = extract?.helpInformation() ?? "";
    for (const flag of ["--start-row", "--max-rows", "--url-column", "--proxy", "--headed", "--checkpoint-every"]) {
      expect(help).toContain(flag);
    }
  });
});

describe("extract options", () => {
  it("uses config values when no flags are given", () => {
    expect(resolveRun({}, config)).toEqual({
      process: { startRow: undefined, maxRows: undefined, urlColumn: undefined, checkpointEvery: 10 },
      headless: true,
      proxy: "10.0.0.2:3128",
      browserPath: "/opt/chromium/chrome",
    });
  });

  it("lets flags override config", () => {
    const run = resolveRun(
      { startRow: "5", maxRows: "50", urlColumn: "Profile", proxy: "10.0.0.9:8080", headed: true, checkpointEvery: "3" },
      config
    );
    expect(run.process).toEqual({ startRow: 5, maxRows: 50, urlColumn: "Profile", checkpointEvery: 3 });
    expect(run.headless).toBe(false);
    expect(run.proxy).toBe("10.0.0.9:8080");
  });

  it("rejects non-numeric row options", () => {
    expect(() => resolveRun({ maxRows: "all" }, config)).toThrow('Invalid max rows: "all"');
  });

  it("summarizes a run", () => {
    const text = formatSummary({
      startRow: 2,
      endRow: 11,
      processed: 8,
      noUrl: 1,
      noPhone: 2,
      failed: 1,
      checkpoints: 0,
      aborted: true,
    });
    expect(text.split("\n")).toEqual([
      "  Rows:        2-11",
      "  Processed:   8",
      "  No phone:    2",
      "  No URL:      1",
      "  Errors:      1",
      "  Checkpoints: 0",
      "  Stopped early (interrupted)",
    ]);
  });
});

describe("status", () => {
  it("tallies Phone1 outcomes and the first pending row", () => {
    const table = new ProfileTable(
      ["Profile", "Phone1", "Phone2"],
      [
        ["a.test", "55 1234 5678", ""],
        ["", "No URL", ""],
        ["c.test", "No phone found", ""],
        ["d.test", "Error: net::ERR_TIMED_OUT", ""],
        ["e.test", "", ""],
        ["f.test", "", ""],
      ]
    );

    expect(sheetStats(table)).toEqual({
      rows: 6,
      withPhone: 1,
      noPhone: 1,
      noUrl: 1,
      errors: 1,
      pending: 2,
      nextPending: 6,
    });
  });

  it("treats a sheet without Phone1 as all pending", () => {
    const stats = sheetStats(new ProfileTable(["Profile"], [["a.test"], ["b.test"]]));
    expect(stats.pending).toBe(2);
    expect(stats.nextPending).toBe(2);
  });
});
