/**
 * Shared test helpers: a silent extraction context and a logger that records
 * what it was asked to print.
 */
import { mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import type { BrowserSession } from "../../src/browser/types.js";
import { DEFAULT_PACING, DEFAULT_TIMEOUTS } from "../../src/core/config.js";
import { noPause, type ExtractionContext } from "../../src/core/context.js";
import { Logger, type LogLevel } from "../../src/core/logger.js";
import { DEFAULT_PHONE_POLICY } from "../../src/core/normalize.js";

export interface CapturedLog {
  log: Logger;
  lines: { level: LogLevel; line: string }[];
  at(level: LogLevel): string[];
}

export function captureLogger(): CapturedLog {
  const lines: { level: LogLevel; line: string }[] = [];
  const log = new Logger({
    prefix: "[test]",
    enabled: true,
    sink: (level, line) => lines.push({ level, line }),
  });
  return {
    log,
    lines,
    at: (level) => lines.filter((l) => l.level === level).map((l) => l.line),
  };
}

export function testContext(session: BrowserSession, log: Logger = new Logger({ enabled: false })): ExtractionContext {
  return {
    session,
    log,
    policy: DEFAULT_PHONE_POLICY,
    pacing: DEFAULT_PACING,
    timeouts: DEFAULT_TIMEOUTS,
    pause: noPause,
  };
}

/** Fresh directory under tmp/ for one test file */
export function tmpDir(name: string): string {
  const dir = join("tmp", name);
  rmSync(dir, { recursive: true, force: true });
  mkdirSync(dir, { recursive: true });
  return dir;
}
