import { resolve } from "node:path";
import { PlaywrightSession } from "../browser/playwright.js";
import {
  loadConfig,
  parsePositiveInt,
  DEFAULT_PACING,
  DEFAULT_TIMEOUTS,
  type SweepConfig,
} from "../core/config.js";
import { randomPause } from "../core/context.js";
import { errorMessage, Logger } from "../core/logger.js";
import { processSheet, type ProcessOptions, type RunSummary } from "../core/processor.js";
import { RunLog } from "../core/run-log.js";
import { openSheet } from "../sheets/index.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

/** Raw commander options for `extract` */
export interface ExtractCliOptions {
  startRow?: string;
  maxRows?: string;
  urlColumn?: string;
  proxy?: string;
  headed?: boolean;
  checkpointEvery?: string;
}

export interface ResolvedRun {
  process: Omit<ProcessOptions, "signal">;
  headless: boolean;
  proxy?: string;
  browserPath?: string;
}

/** CLI flags > config file > defaults */
export function resolveRun(cli: ExtractCliOptions, config: SweepConfig): ResolvedRun {
  return {
    process: {
      startRow: cli.startRow !== undefined ? parsePositiveInt(cli.startRow, "start row") : undefined,
      maxRows: cli.maxRows !== undefined ? parsePositiveInt(cli.maxRows, "max rows") : undefined,
      urlColumn: cli.urlColumn,
      checkpointEvery:
        cli.checkpointEvery !== undefined
          ? parsePositiveInt(cli.checkpointEvery, "checkpoint interval")
          : config.checkpointEvery,
    },
    headless: cli.headed ? false : config.headless,
    proxy: cli.proxy ?? config.proxy,
    browserPath: config.browserPath ?? process.env.CHROME_PATH,
  };
}

export function formatSummary(summary: RunSummary): string {
  const lines = [
    `  Rows:        ${summary.startRow}-${summary.endRow}`,
    `  Processed:   ${summary.processed}`,
    `  No phone:    ${summary.noPhone}`,
    `  No URL:      ${summary.noUrl}`,
    `  Errors:      ${summary.failed}`,
    `  Checkpoints: ${summary.checkpoints}`,
  ];
  if (summary.aborted) lines.push(`  Stopped early (interrupted)`);
  return lines.join("\n");
}

export async function extract(file: string, cli: ExtractCliOptions): Promise<void> {
  const log = new Logger({ enabled: true });
  const controller = new AbortController();

  const onSignal = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    console.warn("\nStopping after the current row (press Ctrl-C again to quit now)...");
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    const config = loadConfig();
    const run = resolveRun(cli, config);
    const store = openSheet(resolve(file), log);
    const runLog = new RunLog(store.path);

    if (run.proxy) log.info(`Using proxy: ${run.proxy}`);

    const summary = await processSheet(
      store,
      { ...run.process, signal: controller.signal },
      {
        openSession: () =>
          PlaywrightSession.launch({
            headless: run.headless,
            proxy: run.proxy,
            executablePath: run.browserPath,
            navigationTimeoutMs: DEFAULT_TIMEOUTS.navigationMs,
          }),
        log,
        policy: config.phone,
        pacing: DEFAULT_PACING,
        timeouts: DEFAULT_TIMEOUTS,
        pause: randomPause(),
        runLog,
      }
    );

    console.log(`\n${BOLD}Phone extraction completed successfully!${RESET}`);
    console.log(formatSummary(summary));
    console.log(`${DIM}Run log: ${runLog.path}${RESET}`);
  } catch (err) {
    log.error("Main execution error", err);
    console.error(`An error occurred: ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}
