import { MASK_WEBDRIVER_SCRIPT, type BrowserSession } from "../browser/types.js";
import { FIRST_DATA_ROW, type ProfileTable, type SheetStore } from "../sheets/table.js";
import type { Pacing, Timeouts } from "./config.js";
import type { ExtractionContext, Pause } from "./context.js";
import { extractPhones } from "./extractor.js";
import { errorMessage, type Logger } from "./logger.js";
import type { PhonePolicy } from "./normalize.js";
import type { RunLog } from "./run-log.js";

export const PHONE1 = "Phone1";
export const PHONE2 = "Phone2";
export const NO_URL = "No URL";
export const NO_PHONE = "No phone found";
export const ERROR_PREFIX = "Error: ";

export const DEFAULT_CHECKPOINT_EVERY = 10;

export interface ProcessOptions {
  /** Sheet row number to start at; row 1 is the header (default 2) */
  startRow?: number;
  /** Process at most this many rows */
  maxRows?: number;
  /** Header of the URL column (default: first column) */
  urlColumn?: string;
  /** Save after this many successfully processed rows (default 10) */
  checkpointEvery?: number;
  /** Checked before each row; the run stops, saves and closes the browser once aborted */
  signal?: AbortSignal;
}

export interface ProcessDeps {
  openSession: () => Promise<BrowserSession>;
  log: Logger;
  policy: PhonePolicy;
  pacing: Pacing;
  timeouts: Timeouts;
  pause: Pause;
  runLog?: RunLog;
  extract?: typeof extractPhones;
}

export interface RunSummary {
  startRow: number;
  endRow: number;
  processed: number;
  noUrl: number;
  noPhone: number;
  failed: number;
  checkpoints: number;
  aborted: boolean;
}

/** Profile URLs in the sheet often lack a scheme */
export function normalizeUrl(raw: string): string {
  const url = raw.trim();
  if (url.startsWith("http")) return url;
  return `https://${url.replace(/^\/+/, "")}`;
}

function resolveUrlColumn(table: ProfileTable, name?: string): number {
  if (name === undefined) return 0;
  const index = table.column(name);
  if (index === -1) {
    throw new Error(`URL column "${name}" not found. Columns: ${table.headers.join(", ")}`);
  }
  return index;
}

/**
 * Fill Phone1/Phone2 for a window of rows, one browser session for the whole
 * run. Failures stay inside their row; only an unreadable sheet or a browser
 * that won't start end the run early.
 */
export async function processSheet(
  store: SheetStore,
  options: ProcessOptions,
  deps: ProcessDeps
): Promise<RunSummary> {
  const { log, runLog } = deps;
  const extract = deps.extract ?? extractPhones;
  const every = options.checkpointEvery ?? DEFAULT_CHECKPOINT_EVERY;

  log.info(`Reading ${store.path}`);
  const table = await store.load();
  if (table.rowCount === 0) {
    throw new Error(`No data rows in ${store.path}`);
  }

  const urlColumn = resolveUrlColumn(table, options.urlColumn);
  const phone1 = table.ensureColumn(PHONE1);
  const phone2 = table.ensureColumn(PHONE2);
  log.info(`Found ${table.rowCount} rows`);

  const startRow = options.startRow ?? FIRST_DATA_ROW;
  if (!Number.isInteger(startRow) || startRow < FIRST_DATA_ROW) {
    throw new Error(`Start row must be ${FIRST_DATA_ROW} or later (row 1 is the header), got ${startRow}`);
  }
  const endRow =
    options.maxRows !== undefined
      ? Math.min(table.lastRow, startRow + options.maxRows - 1)
      : table.lastRow;

  const summary: RunSummary = {
    startRow,
    endRow,
    processed: 0,
    noUrl: 0,
    noPhone: 0,
    failed: 0,
    checkpoints: 0,
    aborted: false,
  };
  const total = Math.max(0, endRow - startRow + 1);
  const started = Date.now();
  runLog?.logStart({ sheet: store.path, startRow, endRow });

  if (total === 0) {
    log.warn(`Nothing to do: start row ${startRow} is past the last row ${table.lastRow}`);
    await store.save(table);
    runLog?.logEnd({ ...summary }, Date.now() - started);
    return summary;
  }

  let session: BrowserSession | null = null;
  let saveError: unknown = null;

  try {
    session = await deps.openSession();
    await session.injectScript(MASK_WEBDRIVER_SCRIPT);

    const ctx: ExtractionContext = {
      session,
      log,
      policy: deps.policy,
      pacing: deps.pacing,
      timeouts: deps.timeouts,
      pause: deps.pause,
    };

    for (let row = startRow; row <= endRow; row++) {
      if (options.signal?.aborted) {
        summary.aborted = true;
        log.warn(`Stopped before row ${row}`);
        break;
      }

      try {
        const raw = table.get(row, urlColumn).trim();
        if (!raw) {
          log.warn(`No URL found in row ${row}`);
          table.set(row, phone1, NO_URL);
          summary.noUrl++;
          runLog?.logRow(row, "no_url", []);
          continue;
        }

        const phones = await extract(ctx, normalizeUrl(raw), row);
        table.set(row, phone1, phones[0] ?? NO_PHONE);
        table.set(row, phone2, phones[1] ?? "");
        if (phones.length === 0) summary.noPhone++;
        summary.processed++;
        runLog?.logRow(row, phones.length ? "phones" : "no_phone", phones);
        log.info(`Processed ${summary.processed}/${total} profiles`);
      } catch (err) {
        log.error(`Error processing row ${row}`, err);
        table.set(row, phone1, `${ERROR_PREFIX}${errorMessage(err)}`);
        summary.failed++;
        runLog?.logRow(row, "error", [], errorMessage(err));
        continue;
      }

      if (summary.processed % every === 0) {
        await store.save(table);
        summary.checkpoints++;
        runLog?.logCheckpoint(summary.processed);
        log.info(`Progress saved after ${summary.processed} records`);
      }

      if (row < endRow) await deps.pause(deps.pacing.betweenRows);
    }
  } finally {
    try {
      await store.save(table);
      log.info(`Saved ${store.path}. Updated ${summary.processed} records.`);
    } catch (err) {
      log.error(`Could not save ${store.path}`, err);
      saveError = err;
    }

    if (session) {
      try {
        await session.close();
        log.info("Browser closed");
      } catch (err) {
        log.error("Could not close the browser", err);
      }
    }
  }

  if (saveError) throw saveError;
  runLog?.logEnd({ ...summary }, Date.now() - started);
  return summary;
}
