import { Command } from "commander";
import { extract, type ExtractCliOptions } from "./commands/extract.js";
import { status } from "./commands/status.js";
import { configShow, configSet } from "./commands/config.js";
import { CONFIG_KEYS } from "./core/config.js";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("phone-sweep")
    .description("Reveal and collect phone numbers from the profile pages listed in a spreadsheet")
    .version(VERSION);

  program
    .command("extract <file>")
    .description("Visit each profile URL in an .xlsx/.csv file and write Phone1/Phone2 back into it")
    .option("-s, --start-row <number>", "Sheet row to start at; row 1 is the header (default: 2)")
    .option("-m, --max-rows <number>", "Process at most this many rows")
    .option("-u, --url-column <header>", "Header of the column holding profile URLs (default: first column)")
    .option("-p, --proxy <address>", "Route the browser through a proxy (host:port)")
    .option("--headed", "Show the browser window")
    .option("-c, --checkpoint-every <number>", "Save after this many processed rows (default: 10)")
    .action(async (file: string, options: ExtractCliOptions) => {
      await extract(file, options);
    });

  program
    .command("status <file>")
    .description("Count filled, failed and pending rows in a spreadsheet")
    .action(async (file: string) => {
      await status(file);
    });

  const configCmd = program
    .command("config")
    .description("View and modify configuration");

  configCmd
    .command("show")
    .description("Show current configuration")
    .action(async () => {
      await configShow();
    });

  configCmd
    .command("set <key> <value>")
    .description(`Set a config value (${CONFIG_KEYS.join(", ")})`)
    .action(async (key: string, value: string) => {
      await configSet(key, value);
    });

  // `phone-sweep config` with no subcommand → show
  configCmd.action(async () => {
    await configShow();
  });

  return program;
}
