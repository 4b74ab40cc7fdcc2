import {
  loadConfig,
  saveConfig,
  configPath,
  isConfigKey,
  parseBoolean,
  parsePositiveInt,
  CONFIG_KEYS,
  type SweepConfig,
} from "../core/config.js";
import { formatPolicy, parsePhonePolicy } from "../core/normalize.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export async function configShow(): Promise<void> {
  const cfg = loadConfig();

  console.log(`${BOLD}phone-sweep configuration${RESET}`);
  console.log(`${DIM}${configPath()}${RESET}\n`);

  console.log(`  Headless:          ${cfg.headless}`);
  console.log(`  Proxy:             ${cfg.proxy ?? "(none)"}`);
  console.log(`  Browser path:      ${cfg.browserPath ?? "(playwright default)"}`);
  console.log(`  Checkpoint every:  ${cfg.checkpointEvery} rows`);
  console.log(`  Phone groups:      ${formatPolicy(cfg.phone)} (${cfg.phone.digits} digits)`);
}

/** Apply one `config set` to a config object. Throws with a user-facing message on bad input. */
export function applySetting(cfg: SweepConfig, key: string, value: string): SweepConfig {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: "${key}"\nValid keys: ${CONFIG_KEYS.join(", ")}`);
  }

  switch (key) {
    case "proxy":
      return { ...cfg, proxy: value === "" || value === "none" ? undefined : value };
    case "headless":
      return { ...cfg, headless: parseBoolean(value, "headless") };
    case "browser-path":
      return { ...cfg, browserPath: value === "" ? undefined : value };
    case "checkpoint-every":
      return { ...cfg, checkpointEvery: parsePositiveInt(value, "checkpoint-every") };
    case "phone-groups":
      return { ...cfg, phone: parsePhonePolicy(value) };
  }
}

export async function configSet(key: string, value: string): Promise<void> {
  try {
    const next = applySetting(loadConfig(), key, value);
    saveConfig(next);
    console.log(`${key} set to: ${value}`);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}
