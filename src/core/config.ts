import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { DEFAULT_PHONE_POLICY, type PhonePolicy } from "./normalize.js";

const HOME = process.env.HOME ?? process.env.USERPROFILE ?? "~";

/** ~/.phone-sweep, or PHONE_SWEEP_HOME when set */
export function appHome(): string {
  return process.env.PHONE_SWEEP_HOME ?? join(HOME, ".phone-sweep");
}

export function configPath(): string {
  return join(appHome(), "config.json");
}

export interface SweepConfig {
  headless: boolean;
  proxy?: string;
  /** Chrome/Chromium executable; falls back to CHROME_PATH, then playwright's own install */
  browserPath?: string;
  checkpointEvery: number;
  phone: PhonePolicy;
}

const DEFAULT_CONFIG: SweepConfig = {
  headless: true,
  checkpointEvery: 10,
  phone: DEFAULT_PHONE_POLICY,
};

/** A [min, max] range in ms; a random point inside it is picked per pause */
export type PauseRange = readonly [number, number];

export interface Pacing {
  settle: PauseRange;
  afterReveal: PauseRange;
  afterPanel: PauseRange;
  afterClose: PauseRange;
  betweenContainers: PauseRange;
  betweenRows: PauseRange;
}

export interface Timeouts {
  navigationMs: number;
  pageMs: number;
  containersMs: number;
  panelMs: number;
}

export const DEFAULT_PACING: Pacing = {
  settle: [2000, 4000],
  afterReveal: [3000, 3000],
  afterPanel: [1000, 1000],
  afterClose: [2000, 2000],
  betweenContainers: [2000, 3000],
  betweenRows: [3000, 6000],
};

export const DEFAULT_TIMEOUTS: Timeouts = {
  navigationMs: 30_000,
  pageMs: 10_000,
  containersMs: 5_000,
  panelMs: 10_000,
};

export const CONFIG_KEYS = ["proxy", "headless", "browser-path", "checkpoint-every", "phone-groups"] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

function readPolicy(value: unknown): PhonePolicy | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  if (!("digits" in value) || !("groups" in value)) return undefined;
  const { digits, groups } = value;
  if (typeof digits !== "number" || !Array.isArray(groups)) return undefined;

  const sizes: number[] = [];
  for (const g of groups) {
    if (typeof g !== "number" || !Number.isInteger(g) || g <= 0) return undefined;
    sizes.push(g);
  }
  if (sizes.reduce((sum, g) => sum + g, 0) !== digits) return undefined;
  return { digits, groups: sizes };
}

/** Keep only well-typed fields from a parsed config file */
function fromJson(parsed: unknown): Partial<SweepConfig> {
  if (typeof parsed !== "object" || parsed === null) return {};
  const out: Partial<SweepConfig> = {};

  if ("headless" in parsed && typeof parsed.headless === "boolean") out.headless = parsed.headless;
  if ("proxy" in parsed && typeof parsed.proxy === "string") out.proxy = parsed.proxy;
  if ("browserPath" in parsed && typeof parsed.browserPath === "string") out.browserPath = parsed.browserPath;
  if (
    "checkpointEvery" in parsed &&
    typeof parsed.checkpointEvery === "number" &&
    Number.isInteger(parsed.checkpointEvery) &&
    parsed.checkpointEvery > 0
  ) {
    out.checkpointEvery = parsed.checkpointEvery;
  }
  if ("phone" in parsed) {
    const phone = readPolicy(parsed.phone);
    if (phone) out.phone = phone;
  }
  return out;
}

/** Read config from disk. Returns defaults if the file doesn't exist or can't be parsed. */
export function loadConfig(path: string = configPath()): SweepConfig {
  if (!existsSync(path)) {
    return { ...DEFAULT_CONFIG };
  }
  try {
    const raw = readFileSync(path, "utf-8");
    return { ...DEFAULT_CONFIG, ...fromJson(JSON.parse(raw)) };
  } catch {
    return { ...DEFAULT_CONFIG };
  }
}

/** Write config to disk. Creates parent dirs if needed. */
export function saveConfig(config: SweepConfig, path: string = configPath()): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

/** Parse a positive integer CLI/config value */
export function parsePositiveInt(value: string, label: string): number {
  const n = /^\d+$/.test(value.trim()) ? Number(value.trim()) : NaN;
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`Invalid ${label}: "${value}". Expected a positive integer`);
  }
  return n;
}

export function parseBoolean(value: string, label: string): boolean {
  const v = value.trim().toLowerCase();
  if (["true", "yes", "on", "1"].includes(v)) return true;
  if (["false", "no", "off", "0"].includes(v)) return false;
  throw new Error(`Invalid ${label}: "${value}". Expected true or false`);
}
