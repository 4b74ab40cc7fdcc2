import { setTimeout as sleep } from "node:timers/promises";
import type { BrowserSession } from "../browser/types.js";
import type { Logger } from "./logger.js";
import type { PhonePolicy } from "./normalize.js";
import type { Pacing, PauseRange, Timeouts } from "./config.js";

export type Pause = (range: PauseRange) => Promise<void>;

/** Everything one extraction needs, passed explicitly instead of held in module state */
export interface ExtractionContext {
  session: BrowserSession;
  log: Logger;
  policy: PhonePolicy;
  pacing: Pacing;
  timeouts: Timeouts;
  pause: Pause;
}

/** Wait a uniformly random time inside the range */
export function randomPause(
  random: () => number = Math.random,
  wait: (ms: number) => Promise<unknown> = sleep
): Pause {
  return async ([min, max]) => {
    const ms = min + (max - min) * random();
    if (ms > 0) await wait(ms);
  };
}

export const noPause: Pause = async () => {};
