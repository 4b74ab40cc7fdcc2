import { describe, it, expect } from "vitest";
import { randomPause } from "../../src/core/context.js";

function recordingPause(random: () => number) {
  const waits: number[] = [];
  const pause = randomPause(random, async (ms) => {
    waits.push(ms);
  });
  return { pause, waits };
}

describe("Random pause", () => {
  it("waits inside the range", async () => {
    const { pause, waits } = recordingPause(() => 0.5);

    await pause([2000, 4000]);
    await pause([3000, 3000]);

    expect(waits).toEqual([3000, 3000]);
  });

  it("covers both ends of the range", async () => {
    const low = recordingPause(() => 0);
    const high = recordingPause(() => 1);

    await low.pause([1000, 2000]);
    await high.pause([1000, 2000]);

    expect(low.waits).toEqual([1000]);
    expect(high.waits).toEqual([2000]);
  });

  it("skips the wait for an empty range", async () => {
    const { pause, waits } = recordingPause(() => 0.5);

    await pause([0, 0]);

    expect(waits).toEqual([]);
  });
});
