import { afterEach, describe, expect, it, jest } from "@jest/globals";

import { checkBudget, elapsedSince, reportProgress, startBudget } from "@/solver/budget";
import { setDebugTopics } from "@/utils/debug";

import { steppingClock, testConfig } from "../test-helpers";

describe("search budget", () => {
  afterEach(() => {
    setDebugTopics(null);
    jest.restoreAllMocks();
  });

  it("trips the iteration cap once the count reaches it", () => {
    const meter = startBudget(testConfig({ maxIterations: 3 }));
    expect(checkBudget(meter, 0)).toBeNull();
    expect(checkBudget(meter, 2)).toBeNull();
    expect(checkBudget(meter, 3)).toBe("iterations");
  });

  it("trips the time limit against the injected clock", () => {
    const meter = startBudget(testConfig({ timeLimitMs: 25 }, steppingClock(10)));
    expect(checkBudget(meter, 0)).toBeNull(); // 10ms
    expect(checkBudget(meter, 1)).toBeNull(); // 20ms
    expect(checkBudget(meter, 2)).toBe("time"); // 30ms
  });

  it("never trips on time without a limit", () => {
    const meter = startBudget(testConfig({ timeLimitMs: null }, steppingClock(1000)));
    expect(checkBudget(meter, 5)).toBeNull();
    expect(elapsedSince(meter)).toBe(1000);
  });

  it("logs progress every progressInterval dequeues", () => {
    setDebugTopics(["solver"]);
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const meter = startBudget(testConfig({ progressInterval: 2 }));

    reportProgress(meter, 0, 1, 1);
    reportProgress(meter, 1, 1, 1);
    reportProgress(meter, 2, 5, 7);
    reportProgress(meter, 3, 5, 7);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "[DBG:solver] Progress: 2 iterations, 5 states in queue, 7 states seen",
    );
  });
});
