import test from "node:test";
import assert from "node:assert/strict";
import { PollingLoop, canPostNow, jitteredIntervalMinutes } from "../src/services/scheduler.js";

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

test("jittered interval stays within base +/- 25%", () => {
  const schedule = { postIntervalMinutes: 120, minIntervalMinutes: 60, maxIntervalMinutes: 240 };
  assert.equal(jitteredIntervalMinutes(schedule, () => 0), 90);
  assert.equal(jitteredIntervalMinutes(schedule, () => 0.999999), 150);
});

test("jittered interval is clamped to the configured band", () => {
  const schedule = { postIntervalMinutes: 100, minIntervalMinutes: 90, maxIntervalMinutes: 110 };
  assert.equal(jitteredIntervalMinutes(schedule, () => 0), 90);
  assert.equal(jitteredIntervalMinutes(schedule, () => 0.5), 100);
  assert.equal(jitteredIntervalMinutes(schedule, () => 0.999999), 110);
});

test("canPostNow checks the hourly cap before the daily cap", () => {
  const caps = { maxPostsPerHour: 2, maxPostsPerDay: 5 };
  const store = (hour: number, day: number) => ({
    countPostsInWindow: (hours: number) => (hours === 1 ? hour : day),
  });

  assert.deepEqual(canPostNow(store(1, 3), caps), { ok: true, postsLastHour: 1, postsLastDay: 3 });
  assert.deepEqual(canPostNow(store(2, 5), caps), {
    ok: false,
    reason: "Hourly limit reached (2/2)",
    postsLastHour: 2,
    postsLastDay: 5,
  });
  assert.deepEqual(canPostNow(store(0, 5), caps), {
    ok: false,
    reason: "Daily limit reached (5/5)",
    postsLastHour: 0,
    postsLastDay: 5,
  });
});

test("stop wakes a sleeping loop and join returns promptly", async (t) => {
  t.mock.method(console, "log", () => {});
  let ticks = 0;
  const loop = new PollingLoop({
    name: "test",
    firstDelayMs: 60_000,
    errorDelayMs: 60_000,
    tick: async () => {
      ticks += 1;
      return 60_000;
    },
  });

  loop.start();
  assert.equal(loop.isRunning, true);
  loop.stop();
  assert.equal(await loop.join(1000), true);
  assert.equal(loop.isRunning, false);
  assert.equal(ticks, 0);
});

test("join gives up after the timeout while a tick is still running", async (t) => {
  t.mock.method(console, "log", () => {});
  let release: () => void = () => {};
  const loop = new PollingLoop({
    name: "test",
    firstDelayMs: 0,
    errorDelayMs: 0,
    keepAlive: false,
    tick: () =>
      new Promise<number>((resolve) => {
        release = () => resolve(60_000);
      }),
  });

  loop.start();
  await delay(20);
  loop.stop();
  assert.equal(await loop.join(20), false);

  release();
  assert.equal(await loop.join(1000), true);
  assert.equal(loop.completedIterations, 1);
});

test("a failing tick is logged and the loop continues after the error delay", async (t) => {
  t.mock.method(console, "log", () => {});
  const errors = t.mock.method(console, "error", () => {});
  let calls = 0;
  let reachedSecond: () => void = () => {};
  const second = new Promise<void>((resolve) => {
    reachedSecond = resolve;
  });
  const loop = new PollingLoop({
    name: "test",
    firstDelayMs: 0,
    errorDelayMs: 1,
    tick: async () => {
      calls += 1;
      if (calls === 1) throw new Error("flaky");
      reachedSecond();
      return 60_000;
    },
  });

  loop.start();
  await second;
  loop.stop();
  assert.equal(await loop.join(1000), true);
  assert.equal(calls, 2);
  assert.equal(String(errors.mock.calls[0]?.arguments[0]), "[ERROR] test loop iteration failed: flaky");
});
