import { loadConfig } from "../src/config.js";
import { KeyedLock } from "../src/lock.js";
import { SilenceMonitor } from "../src/silence.js";
import { assert, assertDeepEqual, assertEqual } from "./helpers/assert.js";
import { createHarness, silentLogger } from "./helpers/harness.js";
import { test } from "./helpers/runner.js";

const SILENCE = "Ви ще тут? Можу продовжити пошук або показати нові варіанти.";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

test("keyed lock serializes per key and releases after failures", async () => {
  const lock = new KeyedLock();
  const order: string[] = [];

  const slow = lock.run("a", async () => {
    await new Promise<void>((resolve) => setTimeout(resolve, 20));
    order.push("a1");
  });
  const fast = lock.run("a", async () => {
    order.push("a2");
  });
  const other = lock.run("b", async () => {
    order.push("b1");
  });
  assert(lock.isBusy("a"), "key a is busy");

  await Promise.all([slow, fast, other]);
  assertDeepEqual(order, ["b1", "a1", "a2"], "other key not blocked, same key in order");
  await tick();
  assert(!lock.isBusy("a"), "released when idle");

  const failed = lock
    .run("c", async () => {
      throw new Error("task failed");
    })
    .then(
      () => "resolved",
      (err: unknown) => (err instanceof Error ? err.message : String(err))
    );
  const after = lock.run("c", async () => "still runs");
  assertEqual(await failed, "task failed", "rejection reaches the caller");
  assertEqual(await after, "still runs", "next task runs after a failure");
});

test("silence monitor nudges once per quiet period", async () => {
  const h = await createHarness();
  await h.say("/start");
  await h.say("Мене звати Олена");

  const monitor = new SilenceMonitor({
    sessions: h.sessions,
    store: h.store,
    outbound: h.outbound,
    lookups: h.lookups,
    locks: h.locks,
    logger: silentLogger,
    thresholdMs: 60_000,
    intervalMs: 1_000,
    now: () => h.clock.now
  });

  assertEqual(await monitor.sweep(), 0, "recent activity");

  h.clock.now += 60_000;
  assertEqual(await monitor.sweep(), 1, "quiet chat nudged");
  assertEqual(h.outbound.texts().at(-1), SILENCE, "silence copy");
  assertEqual(h.store.messages.at(-1)?.content, SILENCE, "nudge logged as an agent message");
  assertEqual(await monitor.sweep(), 0, "not nudged twice");

  await h.say("двушка");
  const session = await h.sessions.load(1001);
  assertEqual(session?.silenceNotified, false, "new message re-arms the nudge");
  h.clock.now += 60_000;
  assertEqual(await monitor.sweep(), 1, "nudged again after the next quiet period");

  monitor.start();
  monitor.stop();
});

test("config reads env with defaults and treats blanks as unset", () => {
  const defaults = loadConfig({});
  assertEqual(defaults.PORT, 3000, "default port");
  assertEqual(defaults.LISTINGS_LIMIT, 3, "default page size");
  assertEqual(defaults.CONFIG_SOURCE, "file", "file tables by default");
  assertEqual(defaults.TELEGRAM_WEBHOOK_PATH, "/webhook", "default webhook path");

  const custom = loadConfig({ PORT: "8080", ADMIN_API_KEY: "", LISTINGS_PROVIDER: "mock", SILENCE_THRESHOLD_SEC: "60" });
  assertEqual(custom.PORT, 8080, "port coerced");
  assertEqual(custom.ADMIN_API_KEY, undefined, "blank key is unset");
  assertEqual(custom.LISTINGS_PROVIDER, "mock", "provider");
  assertEqual(custom.SILENCE_THRESHOLD_SEC, 60, "threshold");

  let rejected = false;
  try {
    loadConfig({ LISTINGS_LIMIT: "50" });
  } catch {
    rejected = true;
  }
  assert(rejected, "page size above 10 rejected");
});
