import assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";
import { describe, it } from "node:test";

import { TtlCache } from "../../src/resilience.js";

describe("TtlCache", () => {
  it("drops expired entries on the next write without them being read", async () => {
    const cache = new TtlCache<string, number>();
    cache.set("short-a", 1, 5);
    cache.set("short-b", 2, 5);
    cache.set("long", 3, 60_000);

    await delay(30);
    cache.set("fresh", 4, 60_000);

    assert.equal(cache.size, 2);
    assert.equal(cache.get("long"), 3);
    assert.equal(cache.get("short-a"), null);
  });

  it("keeps unexpired entries when sweeping", () => {
    const cache = new TtlCache<string, number>();
    cache.set("a", 1, 60_000);
    cache.prune();

    assert.equal(cache.size, 1);
  });

  it("ignores non-positive ttls", () => {
    const cache = new TtlCache<string, number>();
    cache.set("a", 1, 0);

    assert.equal(cache.size, 0);
  });
});
