import { describe, expect, it } from "vitest";

import { QueryCache } from "@/lib/query-cache";

function clock(start = 0) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    }
  };
}

describe("QueryCache", () => {
  it("serves a stored value until it expires", () => {
    const time = clock();
    const cache = new QueryCache<number>({ ttlMs: 1000, now: time.now });

    cache.set("a", 1);
    time.advance(999);
    expect(cache.get("a")).toBe(1);

    time.advance(1);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("loads once and reuses the result", async () => {
    const cache = new QueryCache<string[]>({ ttlMs: 1000, now: clock().now });
    let loads = 0;
    const load = async () => {
      loads += 1;
      return ["PA"];
    };

    await cache.getOrLoad("products", load);
    const second = await cache.getOrLoad("products", load);

    expect(second).toEqual(["PA"]);
    expect(loads).toBe(1);
  });

  it("shares a load that is still in flight", async () => {
    const cache = new QueryCache<number>({ ttlMs: 1000, now: clock().now });
    let loads = 0;
    const load = async () => {
      loads += 1;
      return 7;
    };

    const [first, second] = await Promise.all([cache.getOrLoad("k", load), cache.getOrLoad("k", load)]);

    expect([first, second]).toEqual([7, 7]);
    expect(loads).toBe(1);
  });

  it("does not store a failed load", async () => {
    const cache = new QueryCache<number>({ ttlMs: 1000, now: clock().now });

    await expect(cache.getOrLoad("k", () => Promise.reject(new Error("offline")))).rejects.toThrow("offline");
    await expect(cache.getOrLoad("k", async () => 3)).resolves.toBe(3);
  });

  it("stores nothing when the time to live is zero", async () => {
    const cache = new QueryCache<number>({ ttlMs: 0, now: clock().now });
    let loads = 0;
    const load = async () => {
      loads += 1;
      return loads;
    };

    await cache.getOrLoad("k", load);
    await expect(cache.getOrLoad("k", load)).resolves.toBe(2);
  });

  it("reloads after the entry expires", async () => {
    const time = clock();
    const cache = new QueryCache<number>({ ttlMs: 500, now: time.now });
    let loads = 0;
    const load = async () => {
      loads += 1;
      return loads;
    };

    await cache.getOrLoad("k", load);
    time.advance(600);

    await expect(cache.getOrLoad("k", load)).resolves.toBe(2);
  });
});
