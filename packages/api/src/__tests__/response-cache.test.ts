import { describe, it, expect, vi } from "vitest";
import { cacheKey, ResponseCache } from "../api/response-cache.js";

function clock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("ResponseCache", () => {
  it("should compute on a miss and serve the stored value on a hit", async () => {
    const cache = new ResponseCache<string>(10);
    const compute = vi.fn(async () => "body");

    expect(await cache.getOrCompute("k", 60, compute)).toEqual({ value: "body", status: "MISS" });
    expect(await cache.getOrCompute("k", 60, compute)).toEqual({ value: "body", status: "HIT" });
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("should expire entries after their ttl", async () => {
    const time = clock();
    const cache = new ResponseCache<number>(10, time.now);
    cache.set("k", 1, 6);

    time.advance(5_999);
    expect(cache.get("k")).toBe(1);
    time.advance(1);
    expect(cache.get("k")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("should evict the least recently used entry on overflow", () => {
    const cache = new ResponseCache<number>(2);
    cache.set("a", 1, 60);
    cache.set("b", 2, 60);
    cache.get("a");
    cache.set("c", 3, 60);

    expect(cache.get("a")).toBe(1);
    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("c")).toBe(3);
  });

  it("should store nothing when compute rejects", async () => {
    const cache = new ResponseCache<string>(10);
    await expect(
      cache.getOrCompute("k", 60, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(cache.size).toBe(0);
  });

  it("should refuse a zero capacity", () => {
    expect(() => new ResponseCache(0)).toThrow("maxEntries");
  });
});

describe("cacheKey", () => {
  it("should join method and full url", () => {
    expect(cacheKey("GET", "http://localhost/api/v1/block?page[size]=1")).toBe(
      "GET-http://localhost/api/v1/block?page[size]=1",
    );
  });
});
