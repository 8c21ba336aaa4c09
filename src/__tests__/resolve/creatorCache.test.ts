import { describe, expect, it, vi } from "vitest";
import { CreatorCache } from "../../resolve";
import { Creator } from "../../types";

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: unknown) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const alice: Creator = { service: "fanbox", id: "1", name: "Alice" };
const bob: Creator = { service: "fanbox", id: "2", name: "Bob" };

describe("CreatorCache", () => {
  it("returns the same instance for repeated lookups and fetches once", async () => {
    const fetcher = vi.fn(async (service: string, id: string): Promise<Creator> => ({ service, id, name: "Alice" }));
    const cache = new CreatorCache(fetcher);

    const first = await cache.resolve("fanbox", "1");
    const second = await cache.resolve("fanbox", "1");

    expect(second).toBe(first);
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toEqual({ hits: 1, fetches: 1, size: 1 });
  });

  it("collapses concurrent misses on one key into a single fetch", async () => {
    const pending = deferred<Creator>();
    const fetcher = vi.fn(() => pending.promise);
    const cache = new CreatorCache(fetcher);

    const lookups = [cache.resolve("fanbox", "1"), cache.resolve("fanbox", "1"), cache.resolve("fanbox", "1")];
    pending.resolve(alice);
    const creators = await Promise.all(lookups);

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(creators[0]).toBe(alice);
    expect(creators[1]).toBe(alice);
    expect(creators[2]).toBe(alice);
  });

  it("lets a miss on another key finish while the first is still in flight", async () => {
    const slow = deferred<Creator>();
    const fetcher = vi.fn((_service: string, id: string) => (id === "1" ? slow.promise : Promise.resolve(bob)));
    const cache = new CreatorCache(fetcher);

    const aliceLookup = cache.resolve("fanbox", "1");
    await expect(cache.resolve("fanbox", "2")).resolves.toBe(bob);

    slow.resolve(alice);
    await expect(aliceLookup).resolves.toBe(alice);
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  it("keeps pairs apart when a separator appears inside a value", async () => {
    const fetcher = vi.fn(async (service: string, id: string): Promise<Creator> => ({ service, id, name: `${service}|${id}` }));
    const cache = new CreatorCache(fetcher);

    const first = await cache.resolve("a:b", "c");
    const second = await cache.resolve("a", "b:c");

    expect(first.name).toBe("a:b|c");
    expect(second.name).toBe("a|b:c");
    expect(fetcher).toHaveBeenCalledTimes(2);
    expect(cache.stats()).toEqual({ hits: 0, fetches: 2, size: 2 });
  });

  it("keys by service as well as id", async () => {
    const fetcher = vi.fn(async (service: string, id: string): Promise<Creator> => ({ service, id, name: service }));
    const cache = new CreatorCache(fetcher);

    const fanbox = await cache.resolve("fanbox", "1");
    const patreon = await cache.resolve("patreon", "1");

    expect(fanbox).not.toBe(patreon);
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  it("delivers a failure to every waiter and does not store it", async () => {
    const pending = deferred<Creator>();
    const fetcher = vi.fn().mockReturnValueOnce(pending.promise).mockResolvedValueOnce(alice);
    const cache = new CreatorCache(fetcher);

    const first = cache.resolve("fanbox", "1");
    const second = cache.resolve("fanbox", "1");
    pending.reject(new Error("profile unavailable"));

    await expect(first).rejects.toThrow("profile unavailable");
    await expect(second).rejects.toThrow("profile unavailable");
    await expect(cache.resolve("fanbox", "1")).resolves.toBe(alice);
    expect(fetcher).toHaveBeenCalledTimes(2);
    expect(cache.stats().size).toBe(1);
  });
});
