import { Creator } from "../types";

export type CreatorFetcher = (service: string, creatorId: string) => Promise<Creator>;

export interface CreatorCacheStats {
  hits: number;
  fetches: number;
  size: number;
}

function cacheKey(service: string, creatorId: string): string {
  return JSON.stringify([service, creatorId]);
}

/**
 * Process-lifetime memo of creators keyed by `(service, creatorId)`.
 *
 * Populated entries are returned synchronously from the map. Concurrent misses on one
 * key share a single in-flight fetch; misses on other keys start their own fetch
 * without waiting. A failed fetch is not stored, so a later call fetches again.
 */
export class CreatorCache {
  private readonly fetcher: CreatorFetcher;
  private readonly entries = new Map<string, Creator>();
  private readonly inflight = new Map<string, Promise<Creator>>();
  private hits = 0;
  private fetches = 0;

  constructor(fetcher: CreatorFetcher) {
    this.fetcher = fetcher;
  }

  resolve(service: string, creatorId: string): Promise<Creator> {
    const key = cacheKey(service, creatorId);
    const cached = this.entries.get(key);
    if (cached) {
      this.hits += 1;
      return Promise.resolve(cached);
    }

    const pending = this.inflight.get(key);
    if (pending) {
      this.hits += 1;
      return pending;
    }

    this.fetches += 1;
    const fetching = this.fetcher(service, creatorId).then(
      (creator) => {
        this.entries.set(key, creator);
        this.inflight.delete(key);
        return creator;
      },
      (error: unknown) => {
        this.inflight.delete(key);
        throw error;
      },
    );
    this.inflight.set(key, fetching);
    return fetching;
  }

  stats(): CreatorCacheStats {
    return { hits: this.hits, fetches: this.fetches, size: this.entries.size };
  }
}
