import type { Resolution, ResolvedValue } from "./types";

/**
 * Query → resolved value. No eviction and no capacity bound: entries live as
 * long as the owning service. Also tracks resolutions still in flight so a
 * query is never resolved twice concurrently.
 */
export class ResolutionCache<T> {
  private readonly entriesByQuery = new Map<string, ResolvedValue<T>>();

  private readonly pending = new Map<string, Promise<Resolution<T>>>();

  get(query: string): ResolvedValue<T> | undefined {
    return this.entriesByQuery.get(query);
  }

  put(query: string, value: ResolvedValue<T>): ResolvedValue<T> {
    const stored = Object.freeze({ ...value });
    this.entriesByQuery.set(query, stored);
    return stored;
  }

  contains(query: string): boolean {
    return this.entriesByQuery.has(query);
  }

  get size(): number {
    return this.entriesByQuery.size;
  }

  entries(): Array<[string, ResolvedValue<T>]> {
    return Array.from(this.entriesByQuery.entries());
  }

  inFlight(query: string): Promise<Resolution<T>> | undefined {
    return this.pending.get(query);
  }

  track(query: string, resolution: Promise<Resolution<T>>): Promise<Resolution<T>> {
    this.pending.set(query, resolution);
    const release = () => {
      if (this.pending.get(query) === resolution) {
        this.pending.delete(query);
      }
    };
    void resolution.then(release, release);
    return resolution;
  }
}
