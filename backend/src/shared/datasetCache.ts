import { FetchError, toFetchError } from './pipelineErrors.js';
import type { SourceName } from './pipelineErrors.js';

export interface CachedDataset<T> {
  value: T;
  fetchedAt: number;
  // true when a refresh failed and an expired entry was served instead
  stale: boolean;
}

export interface DatasetCacheOptions {
  source: SourceName;
  ttlMs: number;
  timeoutMs?: number;
  now?: () => number;
}

interface CacheEntry<T> {
  value: T;
  fetchedAt: number;
  expired?: boolean;
}

const withTimeout = <T>(promise: Promise<T>, timeoutMs: number | undefined, source: SourceName): Promise<T> => {
  if (!timeoutMs || timeoutMs <= 0) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new FetchError(source, `Loading the ${source} dataset timed out after ${timeoutMs} ms.`));
    }, timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
};

/**
 * Keyed cache for source datasets with an explicit TTL. Concurrent requests for the same key share
 * one load. When a refresh fails the previous entry is served and flagged as stale, whether it ran
 * out its TTL or was expired by hand; with nothing cached the failure surfaces as a `FetchError`.
 */
export class DatasetCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  private readonly inFlight = new Map<string, Promise<CachedDataset<T>>>();

  private readonly now: () => number;

  constructor(private readonly options: DatasetCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  get source() {
    return this.options.source;
  }

  async get(key: string, loader: () => Promise<T>): Promise<CachedDataset<T>> {
    const entry = this.entries.get(key);
    if (entry && !entry.expired && this.now() - entry.fetchedAt < this.options.ttlMs) {
      return { value: entry.value, fetchedAt: entry.fetchedAt, stale: false };
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const request = this.refresh(key, loader).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  peek(key: string): CacheEntry<T> | null {
    return this.entries.get(key) ?? null;
  }

  // Forces the next `get` to reload while keeping the current value as its fallback.
  expire(key?: string) {
    const keys = key === undefined ? [...this.entries.keys()] : [key];
    for (const current of keys) {
      const entry = this.entries.get(current);
      if (entry) {
        this.entries.set(current, { ...entry, expired: true });
      }
    }
  }

  private async refresh(key: string, loader: () => Promise<T>): Promise<CachedDataset<T>> {
    try {
      const value = await withTimeout(loader(), this.options.timeoutMs, this.options.source);
      const entry = { value, fetchedAt: this.now() };
      this.entries.set(key, entry);
      return { ...entry, stale: false };
    } catch (error) {
      const previous = this.entries.get(key);
      if (previous) {
        console.warn(`Failed to refresh the ${this.options.source} dataset, serving the cached copy:`, error);
        return { value: previous.value, fetchedAt: previous.fetchedAt, stale: true };
      }
      throw toFetchError(this.options.source, error);
    }
  }
}
