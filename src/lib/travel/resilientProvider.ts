/**
 * Resilient Distance Provider
 *
 * Wraps a raw travel-time source with a per-attempt timeout, bounded retries
 * with exponential backoff, and an in-memory LRU cache. When every attempt
 * fails it resolves to the sentinel; it never rejects.
 */

import type { Coordinates } from '../assignment/models';
import { DEFAULT_SENTINEL_MINUTES, routeKey, type DistanceProvider, type TravelTimeSource } from './distanceProvider';

export interface ResilientProviderOptions {
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseMs?: number;
  sentinelMinutes?: number;
  cacheSize?: number;
}

export interface ProviderStats {
  lookups: number;
  cacheHits: number;
  failures: number;
}

export class ResilientDistanceProvider implements DistanceProvider {
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly cacheSize: number;
  readonly sentinelMinutes: number;

  private readonly cache = new Map<string, number>();
  private readonly stats: ProviderStats = { lookups: 0, cacheHits: 0, failures: 0 };

  constructor(private readonly source: TravelTimeSource, options: ResilientProviderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryBaseMs = options.retryBaseMs ?? 500;
    this.sentinelMinutes = options.sentinelMinutes ?? DEFAULT_SENTINEL_MINUTES;
    this.cacheSize = options.cacheSize ?? 500;
  }

  async travelMinutes(origin: Coordinates, destination: Coordinates): Promise<number> {
    if (origin.lat === destination.lat && origin.lng === destination.lng) {
      return 0;
    }

    const key = routeKey(origin, destination);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.stats.cacheHits++;
      // Refresh recency
      this.cache.delete(key);
      this.cache.set(key, cached);
      return cached;
    }

    this.stats.lookups++;
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const minutes = await this.attempt(origin, destination);
        if (!Number.isFinite(minutes) || minutes < 0) {
          throw new Error(`${this.source.name} returned an invalid travel time: ${minutes}`);
        }
        this.remember(key, minutes);
        return minutes;
      } catch (error) {
        lastError = error;
        if (attempt < this.maxRetries) {
          // Exponential backoff: base, 2x base, 4x base...
          await sleep(Math.pow(2, attempt) * this.retryBaseMs);
        }
      }
    }

    this.stats.failures++;
    const message = lastError instanceof Error ? lastError.message : String(lastError);
    console.warn(`⚠️  Travel time lookup failed (${key}) after ${this.maxRetries + 1} attempts: ${message}`);
    return this.sentinelMinutes;
  }

  getStats(): ProviderStats {
    return { ...this.stats };
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async attempt(origin: Coordinates, destination: Coordinates): Promise<number> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new Error(`timeout after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([
        this.source.fetchMinutes(origin, destination, controller.signal),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private remember(key: string, minutes: number): void {
    if (this.cacheSize <= 0) return;

    this.cache.set(key, minutes);
    if (this.cache.size > this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
