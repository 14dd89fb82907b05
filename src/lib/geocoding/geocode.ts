/**
 * Geocoding Service
 *
 * Resolves address strings to coordinates using the Kakao Local address search.
 * Jobs and technicians may be given as an address instead of lat/lng; every
 * address is resolved here before anything reaches the assignment engine.
 */

import { z } from 'zod';
import type { Coordinates } from '../assignment/models';

export interface GeocodeResult {
  lat: number;
  lng: number;
  addressUsed: string;
  formattedAddress: string;
}

export interface GeocodeError {
  error: true;
  message: string;
  code?: string;
  retryable: boolean;
}

export interface Geocoder {
  geocode(address: string): Promise<GeocodeResult | GeocodeError>;
}

const KakaoAddressResponseSchema = z.object({
  documents: z.array(z.object({
    address_name: z.string().optional(),
    x: z.string().optional(), // longitude
    y: z.string().optional(), // latitude
  })).optional(),
});

/**
 * Kakao Local address search. Never throws: transport failures, timeouts and
 * unreadable bodies come back as a GeocodeError.
 */
export class KakaoGeocoder implements Geocoder {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string,
    private readonly timeoutMs: number = 5000
  ) {}

  async geocode(address: string): Promise<GeocodeResult | GeocodeError> {
    const query = address.trim();
    if (!query) {
      return { error: true, message: 'No valid address to geocode', retryable: false };
    }

    const body = await this.search(query);
    if ('error' in body) {
      return body;
    }

    const parsed = KakaoAddressResponseSchema.safeParse(body.payload);
    if (!parsed.success) {
      return { error: true, message: `Unexpected address search response for: ${query}`, retryable: false };
    }
    const first = parsed.data.documents?.[0];

    if (!first || first.x === undefined || first.y === undefined) {
      return { error: true, message: `No results found for address: ${query}`, code: 'ZERO_RESULTS', retryable: false };
    }

    const lat = parseFloat(first.y);
    const lng = parseFloat(first.x);
    if (Number.isNaN(lat) || Number.isNaN(lng)) {
      return { error: true, message: `Malformed coordinates for address: ${query}`, retryable: false };
    }

    return {
      lat,
      lng,
      addressUsed: query,
      formattedAddress: first.address_name || query,
    };
  }

  /**
   * Fetches and reads the response body within the timeout
   */
  private async search(query: string): Promise<{ payload: unknown } | GeocodeError> {
    const params = new URLSearchParams({ query });
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new Error(`timeout after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    const request = async (): Promise<{ payload: unknown } | GeocodeError> => {
      const response = await fetch(`${this.baseUrl}?${params.toString()}`, {
        headers: { Authorization: `KakaoAK ${this.apiKey}` },
        signal: controller.signal,
      });

      if (!response.ok) {
        return {
          error: true,
          message: `HTTP ${response.status}: ${response.statusText}`,
          code: String(response.status),
          // Rate limiting and server errors are worth another try
          retryable: response.status === 429 || response.status >= 500,
        };
      }

      const payload: unknown = await response.json();
      return { payload };
    };

    try {
      return await Promise.race([request(), timeout]);
    } catch (error) {
      return {
        error: true,
        message: error instanceof Error ? error.message : String(error),
        retryable: true,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Stand-in used when no API key is configured. Address locations cannot be resolved.
 */
export class UnconfiguredGeocoder implements Geocoder {
  async geocode(): Promise<GeocodeError> {
    return {
      error: true,
      message: 'KAKAO_API_KEY not configured. Cannot geocode without API access.',
      code: 'NO_API_KEY',
      retryable: false,
    };
  }
}

/**
 * Remembers successful results per address in a bounded LRU map. Failures are not cached.
 */
export class CachingGeocoder implements Geocoder {
  private readonly cache = new Map<string, GeocodeResult>();

  constructor(private readonly inner: Geocoder, private readonly maxEntries: number = 1000) {}

  async geocode(address: string): Promise<GeocodeResult | GeocodeError> {
    const key = address.trim();
    const hit = this.cache.get(key);
    if (hit) {
      // Refresh recency
      this.cache.delete(key);
      this.cache.set(key, hit);
      return hit;
    }

    const result = await this.inner.geocode(key);
    if (!isGeocodeError(result)) {
      this.remember(key, result);
    }
    return result;
  }

  get size(): number {
    return this.cache.size;
  }

  private remember(key: string, result: GeocodeResult): void {
    if (this.maxEntries <= 0) return;

    this.cache.set(key, result);
    if (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
  }
}

/**
 * Retries a geocode operation with exponential backoff
 */
export async function geocodeWithRetry(
  geocoder: Geocoder,
  address: string,
  maxRetries: number = 3,
  baseDelayMs: number = 1000
): Promise<GeocodeResult | GeocodeError> {
  let lastError: GeocodeError | null = null;

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    const result = await geocoder.geocode(address);

    if (!isGeocodeError(result)) {
      return result;
    }

    lastError = result;

    if (!result.retryable) {
      return result;
    }

    // Exponential backoff: 1s, 2s, 4s, etc.
    if (attempt < maxRetries - 1) {
      const delay = Math.pow(2, attempt) * baseDelayMs;
      console.log(`   Retry ${attempt + 1}/${maxRetries} for "${address}" in ${delay}ms...`);
      await sleep(delay);
    }
  }

  return lastError || {
    error: true,
    message: 'Max retries exceeded',
    retryable: false,
  };
}

export function toCoordinates(result: GeocodeResult): Coordinates {
  return { lat: result.lat, lng: result.lng };
}

/**
 * Checks if a result is an error
 */
export function isGeocodeError(result: GeocodeResult | GeocodeError): result is GeocodeError {
  return 'error' in result && result.error === true;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
