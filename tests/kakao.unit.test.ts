import { describe, it, expect, vi, afterEach } from 'vitest';
import { KakaoDirectionsClient } from '../src/lib/travel/kakaoDirections';
import { HaversineEstimator, distanceKm } from '../src/lib/travel/estimate';
import {
  CachingGeocoder,
  KakaoGeocoder,
  UnconfiguredGeocoder,
  geocodeWithRetry,
  isGeocodeError,
  type GeocodeError,
  type GeocodeResult,
  type Geocoder,
} from '../src/lib/geocoding/geocode';

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    new Response(JSON.stringify(body), { status })
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe('KakaoDirectionsClient', () => {
  const client = new KakaoDirectionsClient('test-secret', 'https://directions.test/v1/directions');
  const signal = new AbortController().signal;

  it('converts the route duration from seconds to minutes', async () => {
    const fetchMock = stubFetch({ routes: [{ result_code: 0, summary: { distance: 12000, duration: 1530 } }] });

    const minutes = await client.fetchMinutes({ lat: 37.5, lng: 127.0 }, { lat: 37.6, lng: 127.1 }, signal);

    expect(minutes).toBe(25.5);
    const [input, init] = fetchMock.mock.calls[0];
    const url = new URL(String(input));
    expect(url.searchParams.get('origin')).toBe('127,37.5');
    expect(url.searchParams.get('destination')).toBe('127.1,37.6');
    expect(url.searchParams.get('priority')).toBe('RECOMMEND');
    expect(new Headers(init?.headers).get('Authorization')).toBe('KakaoAK test-secret');
  });

  it('throws on a route error code', async () => {
    stubFetch({ routes: [{ result_code: 104, result_msg: 'too close' }] });
    await expect(client.fetchMinutes({ lat: 37.5, lng: 127.0 }, { lat: 37.5001, lng: 127.0 }, signal)).rejects.toThrow(
      'Directions API route error 104: too close'
    );
  });

  it('throws on an HTTP error', async () => {
    stubFetch({}, 500);
    await expect(client.fetchMinutes({ lat: 37.5, lng: 127.0 }, { lat: 37.6, lng: 127.0 }, signal)).rejects.toThrow(
      'Directions API error: HTTP 500'
    );
  });

  it('requires an API key', () => {
    expect(() => new KakaoDirectionsClient('', 'https://directions.test')).toThrow(
      'KAKAO_API_KEY is required for the Kakao directions client'
    );
  });
});

describe('HaversineEstimator', () => {
  it('scales great-circle distance by minutes per km', async () => {
    const origin = { lat: 37.5, lng: 127.0 };
    const destination = { lat: 37.6, lng: 127.0 };
    const km = distanceKm(origin, destination);

    expect(km).toBeCloseTo(11.12, 2);
    expect(await new HaversineEstimator(3).fetchMinutes(origin, destination)).toBe(Math.round(km * 3 * 10) / 10);
  });
});

describe('KakaoGeocoder', () => {
  const geocoder = new KakaoGeocoder('test-secret', 'https://geocode.test/search/address.json');

  it('reads coordinates from the first document', async () => {
    const fetchMock = stubFetch({ documents: [{ address_name: '서울 강남구 테헤란로 1', x: '127.03', y: '37.49' }] });

    const result = await geocoder.geocode(' 테헤란로 1 ');

    expect(result).toEqual({ lat: 37.49, lng: 127.03, addressUsed: '테헤란로 1', formattedAddress: '서울 강남구 테헤란로 1' });
    expect(new URL(String(fetchMock.mock.calls[0][0])).searchParams.get('query')).toBe('테헤란로 1');
  });

  it('reports an address with no matches', async () => {
    stubFetch({ documents: [] });
    const result = await geocoder.geocode('nowhere');
    expect(isGeocodeError(result) && result.code).toBe('ZERO_RESULTS');
  });

  it('marks server errors as retryable', async () => {
    stubFetch({}, 503);
    const result = await geocoder.geocode('somewhere');
    expect(result).toEqual({ error: true, message: 'HTTP 503: ', code: '503', retryable: true });
  });

  it('reports an unreadable body as a retryable error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>gateway</html>', { status: 200 })));

    const result = await geocoder.geocode('somewhere');

    expect(isGeocodeError(result) && result.retryable).toBe(true);
  });

  it('reports an unexpected payload shape', async () => {
    stubFetch({ documents: 'none' });
    const result = await geocoder.geocode('somewhere');
    expect(result).toEqual({ error: true, message: 'Unexpected address search response for: somewhere', retryable: false });
  });

  it('times out a hung request and aborts it', async () => {
    const signals: AbortSignal[] = [];
    vi.stubGlobal('fetch', vi.fn((_input: string | URL | Request, init?: RequestInit) => {
      if (init?.signal) signals.push(init.signal);
      return new Promise<Response>(() => undefined);
    }));
    const impatient = new KakaoGeocoder('test-secret', 'https://geocode.test/search/address.json', 20);

    const result = await impatient.geocode('somewhere');

    expect(result).toEqual({ error: true, message: 'timeout after 20ms', retryable: true });
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });
});

class FlakyGeocoder implements Geocoder {
  calls = 0;
  constructor(private readonly failures: number, private readonly retryable = true) {}

  async geocode(address: string): Promise<GeocodeResult | GeocodeError> {
    this.calls++;
    if (this.calls <= this.failures) {
      return { error: true, message: 'busy', retryable: this.retryable };
    }
    return { lat: 1, lng: 2, addressUsed: address, formattedAddress: address };
  }
}

describe('geocodeWithRetry', () => {
  it('retries retryable errors', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const flaky = new FlakyGeocoder(2);

    const result = await geocodeWithRetry(flaky, 'addr', 3, 1);

    expect(isGeocodeError(result)).toBe(false);
    expect(flaky.calls).toBe(3);
  });

  it('stops at the first non-retryable error', async () => {
    const flaky = new FlakyGeocoder(5, false);
    const result = await geocodeWithRetry(flaky, 'addr', 3, 1);

    expect(isGeocodeError(result)).toBe(true);
    expect(flaky.calls).toBe(1);
  });
});

describe('CachingGeocoder', () => {
  it('caches successes but not failures', async () => {
    const flaky = new FlakyGeocoder(1);
    const cached = new CachingGeocoder(flaky);

    expect(isGeocodeError(await cached.geocode('addr'))).toBe(true);
    expect(isGeocodeError(await cached.geocode('addr'))).toBe(false);
    expect(isGeocodeError(await cached.geocode(' addr '))).toBe(false);
    expect(flaky.calls).toBe(2);
  });
});

describe('CachingGeocoder bounds', () => {
  it('evicts the least recently used address', async () => {
    const inner = new FlakyGeocoder(0);
    const cached = new CachingGeocoder(inner, 2);

    await cached.geocode('a');
    await cached.geocode('b');
    await cached.geocode('a'); // a is now most recent
    await cached.geocode('c'); // evicts b
    expect(cached.size).toBe(2);
    expect(inner.calls).toBe(3);

    await cached.geocode('a');
    expect(inner.calls).toBe(3);
    await cached.geocode('b');
    expect(inner.calls).toBe(4);
  });
});

describe('UnconfiguredGeocoder', () => {
  it('always reports a missing key', async () => {
    const result = await new UnconfiguredGeocoder().geocode();
    expect(isGeocodeError(result) && result.code).toBe('NO_API_KEY');
  });
});
