import type { Coordinates } from '../../src/lib/assignment/models';
import type { DistanceProvider } from '../../src/lib/travel/distanceProvider';
import type { GeocodeError, GeocodeResult, Geocoder } from '../../src/lib/geocoding/geocode';

/**
 * Deterministic travel time: 100 minutes per degree of lat+lng difference, rounded
 */
export function gridMinutes(origin: Coordinates, destination: Coordinates): number {
  return Math.round((Math.abs(origin.lat - destination.lat) + Math.abs(origin.lng - destination.lng)) * 100);
}

export class FakeDistanceProvider implements DistanceProvider {
  readonly calls: Array<{ origin: Coordinates; destination: Coordinates }> = [];

  constructor(private readonly minutes: (origin: Coordinates, destination: Coordinates) => number = gridMinutes) {}

  async travelMinutes(origin: Coordinates, destination: Coordinates): Promise<number> {
    this.calls.push({ origin, destination });
    return this.minutes(origin, destination);
  }
}

export class FakeGeocoder implements Geocoder {
  readonly lookups: string[] = [];

  constructor(private readonly known: Record<string, Coordinates> = {}) {}

  async geocode(address: string): Promise<GeocodeResult | GeocodeError> {
    this.lookups.push(address);
    const hit = this.known[address];
    if (!hit) {
      return { error: true, message: `No results found for address: ${address}`, code: 'ZERO_RESULTS', retryable: false };
    }
    return { lat: hit.lat, lng: hit.lng, addressUsed: address, formattedAddress: address };
  }
}

export function technician(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    technician_id: id,
    home_lat: 37.5,
    home_lng: 127.0,
    service_types: ['입주청소'],
    overtime_allowed: true,
    ...overrides,
  };
}

export function job(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    job_id: id,
    service_type: '입주청소',
    lat: 37.5,
    lng: 127.0,
    date: '2026-03-02',
    duration_min: 120,
    time_fixed: false,
    ...overrides,
  };
}
