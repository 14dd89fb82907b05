import type { Coordinates } from '../assignment/models';
import type { TravelTimeSource } from './distanceProvider';

/**
 * Great-circle distance between two coordinates in kilometers
 */
export function distanceKm(origin: Coordinates, destination: Coordinates): number {
  const R = 6371; // Earth radius in km
  const φ1 = origin.lat * Math.PI / 180;
  const φ2 = destination.lat * Math.PI / 180;
  const Δφ = (destination.lat - origin.lat) * Math.PI / 180;
  const Δλ = (destination.lng - origin.lng) * Math.PI / 180;

  const a = Math.sin(Δφ / 2) * Math.sin(Δφ / 2) +
    Math.cos(φ1) * Math.cos(φ2) *
    Math.sin(Δλ / 2) * Math.sin(Δλ / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return R * c;
}

/**
 * Straight-line travel estimate, used when no directions API key is configured.
 */
export class HaversineEstimator implements TravelTimeSource {
  readonly name = 'haversine-estimate';

  constructor(private readonly minutesPerKm: number = 2.0) {}

  async fetchMinutes(origin: Coordinates, destination: Coordinates): Promise<number> {
    const km = distanceKm(origin, destination);
    return Math.round(km * this.minutesPerKm * 10) / 10;
  }
}
