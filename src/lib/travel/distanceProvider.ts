import type { Coordinates } from '../assignment/models';

/**
 * What the assignment engine consumes. Implementations must never reject:
 * an unknown or failed lookup resolves to a large sentinel instead.
 */
export interface DistanceProvider {
  travelMinutes(origin: Coordinates, destination: Coordinates): Promise<number>;
}

/**
 * A raw travel-time lookup. May throw or hang; wrap it in a
 * ResilientDistanceProvider before handing it to the engine.
 */
export interface TravelTimeSource {
  readonly name: string;
  fetchMinutes(origin: Coordinates, destination: Coordinates, signal: AbortSignal): Promise<number>;
}

export const DEFAULT_SENTINEL_MINUTES = 9999;

/**
 * Cache key for a coordinate pair, rounded to 5 decimals (~1m)
 */
export function routeKey(origin: Coordinates, destination: Coordinates): string {
  return `${origin.lat.toFixed(5)},${origin.lng.toFixed(5)}->${destination.lat.toFixed(5)},${destination.lng.toFixed(5)}`;
}
