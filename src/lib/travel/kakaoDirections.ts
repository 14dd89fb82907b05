/**
 * Kakao Mobility directions client.
 *
 * Returns driving time in minutes between two coordinates. Throws on any
 * failure; retries and the sentinel fallback live in ResilientDistanceProvider.
 */

import { z } from 'zod';
import type { Coordinates } from '../assignment/models';
import type { TravelTimeSource } from './distanceProvider';

const KakaoDirectionsResponseSchema = z.object({
  routes: z.array(z.object({
    result_code: z.number().optional(),
    result_msg: z.string().optional(),
    summary: z.object({
      distance: z.number().optional(), // meters
      duration: z.number().optional(), // seconds
    }).optional(),
  })).optional(),
});

export class KakaoDirectionsClient implements TravelTimeSource {
  readonly name = 'kakao-directions';

  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string
  ) {
    if (!apiKey) {
      throw new Error('KAKAO_API_KEY is required for the Kakao directions client');
    }
  }

  async fetchMinutes(origin: Coordinates, destination: Coordinates, signal: AbortSignal): Promise<number> {
    // Kakao takes "lng,lat"
    const params = new URLSearchParams({
      origin: `${origin.lng},${origin.lat}`,
      destination: `${destination.lng},${destination.lat}`,
      priority: 'RECOMMEND',
      car_fuel: 'GASOLINE',
      car_hipass: 'false',
      alternatives: 'false',
      road_details: 'false',
    });

    const response = await fetch(`${this.baseUrl}?${params.toString()}`, {
      headers: {
        Authorization: `KakaoAK ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      signal,
    });

    if (!response.ok) {
      throw new Error(`Directions API error: HTTP ${response.status}`);
    }

    const parsed = KakaoDirectionsResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Directions API returned an unexpected payload');
    }
    const route = parsed.data.routes?.[0];

    if (!route) {
      throw new Error('Directions API returned no routes');
    }
    if (route.result_code !== undefined && route.result_code !== 0) {
      throw new Error(`Directions API route error ${route.result_code}: ${route.result_msg || 'unknown'}`);
    }

    const durationSec = route.summary?.duration;
    if (typeof durationSec !== 'number' || !Number.isFinite(durationSec)) {
      throw new Error('Directions API route has no duration');
    }

    return Math.round((durationSec / 60) * 10) / 10;
  }
}
