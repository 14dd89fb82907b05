/**
 * Wires the collaborators the API and CLI share from configuration
 */

import { config, type AppConfig } from './config';
import {
  CachingGeocoder,
  geocodeWithRetry,
  KakaoGeocoder,
  UnconfiguredGeocoder,
  type Geocoder,
} from './geocoding/geocode';
import type { DistanceProvider, TravelTimeSource } from './travel/distanceProvider';
import { HaversineEstimator } from './travel/estimate';
import { KakaoDirectionsClient } from './travel/kakaoDirections';
import { ResilientDistanceProvider } from './travel/resilientProvider';
import { createRosterSource } from './roster/sources';
import { RosterStore } from './roster/rosterStore';
import type { SystemRules } from './assignment/models';

export interface ServiceDeps {
  rosterStore: RosterStore;
  distance: DistanceProvider;
  geocoder: Geocoder;
  defaultRules: SystemRules;
  sentinelMinutes: number;
}

/**
 * Kakao directions when an API key is set, straight-line estimate otherwise
 */
export function createDistanceProvider(appConfig: AppConfig = config): ResilientDistanceProvider {
  const source: TravelTimeSource = appConfig.kakaoApiKey
    ? new KakaoDirectionsClient(appConfig.kakaoApiKey, appConfig.kakaoDirectionsUrl)
    : new HaversineEstimator(appConfig.estimateMinutesPerKm);

  if (!appConfig.kakaoApiKey) {
    console.warn('⚠️  KAKAO_API_KEY not set, travel times are straight-line estimates');
  }

  return new ResilientDistanceProvider(source, {
    timeoutMs: appConfig.distanceTimeoutMs,
    maxRetries: appConfig.distanceMaxRetries,
    retryBaseMs: appConfig.distanceRetryBaseMs,
    sentinelMinutes: appConfig.distanceSentinelMinutes,
    cacheSize: appConfig.distanceCacheSize,
  });
}

export function createGeocoder(appConfig: AppConfig = config): Geocoder {
  if (!appConfig.kakaoApiKey) {
    return new UnconfiguredGeocoder();
  }

  const kakao = new KakaoGeocoder(appConfig.kakaoApiKey, appConfig.kakaoGeocodeUrl, appConfig.distanceTimeoutMs);
  return new CachingGeocoder(
    { geocode: address => geocodeWithRetry(kakao, address) },
    appConfig.geocodeCacheSize
  );
}

export function defaultSystemRules(appConfig: AppConfig = config): SystemRules {
  return {
    workStart: appConfig.workStart,
    workEnd: appConfig.workEnd,
    maxPreassignDays: appConfig.maxPreassignDays,
    defaultBufferMin: appConfig.defaultBufferMin,
  };
}

export function createServices(appConfig: AppConfig = config): ServiceDeps {
  return {
    rosterStore: new RosterStore(createRosterSource(appConfig)),
    distance: createDistanceProvider(appConfig),
    geocoder: createGeocoder(appConfig),
    defaultRules: defaultSystemRules(appConfig),
    sentinelMinutes: appConfig.distanceSentinelMinutes,
  };
}
