/**
 * Airports GeoJSON Parser
 *
 * Converts the airport FeatureCollection into Airport records.
 * Features use `properties.id` as the airport code.
 */

import type { Airport, LngLat } from '@/types';
import { isRecord } from '@/utils/guards';

export interface ParseAirportsResult {
  airports: Airport[];
  /** Features dropped for a missing code or non-Point geometry */
  skipped: number;
}

function readString(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return '';
}

function readPoint(geometry: unknown): LngLat | null {
  if (!isRecord(geometry) || geometry.type !== 'Point') return null;

  const coordinates: unknown = geometry.coordinates;
  if (!Array.isArray(coordinates)) return null;

  const [lng, lat]: unknown[] = coordinates;
  if (typeof lng !== 'number' || typeof lat !== 'number') return null;
  if (!Number.isFinite(lng) || !Number.isFinite(lat)) return null;

  return [lng, lat];
}

function toAirport(feature: unknown): Airport | null {
  if (!isRecord(feature)) return null;

  const properties = isRecord(feature.properties) ? feature.properties : {};
  const code = readString(properties.id);
  const point = readPoint(feature.geometry);
  if (!code || !point) return null;

  return {
    code,
    name: readString(properties.name) || code,
    longitude: point[0],
    latitude: point[1],
    country: readString(properties.country),
  };
}

/**
 * Parse an airports FeatureCollection
 *
 * @param json - Parsed GeoJSON document
 * @throws Error when the document has no features array
 */
export function parseAirportsGeoJson(json: unknown): ParseAirportsResult {
  if (!isRecord(json) || !Array.isArray(json.features)) {
    throw new Error('Invalid GeoJSON: missing features array');
  }

  const features: unknown[] = json.features;
  const airports: Airport[] = [];

  for (const feature of features) {
    const airport = toAirport(feature);
    if (airport) airports.push(airport);
  }

  return { airports, skipped: features.length - airports.length };
}
