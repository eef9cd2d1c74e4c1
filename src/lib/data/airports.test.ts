import { describe, it, expect } from 'vitest';
import { parseAirportsGeoJson } from './airports';

function feature(properties: Record<string, unknown> | null, coordinates: unknown, type = 'Point') {
  return { type: 'Feature', properties, geometry: { type, coordinates } };
}

describe('parseAirportsGeoJson', () => {
  it('should convert point features into airports', () => {
    const collection = {
      type: 'FeatureCollection',
      features: [
        feature({ id: 'ATL', name: 'Atlanta Test Airport', country: 'United States' }, [-84.4281, 33.6367]),
      ],
    };

    expect(parseAirportsGeoJson(collection)).toEqual({
      airports: [
        {
          code: 'ATL',
          name: 'Atlanta Test Airport',
          longitude: -84.4281,
          latitude: 33.6367,
          country: 'United States',
        },
      ],
      skipped: 0,
    });
  });

  it('should default the name to the code and the country to empty', () => {
    const collection = { features: [feature({ id: 'XYZ' }, [1, 2])] };
    expect(parseAirportsGeoJson(collection).airports).toEqual([
      { code: 'XYZ', name: 'XYZ', longitude: 1, latitude: 2, country: '' },
    ]);
  });

  it('should skip features without a code or point geometry', () => {
    const collection = {
      features: [
        feature({ id: 'ATL', name: 'A' }, [1, 2]),
        feature({ name: 'No code' }, [1, 2]),
        feature(null, [1, 2]),
        feature({ id: 'LIN' }, [[1, 2], [3, 4]], 'LineString'),
        feature({ id: 'BAD' }, ['1', 2]),
        { type: 'Feature', properties: { id: 'NUL' }, geometry: null },
      ],
    };

    const result = parseAirportsGeoJson(collection);
    expect(result.airports.map((airport) => airport.code)).toEqual(['ATL']);
    expect(result.skipped).toBe(5);
  });

  it('should throw when features are missing', () => {
    expect(() => parseAirportsGeoJson({ type: 'FeatureCollection' })).toThrow(
      'Invalid GeoJSON: missing features array'
    );
    expect(() => parseAirportsGeoJson(null)).toThrow('Invalid GeoJSON: missing features array');
  });
});
