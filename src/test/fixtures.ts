import { createFlightData } from '@/lib/data/flightData';
import type { Airport, FlightData, Route } from '@/types';

export function makeRoute(source: string, destination: string): Route {
  return {
    source,
    destination,
    sourceLat: 33.6367,
    sourceLon: -84.4281,
    destinationLat: 40.6398,
    destinationLon: -73.7789,
  };
}

export function makeAirport(code: string, name: string, longitude = 0, latitude = 0): Airport {
  return { code, name, longitude, latitude, country: 'United States' };
}

/** Three routes: two from ATL, one from ORD. SEA has no routes. */
export const TEST_ROUTES: Route[] = [
  makeRoute('ATL', 'JFK'),
  makeRoute('ATL', 'LAX'),
  makeRoute('ORD', 'DFW'),
];

export const TEST_AIRPORTS: Airport[] = [
  makeAirport('ATL', 'Atlanta Test Airport', -84.4281, 33.6367),
  makeAirport('JFK', 'New York Test Airport', -73.7789, 40.6398),
  makeAirport('LAX', 'Los Angeles Test Airport', -118.4081, 33.9425),
  makeAirport('ORD', 'Chicago Test Airport', -87.9048, 41.9786),
  makeAirport('DFW', 'Dallas Test Airport', -97.038, 32.8968),
  makeAirport('SEA', 'Seattle Test Airport', -122.3088, 47.449),
];

export function makeTestData(): FlightData {
  return createFlightData(TEST_ROUTES, TEST_AIRPORTS);
}
