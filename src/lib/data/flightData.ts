/**
 * Flight Data Loader
 *
 * Fetches the routes CSV and airports GeoJSON with progress reporting and
 * builds the in-memory datasets the explorer works on.
 */

import type { Airport, FlightData, Route } from '@/types';
import { parseRoutesCsv } from './routes';
import { parseAirportsGeoJson } from './airports';
import { FlightDataError, type FlightDataset } from './errors';

/** Where to fetch each dataset from */
export interface FlightDataUrls {
  routes: string;
  airports: string;
}

export interface LoadFlightDataOptions {
  /** Optional callback for progress updates (0-100) */
  onProgress?: (progress: number) => void;
  signal?: AbortSignal;
}

/**
 * Build the datasets and airport index.
 * When a code repeats, the first airport wins.
 */
export function createFlightData(
  routes: readonly Route[],
  airports: readonly Airport[]
): FlightData {
  const airportsByCode = new Map<string, Airport>();
  for (const airport of airports) {
    if (!airportsByCode.has(airport.code)) {
      airportsByCode.set(airport.code, airport);
    }
  }
  return { routes, airports, airportsByCode };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function fetchOk(url: string, dataset: FlightDataset, signal?: AbortSignal): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, { signal });
  } catch (error) {
    throw new FlightDataError(`Failed to load ${dataset}: ${errorMessage(error)}`, dataset, 'fetch');
  }
  if (!response.ok) {
    throw new FlightDataError(
      `Failed to load ${dataset}: ${response.status} ${response.statusText}`,
      dataset,
      'fetch'
    );
  }
  return response;
}

/** Run a parse step, tagging its failure with the dataset */
function parseDataset<T>(dataset: FlightDataset, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new FlightDataError(errorMessage(error), dataset, 'parse');
  }
}

async function readAirportsJson(response: Response): Promise<unknown> {
  try {
    const json: unknown = await response.json();
    return json;
  } catch (error) {
    throw new FlightDataError(`Invalid airports GeoJSON: ${errorMessage(error)}`, 'airports', 'parse');
  }
}

/**
 * Load both datasets
 *
 * @param urls - Dataset locations
 * @param options - Progress callback and abort signal
 * @throws FlightDataError naming the dataset that failed
 */
export async function loadFlightData(
  urls: FlightDataUrls,
  options: LoadFlightDataOptions = {}
): Promise<FlightData> {
  const { onProgress, signal } = options;
  onProgress?.(0);

  const [routesResponse, airportsResponse] = await Promise.all([
    fetchOk(urls.routes, 'routes', signal),
    fetchOk(urls.airports, 'airports', signal),
  ]);

  onProgress?.(30);

  const routesText = await routesResponse.text();
  const airportsJson = await readAirportsJson(airportsResponse);

  onProgress?.(60);

  const routes = parseDataset('routes', () => parseRoutesCsv(routesText));
  const airports = parseDataset('airports', () => parseAirportsGeoJson(airportsJson));

  if (routes.skipped > 0) {
    console.warn(`[loadFlightData] Skipped ${routes.skipped} malformed route rows`);
  }
  if (airports.skipped > 0) {
    console.warn(`[loadFlightData] Skipped ${airports.skipped} airport features without a code or point`);
  }
  console.log(
    `[loadFlightData] Loaded ${routes.routes.length} routes and ${airports.airports.length} airports`
  );

  onProgress?.(100);

  return createFlightData(routes.routes, airports.airports);
}

/**
 * Load both datasets, aborting after a timeout
 *
 * @param urls - Dataset locations
 * @param timeout - Timeout in milliseconds (default: 60000)
 * @param onProgress - Optional callback for progress updates
 */
export async function loadFlightDataWithTimeout(
  urls: FlightDataUrls,
  timeout: number = 60000,
  onProgress?: (progress: number) => void
): Promise<FlightData> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    return await loadFlightData(urls, { onProgress, signal: controller.signal });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new FlightDataError(`Loading flight data timed out after ${timeout}ms`, null, 'timeout');
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
