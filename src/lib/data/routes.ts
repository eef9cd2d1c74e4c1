/**
 * Routes Table Parser
 *
 * Parses the airline routes CSV (one row per directed connection) into
 * Route records. Only the columns the explorer draws are kept.
 */

import Papa from 'papaparse';
import type { Route } from '@/types';

/** Columns required in the routes CSV */
export const ROUTE_COLUMNS = [
  'src_airport',
  'dst_airport',
  'src_lat',
  'src_lon',
  'dst_lat',
  'dst_lon',
] as const;

type RouteColumn = (typeof ROUTE_COLUMNS)[number];

/** Raw CSV row, keyed by header */
type RouteRow = Partial<Record<RouteColumn, string>>;

export interface ParseRoutesResult {
  routes: Route[];
  /** Rows dropped for a blank code or a non-numeric coordinate */
  skipped: number;
}

function parseRows(text: string): RouteRow[] {
  const result = Papa.parse<RouteRow>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const fields = result.meta.fields ?? [];
  const missing = ROUTE_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new Error(`Invalid routes CSV: missing columns ${missing.join(', ')}`);
  }

  return result.data;
}

/** Strict number parse: blank or partly numeric fields give NaN */
function parseCoordinate(value: string | undefined): number {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? Number.NaN : Number(trimmed);
}

function toRoute(row: RouteRow): Route | null {
  const source = row.src_airport?.trim() ?? '';
  const destination = row.dst_airport?.trim() ?? '';
  if (!source || !destination) return null;

  const sourceLat = parseCoordinate(row.src_lat);
  const sourceLon = parseCoordinate(row.src_lon);
  const destinationLat = parseCoordinate(row.dst_lat);
  const destinationLon = parseCoordinate(row.dst_lon);

  const coordinates = [sourceLat, sourceLon, destinationLat, destinationLon];
  if (!coordinates.every(Number.isFinite)) return null;

  return { source, destination, sourceLat, sourceLon, destinationLat, destinationLon };
}

/**
 * Parse the routes CSV
 *
 * @param text - CSV text with a header row
 * @throws Error when a required column is missing
 */
export function parseRoutesCsv(text: string): ParseRoutesResult {
  const rows = parseRows(text);
  const routes: Route[] = [];

  for (const row of rows) {
    const route = toRoute(row);
    if (route) routes.push(route);
  }

  return { routes, skipped: rows.length - routes.length };
}

/**
 * Re-serialize the routes CSV with only the required columns.
 * Used by the data script to shrink the published file.
 */
export function trimRoutesCsv(text: string): string {
  return Papa.unparse(parseRows(text), { columns: [...ROUTE_COLUMNS] });
}
