/**
 * Data Loaders
 *
 * Exports all data loading utilities.
 */

export {
  loadFlightData,
  loadFlightDataWithTimeout,
  createFlightData,
  type FlightDataUrls,
  type LoadFlightDataOptions,
} from './flightData';

export {
  parseRoutesCsv,
  trimRoutesCsv,
  ROUTE_COLUMNS,
  type ParseRoutesResult,
} from './routes';

export {
  parseAirportsGeoJson,
  type ParseAirportsResult,
} from './airports';

export {
  FlightDataError,
  describeLoadError,
  type FlightDataset,
  type FlightDataFailure,
  type LoadErrorDescription,
} from './errors';
