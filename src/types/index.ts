// ============================================================================
// Coordinate Types
// ============================================================================

/** WGS84 coordinates [longitude, latitude] in degrees */
export type LngLat = [lng: number, lat: number];

/** RGB color with 0-255 channels */
export type RGBColor = [r: number, g: number, b: number];

// ============================================================================
// Flight Datasets
// ============================================================================

/**
 * A directed flight connection between two airports.
 * One record per row of the routes table.
 */
export interface Route {
	/** Source airport code (e.g., "ATL") */
	source: string;
	/** Destination airport code */
	destination: string;
	sourceLat: number;
	sourceLon: number;
	destinationLat: number;
	destinationLon: number;
}

/** An airport, keyed by its code */
export interface Airport {
	/** Unique airport code */
	code: string;
	/** Display name */
	name: string;
	longitude: number;
	latitude: number;
	/** Country name, empty when the dataset omits it */
	country: string;
}

/**
 * Loaded datasets. Built once at startup and never mutated.
 */
export interface FlightData {
	routes: readonly Route[];
	airports: readonly Airport[];
	/** Airport lookup by code (first occurrence wins) */
	airportsByCode: ReadonlyMap<string, Airport>;
}

// ============================================================================
// Explorer State
// ============================================================================

/**
 * What the user has chosen to look at.
 * Replaced wholesale on every UI event, never mutated.
 */
export interface SelectionState {
	/** Selected source airport, null until one is chosen */
	readonly airportCode: string | null;
	/** Whether the route arc layer is drawn */
	readonly showRoutes: boolean;
	/** Whether the airport point layer is drawn */
	readonly showAirports: boolean;
}

/** Text summary shown for the selected airport */
export interface RouteSummary {
	code: string;
	name: string;
	routeCount: number;
	/** Number of distinct destination codes */
	destinationCount: number;
}

/**
 * Derived view for a selection. Not persisted; recomputed on every change.
 */
export interface ExplorerView {
	/** Routes whose source is the selected airport */
	routes: Route[];
	/** Airports whose code is in connectedCodes */
	airports: Airport[];
	/** Destinations of the filtered routes plus the selected airport */
	connectedCodes: ReadonlySet<string>;
	/** Null when nothing is selected */
	summary: RouteSummary | null;
}
