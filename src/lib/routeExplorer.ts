/**
 * Route Explorer
 *
 * Pure selection logic for the explorer panel. Every UI event produces a
 * new SelectionState, and the visible routes/airports are recomputed from
 * (FlightData, SelectionState) alone.
 *
 * @example
 * ```typescript
 * const selection = selectAirport(INITIAL_SELECTION, "ATL");
 * const view = deriveView(data, selection);
 * if (view.summary) {
 *   formatSummary(view.summary); // ["ATL", "Hartsfield-Jackson ...", "Routes: 2", "Destinations: 2"]
 * }
 * ```
 */

import type {
	Airport,
	ExplorerView,
	FlightData,
	Route,
	RouteSummary,
	SelectionState,
} from "@/types";

/** Selection before any airport is chosen, both layers visible */
export const INITIAL_SELECTION: SelectionState = {
	airportCode: null,
	showRoutes: true,
	showAirports: true,
};

/**
 * Distinct source airport codes, sorted. These are the dropdown options.
 */
export function getSourceAirportCodes(routes: readonly Route[]): string[] {
	return Array.from(new Set(routes.map((route) => route.source))).sort();
}

/**
 * Routes departing from the given airport.
 */
export function filterRoutesBySource(
	routes: readonly Route[],
	code: string
): Route[] {
	return routes.filter((route) => route.source === code);
}

/**
 * Destination codes of the given routes plus the source airport itself.
 * The source is always present, even when it has no outgoing routes.
 *
 * @param routes - Routes already filtered to the source airport
 * @param code - Source airport code
 */
export function getConnectedAirportCodes(
	routes: readonly Route[],
	code: string
): Set<string> {
	const connected = new Set(routes.map((route) => route.destination));
	connected.add(code);
	return connected;
}

/**
 * Display name for an airport code, falling back to the code
 */
export function getAirportName(data: FlightData, code: string): string {
	return data.airportsByCode.get(code)?.name || code;
}

/**
 * Build the summary for a selected airport.
 * Zero routes is not an error: both counts are 0.
 */
export function summarizeRoutes(
	data: FlightData,
	code: string,
	routes: readonly Route[]
): RouteSummary {
	const destinations = new Set(routes.map((route) => route.destination));
	return {
		code,
		name: getAirportName(data, code),
		routeCount: routes.length,
		destinationCount: destinations.size,
	};
}

/**
 * Summary as display lines
 */
export function formatSummary(summary: RouteSummary): string[] {
	return [
		summary.code,
		summary.name,
		`Routes: ${summary.routeCount}`,
		`Destinations: ${summary.destinationCount}`,
	];
}

/**
 * Recompute the visible subset for a selection.
 *
 * Airports are matched by code against the connected set, so a destination
 * missing from the airport dataset simply has no point.
 */
export function deriveView(
	data: FlightData,
	selection: SelectionState
): ExplorerView {
	const code = selection.airportCode;
	if (code === null) {
		return {
			routes: [],
			airports: [],
			connectedCodes: new Set(),
			summary: null,
		};
	}

	const routes = filterRoutesBySource(data.routes, code);
	const connectedCodes = getConnectedAirportCodes(routes, code);
	const airports: Airport[] = data.airports.filter((airport) =>
		connectedCodes.has(airport.code)
	);

	return {
		routes,
		airports,
		connectedCodes,
		summary: summarizeRoutes(data, code, routes),
	};
}

// ============================================================================
// Selection transitions
// ============================================================================

/**
 * Selection change from the dropdown
 */
export function selectAirport(
	state: SelectionState,
	code: string
): SelectionState {
	return { ...state, airportCode: code };
}

/**
 * Route arc layer checkbox
 */
export function setRoutesVisible(
	state: SelectionState,
	visible: boolean
): SelectionState {
	return { ...state, showRoutes: visible };
}

/**
 * Airport point layer checkbox
 */
export function setAirportsVisible(
	state: SelectionState,
	visible: boolean
): SelectionState {
	return { ...state, showAirports: visible };
}

/**
 * Click on a rendered airport point.
 *
 * Only airports that appear as a route source can be selected; any other
 * click returns the same state object.
 */
export function applyAirportClick(
	state: SelectionState,
	code: string,
	sourceCodes: ReadonlySet<string>
): SelectionState {
	if (!sourceCodes.has(code) || state.airportCode === code) {
		return state;
	}
	return selectAirport(state, code);
}

/**
 * Pick the airport selected on startup.
 *
 * Uses the preferred code when it is a source airport, otherwise the first
 * option. Returns null when there are no options at all.
 */
export function resolveInitialAirport(
	sourceCodes: readonly string[],
	preferred: string
): string | null {
	if (sourceCodes.includes(preferred)) {
		return preferred;
	}

	const fallback = sourceCodes[0] ?? null;
	console.warn(
		`[routeExplorer] Default airport "${preferred}" has no routes, using ${fallback ?? "none"}`
	);
	return fallback;
}
