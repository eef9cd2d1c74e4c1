/**
 * Application configuration
 *
 * Centralized settings for the route explorer. Deployment-specific values
 * can be overridden with VITE_* variables in .env.local.
 */

import type { LngLat, RGBColor } from '@/types';

/**
 * Read an optional string env variable, treating blank values as unset
 */
function envString(value: string | undefined, fallback: string): string {
	const trimmed = value?.trim();
	return trimmed ? trimmed : fallback;
}

const env = import.meta.env;

const ATLANTA: LngLat = [-84.4, 33.75];
const ARC_SOURCE_COLOR: RGBColor = [0, 255, 128]; // Green
const ARC_TARGET_COLOR: RGBColor = [255, 200, 0]; // Amber
const SELECTED_AIRPORT_COLOR: RGBColor = [255, 0, 0];
const AIRPORT_COLOR: RGBColor = [0, 128, 255];

export const CONFIG = {
	/** Data paths (written by scripts/fetch-flight-data.ts) */
	data: {
		routes: envString(env.VITE_ROUTES_URL, '/data/airport_routes.csv'),
		airports: envString(env.VITE_AIRPORTS_URL, '/data/airports.geojson'),
		/** Abort loading after this many milliseconds */
		timeoutMs: 60000,
	},

	/** Base map settings */
	map: {
		styleUrl: envString(
			env.VITE_MAP_STYLE_URL,
			'https://tiles.openfreemap.org/styles/liberty'
		),
		center: ATLANTA,
		zoom: 3,
		pitch: 0,
		bearing: 0,
	},

	/** Explorer behaviour */
	explorer: {
		/** Airport selected on startup when it is a source airport */
		defaultAirport: envString(env.VITE_DEFAULT_AIRPORT, 'ATL').toUpperCase(),
		showRoutes: true,
		showAirports: true,
	},

	/** Overlay styling */
	layers: {
		arcSourceColor: ARC_SOURCE_COLOR,
		arcTargetColor: ARC_TARGET_COLOR,
		arcWidth: 2,
		selectedAirportColor: SELECTED_AIRPORT_COLOR,
		airportColor: AIRPORT_COLOR,
		/** Point radius in meters */
		selectedAirportRadius: 10000,
		airportRadius: 5000,
	},
} as const;

/** Type for the config object */
export type Config = typeof CONFIG;
