/**
 * useFlightData Hook
 *
 * Loads the routes table and airport collection once on mount.
 *
 * @example
 * ```typescript
 * const { data, isLoading, error } = useFlightData({
 *   routesUrl: CONFIG.data.routes,
 *   airportsUrl: CONFIG.data.airports,
 * });
 * ```
 */

import { useState, useEffect } from "react";
import type { FlightData } from "@/types";
import { loadFlightDataWithTimeout } from "@/lib/data";

/**
 * Configuration for the flight data hook.
 */
export interface UseFlightDataConfig {
	routesUrl: string;
	airportsUrl: string;
	/** Abort loading after this many milliseconds (default: 60000) */
	timeoutMs?: number;
	/** Whether to enable the hook (default: true) */
	enabled?: boolean;
}

/**
 * Return type for the useFlightData hook.
 */
export interface UseFlightDataResult {
	/** Loaded datasets, null until loading completes */
	data: FlightData | null;
	isLoading: boolean;
	/** Load failure, a FlightDataError when raised by the loader */
	error: Error | null;
	/** Load progress (0-100) */
	progress: number;
}

export function useFlightData(config: UseFlightDataConfig): UseFlightDataResult {
	const { routesUrl, airportsUrl, timeoutMs = 60000, enabled = true } = config;

	const [data, setData] = useState<FlightData | null>(null);
	const [isLoading, setIsLoading] = useState(enabled);
	const [error, setError] = useState<Error | null>(null);
	const [progress, setProgress] = useState(0);

	useEffect(() => {
		if (!enabled) return;

		// Ignore results that arrive after unmount or a URL change
		let cancelled = false;

		async function load() {
			setIsLoading(true);
			setError(null);

			try {
				const loaded = await loadFlightDataWithTimeout(
					{ routes: routesUrl, airports: airportsUrl },
					timeoutMs,
					(value) => {
						if (!cancelled) setProgress(value);
					}
				);
				if (cancelled) return;
				setData(loaded);
			} catch (err) {
				if (cancelled) return;
				console.error("[useFlightData] Failed to load flight data:", err);
				setError(err instanceof Error ? err : new Error(String(err)));
			} finally {
				if (!cancelled) setIsLoading(false);
			}
		}

		void load();

		return () => {
			cancelled = true;
		};
	}, [routesUrl, airportsUrl, timeoutMs, enabled]);

	return { data, isLoading, error, progress };
}
