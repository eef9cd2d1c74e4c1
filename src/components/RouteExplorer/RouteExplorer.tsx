/**
 * RouteExplorer Component
 *
 * MapLibre base map with a deck.gl overlay showing the routes departing
 * from one airport. Selecting an airport (from the panel or by clicking a
 * point) redraws the arcs, the connected airports and the summary.
 *
 * @example
 * ```tsx
 * <RouteExplorer
 *   onLoadProgress={(p) => setProgress(p)}
 *   onError={(e) => setError(e)}
 * />
 * ```
 */

import { useEffect, useMemo, useRef } from "react";
import maplibregl from "maplibre-gl";

import { useFlightData, useRouteExplorer, useRouteOverlay } from "@/hooks";
import { createExplorerLayers, getExplorerTooltip } from "@/layers";
import { CONFIG } from "@/lib/config";

import { ExplorerPanel } from "./ExplorerPanel";

/** Props for RouteExplorer component */
export interface RouteExplorerProps {
	/** Progress callback (0-100) */
	onLoadProgress?: (progress: number) => void;
	/** Error callback */
	onError?: (error: Error) => void;
}

/**
 * RouteExplorer - Main route visualization component
 */
export function RouteExplorer({ onLoadProgress, onError }: RouteExplorerProps) {
	const mapContainerRef = useRef<HTMLDivElement>(null);
	const mapRef = useRef<maplibregl.Map | null>(null);

	const { data, isLoading, error, progress } = useFlightData({
		routesUrl: CONFIG.data.routes,
		airportsUrl: CONFIG.data.airports,
		timeoutMs: CONFIG.data.timeoutMs,
	});

	const {
		selection,
		view,
		sourceCodes,
		selectAirport,
		setShowRoutes,
		setShowAirports,
		handleAirportClick,
	} = useRouteExplorer(data, {
		defaultAirport: CONFIG.explorer.defaultAirport,
		showRoutes: CONFIG.explorer.showRoutes,
		showAirports: CONFIG.explorer.showAirports,
	});

	// Rebuilt on every selection or visibility change
	const layers = useMemo(
		() =>
			createExplorerLayers(view, selection, {
				onAirportClick: handleAirportClick,
			}),
		[view, selection, handleAirportClick]
	);

	const { initializeOverlay, cleanup } = useRouteOverlay({
		layers,
		getTooltip: getExplorerTooltip,
	});

	// Initialize map
	useEffect(() => {
		const container = mapContainerRef.current;
		if (!container || mapRef.current) return;

		const map = new maplibregl.Map({
			container,
			style: CONFIG.map.styleUrl,
			center: CONFIG.map.center,
			zoom: CONFIG.map.zoom,
			pitch: CONFIG.map.pitch,
			bearing: CONFIG.map.bearing,
		});

		map.addControl(new maplibregl.NavigationControl());

		map.on("load", () => {
			initializeOverlay(map);
		});

		map.on("error", (e) => {
			console.warn("[RouteExplorer] Map error:", e.error);
		});

		mapRef.current = map;

		return () => {
			cleanup();
			map.remove();
			mapRef.current = null;
		};
	}, [initializeOverlay, cleanup]);

	// Progress reporting
	useEffect(() => {
		if (error) return;
		onLoadProgress?.(isLoading ? progress : 100);
	}, [isLoading, progress, error, onLoadProgress]);

	// Error handling
	useEffect(() => {
		if (error) {
			onError?.(error);
		}
	}, [error, onError]);

	return (
		<div className="route-explorer">
			<div ref={mapContainerRef} className="explorer-map" data-testid="explorer-map" />

			<ExplorerPanel
				sourceCodes={sourceCodes}
				selection={selection}
				summary={view.summary}
				isLoading={isLoading}
				onSelectAirport={selectAirport}
				onShowRoutesChange={setShowRoutes}
				onShowAirportsChange={setShowAirports}
			/>
		</div>
	);
}
