/**
 * useRouteExplorer Hook
 *
 * Holds the explorer's SelectionState and recomputes the derived view
 * whenever the selection or data changes. Each handler replaces the
 * selection with a new value.
 *
 * @example
 * ```tsx
 * const explorer = useRouteExplorer(data, { defaultAirport: "ATL" });
 *
 * <select value={explorer.selection.airportCode ?? ""} onChange={(e) => explorer.selectAirport(e.target.value)}>
 *   {explorer.sourceCodes.map((code) => <option key={code}>{code}</option>)}
 * </select>
 * ```
 */

import { useState, useEffect, useMemo, useCallback } from "react";
import type { ExplorerView, FlightData, SelectionState } from "@/types";
import {
	INITIAL_SELECTION,
	applyAirportClick,
	deriveView,
	getSourceAirportCodes,
	resolveInitialAirport,
	selectAirport,
	setAirportsVisible,
	setRoutesVisible,
} from "@/lib/routeExplorer";

export interface UseRouteExplorerOptions {
	/** Airport selected once data arrives */
	defaultAirport: string;
	/** Initial route layer visibility (default: true) */
	showRoutes?: boolean;
	/** Initial airport layer visibility (default: true) */
	showAirports?: boolean;
}

export interface UseRouteExplorerResult {
	selection: SelectionState;
	/** Visible subset for the selection */
	view: ExplorerView;
	/** Dropdown options: every airport with outgoing routes */
	sourceCodes: string[];
	selectAirport: (code: string) => void;
	setShowRoutes: (visible: boolean) => void;
	setShowAirports: (visible: boolean) => void;
	/** Map-point click; ignored for airports without routes */
	handleAirportClick: (code: string) => void;
}

const EMPTY_VIEW: ExplorerView = {
	routes: [],
	airports: [],
	connectedCodes: new Set(),
	summary: null,
};

export function useRouteExplorer(
	data: FlightData | null,
	options: UseRouteExplorerOptions
): UseRouteExplorerResult {
	const { defaultAirport, showRoutes = true, showAirports = true } = options;

	const [selection, setSelection] = useState<SelectionState>(() => ({
		...INITIAL_SELECTION,
		showRoutes,
		showAirports,
	}));

	const sourceCodes = useMemo(
		() => (data ? getSourceAirportCodes(data.routes) : []),
		[data]
	);
	const sourceCodeSet = useMemo(() => new Set(sourceCodes), [sourceCodes]);

	// Pick the startup airport once data is available
	useEffect(() => {
		if (!data) return;
		const initial = resolveInitialAirport(sourceCodes, defaultAirport);
		if (initial === null) return;
		setSelection((prev) =>
			prev.airportCode === null ? selectAirport(prev, initial) : prev
		);
	}, [data, sourceCodes, defaultAirport]);

	const view = useMemo(
		() => (data ? deriveView(data, selection) : EMPTY_VIEW),
		[data, selection]
	);

	const handleSelect = useCallback((code: string) => {
		setSelection((prev) => selectAirport(prev, code));
	}, []);

	const setShowRoutes = useCallback((visible: boolean) => {
		setSelection((prev) => setRoutesVisible(prev, visible));
	}, []);

	const setShowAirports = useCallback((visible: boolean) => {
		setSelection((prev) => setAirportsVisible(prev, visible));
	}, []);

	const handleAirportClick = useCallback(
		(code: string) => {
			setSelection((prev) => applyAirportClick(prev, code, sourceCodeSet));
		},
		[sourceCodeSet]
	);

	return {
		selection,
		view,
		sourceCodes,
		selectAirport: handleSelect,
		setShowRoutes,
		setShowAirports,
		handleAirportClick,
	};
}
