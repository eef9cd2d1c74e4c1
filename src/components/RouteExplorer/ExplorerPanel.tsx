/**
 * ExplorerPanel Component
 *
 * Control panel for the route explorer: airport selector, route summary
 * and layer toggles.
 *
 * @example
 * ```tsx
 * <ExplorerPanel
 *   sourceCodes={["ATL", "ORD"]}
 *   selection={selection}
 *   summary={view.summary}
 *   onSelectAirport={selectAirport}
 *   onShowRoutesChange={setShowRoutes}
 *   onShowAirportsChange={setShowAirports}
 * />
 * ```
 */

import { useCallback } from "react";
import type { RouteSummary, SelectionState } from "@/types";
import { formatSummary } from "@/lib/routeExplorer";
import { CONFIG } from "@/lib/config";

/** Props for ExplorerPanel */
export interface ExplorerPanelProps {
	/** Airports with outgoing routes */
	sourceCodes: string[];
	selection: SelectionState;
	/** Summary for the selection, null before one is made */
	summary: RouteSummary | null;
	/** Whether datasets are still loading */
	isLoading?: boolean;
	onSelectAirport: (code: string) => void;
	onShowRoutesChange: (visible: boolean) => void;
	onShowAirportsChange: (visible: boolean) => void;
}

function toCss([r, g, b]: readonly number[]): string {
	return `rgb(${r}, ${g}, ${b})`;
}

/** Legend entries, colors taken from the layer config */
const LEGEND = [
	{ label: "Selected airport", color: toCss(CONFIG.layers.selectedAirportColor) },
	{ label: "Connected airport", color: toCss(CONFIG.layers.airportColor) },
	{ label: "Route origin", color: toCss(CONFIG.layers.arcSourceColor) },
	{ label: "Route destination", color: toCss(CONFIG.layers.arcTargetColor) },
] as const;

/**
 * ExplorerPanel - Selection and layer controls for the route explorer
 */
export function ExplorerPanel({
	sourceCodes,
	selection,
	summary,
	isLoading = false,
	onSelectAirport,
	onShowRoutesChange,
	onShowAirportsChange,
}: ExplorerPanelProps) {
	const handleSelectChange = useCallback(
		(e: React.ChangeEvent<HTMLSelectElement>) => {
			onSelectAirport(e.target.value);
		},
		[onSelectAirport]
	);

	const handleRoutesChange = useCallback(
		(e: React.ChangeEvent<HTMLInputElement>) => {
			onShowRoutesChange(e.target.checked);
		},
		[onShowRoutesChange]
	);

	const handleAirportsChange = useCallback(
		(e: React.ChangeEvent<HTMLInputElement>) => {
			onShowAirportsChange(e.target.checked);
		},
		[onShowAirportsChange]
	);

	return (
		<div
			className="explorer-panel"
			onPointerDown={(e) => e.stopPropagation()}
		>
			<h2 className="explorer-title">Flight Explorer</h2>

			{/* Airport selector */}
			<div className="explorer-group">
				<label htmlFor="airport-select">Select Airport</label>
				<select
					id="airport-select"
					className="explorer-select"
					value={selection.airportCode ?? ""}
					onChange={handleSelectChange}
					disabled={sourceCodes.length === 0}
				>
					{selection.airportCode === null && <option value="" />}
					{sourceCodes.map((code) => (
						<option key={code} value={code}>
							{code}
						</option>
					))}
				</select>
			</div>

			{/* Summary */}
			<div className="explorer-stats" data-testid="explorer-stats">
				{summary ? (
					formatSummary(summary).map((line, index) =>
						index === 0 ? (
							<strong key={index}>{line}</strong>
						) : (
							<div key={index}>{line}</div>
						)
					)
				) : isLoading ? (
					"Loading routes..."
				) : (
					"Select an airport to see routes."
				)}
			</div>

			{/* Layer toggles */}
			<div className="explorer-group">
				<span className="explorer-group-label">Layer Controls</span>
				<div>
					<input
						type="checkbox"
						id="show-airports"
						checked={selection.showAirports}
						onChange={handleAirportsChange}
					/>
					<label htmlFor="show-airports" className="explorer-checkbox-label">
						Show Airports
					</label>
				</div>
				<div>
					<input
						type="checkbox"
						id="show-routes"
						checked={selection.showRoutes}
						onChange={handleRoutesChange}
					/>
					<label htmlFor="show-routes" className="explorer-checkbox-label">
						Show Flight Routes
					</label>
				</div>
			</div>

			{/* Legend */}
			<div className="explorer-legend">
				{LEGEND.map((item) => (
					<div key={item.label} className="explorer-legend-item">
						<span
							className="explorer-legend-color"
							style={{ backgroundColor: item.color }}
						/>
						{item.label}
					</div>
				))}
			</div>

			<div className="explorer-footnote">
				Hold <b>Ctrl + Drag</b> to tilt
				<br />
				Data: OpenGeos
			</div>
		</div>
	);
}
