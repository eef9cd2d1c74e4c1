/**
 * Layer Factories
 *
 * Exports all deck.gl layer factory functions.
 */

// Route arcs layer
export {
	createRouteArcsLayer,
	type RouteArcsLayerConfig,
} from "./RouteArcsLayer";

// Airports layer
export {
	createAirportsLayer,
	createAirportClickHandler,
	getAirportFillColor,
	getAirportRadius,
	resolveAirportStyle,
	type AirportsLayerConfig,
} from "./AirportsLayer";

// Overlay layer list and tooltips
export {
	createExplorerLayers,
	describePickedObject,
	getExplorerTooltip,
	type ExplorerLayer,
	type ExplorerLayerHandlers,
} from "./ExplorerLayers";
