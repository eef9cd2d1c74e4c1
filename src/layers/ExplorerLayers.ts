/**
 * Explorer Layers
 *
 * Builds the overlay layer list for the current selection and provides
 * tooltip text for picked objects.
 */

import type { PickingInfo } from '@deck.gl/core';
import type { ArcLayer, ScatterplotLayer } from '@deck.gl/layers';
import type { Airport, ExplorerView, Route, SelectionState } from '@/types';
import { isRecord } from '@/utils/guards';
import { createRouteArcsLayer } from './RouteArcsLayer';
import { createAirportsLayer } from './AirportsLayer';

export type ExplorerLayer = ArcLayer<Route> | ScatterplotLayer<Airport>;

export interface ExplorerLayerHandlers {
  onAirportClick?: (code: string) => void;
}

/**
 * Create the overlay layers for a view.
 *
 * Each visibility flag adds or removes exactly one layer.
 *
 * @param view - Derived view for the selection
 * @param selection - Current selection (code and visibility flags)
 * @param handlers - Interaction callbacks
 */
export function createExplorerLayers(
  view: ExplorerView,
  selection: SelectionState,
  handlers: ExplorerLayerHandlers = {}
): ExplorerLayer[] {
  const layers: ExplorerLayer[] = [];

  if (selection.showRoutes) {
    layers.push(createRouteArcsLayer(view.routes));
  }

  if (selection.showAirports) {
    layers.push(
      createAirportsLayer(view.airports, {
        selectedCode: selection.airportCode,
        onAirportClick: handlers.onAirportClick,
      })
    );
  }

  return layers;
}

/**
 * Tooltip text for a picked route or airport
 */
export function describePickedObject(object: unknown): string | null {
  if (!isRecord(object)) return null;

  const { source, destination, code, name } = object;
  if (typeof source === 'string' && typeof destination === 'string') {
    return `${source} -> ${destination}`;
  }
  if (typeof code === 'string' && typeof name === 'string') {
    return `${name} (${code})`;
  }
  return null;
}

/**
 * Tooltip callback for the overlay
 */
export function getExplorerTooltip(info: PickingInfo): string | null {
  return describePickedObject(info.object);
}
