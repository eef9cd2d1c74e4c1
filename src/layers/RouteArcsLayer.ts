/**
 * Route Arcs Layer Factory
 *
 * Creates a deck.gl ArcLayer connecting the selected airport to each
 * destination. Arcs fade from green at the source to amber at the target.
 */

import { ArcLayer } from '@deck.gl/layers';
import { CONFIG } from '@/lib/config';
import type { RGBColor, Route } from '@/types';

/** Configuration for the route arcs layer */
export interface RouteArcsLayerConfig {
  id?: string;
  sourceColor?: RGBColor;
  targetColor?: RGBColor;
  /** Arc width in pixels */
  width?: number;
  visible?: boolean;
  pickable?: boolean;
}

const DEFAULT_CONFIG: Required<RouteArcsLayerConfig> = {
  id: 'route-arcs',
  sourceColor: CONFIG.layers.arcSourceColor,
  targetColor: CONFIG.layers.arcTargetColor,
  width: CONFIG.layers.arcWidth,
  visible: true,
  pickable: true,
};

/**
 * Create the route arcs layer
 *
 * @param routes - Routes departing from the selected airport
 * @param config - Layer configuration options
 */
export function createRouteArcsLayer(
  routes: Route[],
  config: RouteArcsLayerConfig = {}
): ArcLayer<Route> {
  const cfg = { ...DEFAULT_CONFIG, ...config };

  return new ArcLayer<Route>({
    id: cfg.id,
    data: routes,
    visible: cfg.visible,

    getSourcePosition: (d) => [d.sourceLon, d.sourceLat],
    getTargetPosition: (d) => [d.destinationLon, d.destinationLat],
    getSourceColor: cfg.sourceColor,
    getTargetColor: cfg.targetColor,
    getWidth: cfg.width,

    pickable: cfg.pickable,
    autoHighlight: true,
  });
}
