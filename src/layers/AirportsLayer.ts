/**
 * Airports Layer Factory
 *
 * Creates a deck.gl ScatterplotLayer for the connected airports.
 * The selected airport is drawn larger and in red.
 */

import { ScatterplotLayer } from '@deck.gl/layers';
import type { PickingInfo } from '@deck.gl/core';
import { CONFIG } from '@/lib/config';
import type { Airport, RGBColor } from '@/types';

/** Configuration for the airports layer */
export interface AirportsLayerConfig {
  id?: string;
  /** Code drawn with the selected style */
  selectedCode?: string | null;
  color?: RGBColor;
  selectedColor?: RGBColor;
  /** Radius in meters */
  radius?: number;
  selectedRadius?: number;
  visible?: boolean;
  pickable?: boolean;
  /** Called with the airport code when a point is clicked */
  onAirportClick?: (code: string) => void;
}

type AirportStyle = Required<Omit<AirportsLayerConfig, 'onAirportClick'>>;

const DEFAULT_CONFIG: AirportStyle = {
  id: 'airports',
  selectedCode: null,
  color: CONFIG.layers.airportColor,
  selectedColor: CONFIG.layers.selectedAirportColor,
  radius: CONFIG.layers.airportRadius,
  selectedRadius: CONFIG.layers.selectedAirportRadius,
  visible: true,
  pickable: true,
};

/**
 * Fill color for an airport point
 */
export function getAirportFillColor(airport: Airport, style: AirportStyle): RGBColor {
  return airport.code === style.selectedCode ? style.selectedColor : style.color;
}

/**
 * Radius in meters for an airport point
 */
export function getAirportRadius(airport: Airport, style: AirportStyle): number {
  return airport.code === style.selectedCode ? style.selectedRadius : style.radius;
}

/**
 * Click handler forwarding the picked airport's code
 */
export function createAirportClickHandler(
  onAirportClick?: (code: string) => void
): (info: Pick<PickingInfo<Airport>, 'object'>) => void {
  return (info) => {
    if (info.object && onAirportClick) {
      onAirportClick(info.object.code);
    }
  };
}

/**
 * Resolve a config against the defaults
 */
export function resolveAirportStyle(config: AirportsLayerConfig = {}): AirportStyle {
  const { onAirportClick: _onAirportClick, ...style } = config;
  return { ...DEFAULT_CONFIG, ...style };
}

/**
 * Create the airports layer
 *
 * @param airports - Connected airports (destinations plus the selection)
 * @param config - Layer configuration options
 */
export function createAirportsLayer(
  airports: Airport[],
  config: AirportsLayerConfig = {}
): ScatterplotLayer<Airport> {
  const style = resolveAirportStyle(config);

  return new ScatterplotLayer<Airport>({
    id: style.id,
    data: airports,
    visible: style.visible,

    getPosition: (d) => [d.longitude, d.latitude],
    getFillColor: (d) => getAirportFillColor(d, style),
    getRadius: (d) => getAirportRadius(d, style),
    radiusUnits: 'meters',
    radiusMinPixels: 2,

    pickable: style.pickable,
    autoHighlight: true,
    onClick: createAirportClickHandler(config.onAirportClick),

    // Accessors close over the selection, so redraw when it changes
    updateTriggers: {
      getFillColor: [style.selectedCode],
      getRadius: [style.selectedCode],
    },
  });
}
