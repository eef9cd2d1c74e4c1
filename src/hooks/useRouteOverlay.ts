/**
 * Route Overlay Hook
 *
 * Owns the deck.gl overlay attached to the MapLibre map. The overlay is
 * created once when the map has loaded and receives the current layer
 * list on every change.
 */

import { useState, useCallback, useEffect, useRef } from 'react';
import type maplibregl from 'maplibre-gl';
import { MapboxOverlay } from '@deck.gl/mapbox';
import type { PickingInfo } from '@deck.gl/core';
import type { ExplorerLayer } from '@/layers';

export interface UseRouteOverlayOptions {
  /** Layers to draw; replaced wholesale on change */
  layers: ExplorerLayer[];
  /** Tooltip text for hovered objects */
  getTooltip?: (info: PickingInfo) => string | null;
}

export interface UseRouteOverlayResult {
  /** The MapboxOverlay instance, null until initialized */
  overlay: MapboxOverlay | null;
  /** Create the overlay and add it to a loaded map */
  initializeOverlay: (map: maplibregl.Map) => void;
  /** Remove the overlay from the map */
  cleanup: () => void;
}

/**
 * Hook that creates and manages the deck.gl route overlay on MapLibre
 *
 * @example
 * ```tsx
 * const { initializeOverlay, cleanup } = useRouteOverlay({ layers });
 *
 * map.on('load', () => initializeOverlay(map));
 * ```
 */
export function useRouteOverlay(options: UseRouteOverlayOptions): UseRouteOverlayResult {
  const { layers, getTooltip } = options;

  const [overlay, setOverlay] = useState<MapboxOverlay | null>(null);
  const mapRef = useRef<maplibregl.Map | null>(null);
  const overlayRef = useRef<MapboxOverlay | null>(null);

  const initializeOverlay = useCallback(
    (map: maplibregl.Map) => {
      if (overlayRef.current) return;
      mapRef.current = map;

      // Interleaved so arcs render between basemap labels and features.
      // Layers and tooltip arrive through setProps below.
      const newOverlay = new MapboxOverlay({
        interleaved: true,
        layers: [],
      });

      overlayRef.current = newOverlay;
      setOverlay(newOverlay);

      map.addControl(newOverlay as unknown as maplibregl.IControl);
      console.log('[useRouteOverlay] Overlay initialized and added to map');
    },
    []
  );

  const cleanup = useCallback(() => {
    const map = mapRef.current;
    const currentOverlay = overlayRef.current;

    if (map && currentOverlay) {
      map.removeControl(currentOverlay as unknown as maplibregl.IControl);
    }

    overlayRef.current = null;
    mapRef.current = null;
    setOverlay(null);
  }, []);

  // Redraw whenever the layer list or tooltip changes
  useEffect(() => {
    if (!overlay) return;
    overlay.setProps(getTooltip ? { layers, getTooltip } : { layers });
  }, [overlay, layers, getTooltip]);

  return { overlay, initializeOverlay, cleanup };
}
