/**
 * Hooks barrel export
 */

export { useFlightData, type UseFlightDataConfig, type UseFlightDataResult } from './useFlightData';
export { useRouteExplorer, type UseRouteExplorerOptions, type UseRouteExplorerResult } from './useRouteExplorer';
export { useRouteOverlay, type UseRouteOverlayOptions, type UseRouteOverlayResult } from './useRouteOverlay';
