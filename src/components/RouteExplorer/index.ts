/**
 * RouteExplorer Component Barrel Export
 */

export { RouteExplorer, type RouteExplorerProps } from "./RouteExplorer";
export { ExplorerPanel, type ExplorerPanelProps } from "./ExplorerPanel";
