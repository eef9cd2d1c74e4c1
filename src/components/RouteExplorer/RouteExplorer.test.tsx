import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { render, screen, fireEvent, waitFor, act } from '@testing-library/react';
import maplibregl from 'maplibre-gl';
import { RouteExplorer } from './RouteExplorer';
import { loadFlightDataWithTimeout } from '@/lib/data';
import { makeAirport, makeTestData } from '@/test/fixtures';

interface MapStub {
  handlers: Map<string, () => void>;
  addControl: Mock;
}

interface LayerStub {
  id: string;
  props: { id: string; onClick?: (info: { object?: unknown }) => void };
}

interface OverlayStub {
  setProps: Mock<(props: { layers?: LayerStub[] }) => void>;
}

const { mapInstances, overlayInstances } = vi.hoisted(() => ({
  mapInstances: [] as MapStub[],
  overlayInstances: [] as OverlayStub[],
}));

// Mock maplibre-gl to avoid browser API requirements in tests
vi.mock('maplibre-gl', () => {
  const MapMock = vi.fn(function () {
    const handlers = new Map<string, () => void>();
    const instance = {
      handlers,
      on: vi.fn((event: string, handler: () => void) => {
        handlers.set(event, handler);
      }),
      addControl: vi.fn(),
      removeControl: vi.fn(),
      remove: vi.fn(),
    };
    mapInstances.push(instance);
    return instance;
  });
  const NavigationControl = vi.fn(function () {
    return {};
  });
  return {
    default: { Map: MapMock, NavigationControl },
    Map: MapMock,
    NavigationControl,
  };
});

vi.mock('@deck.gl/mapbox', () => ({
  MapboxOverlay: class MapboxOverlay {
    setProps = vi.fn<(props: { layers?: LayerStub[] }) => void>();
    constructor() {
      overlayInstances.push(this);
    }
  },
}));

vi.mock('@deck.gl/layers', () => {
  class MockLayer {
    id: string;
    props: LayerStub['props'];
    constructor(props: LayerStub['props']) {
      this.id = props.id;
      this.props = props;
    }
  }
  return { ArcLayer: MockLayer, ScatterplotLayer: MockLayer };
});

/** Layers most recently handed to the overlay */
function latestLayers(): LayerStub[] {
  const calls = overlayInstances[0]?.setProps.mock.calls ?? [];
  return calls[calls.length - 1]?.[0].layers ?? [];
}

async function renderLoaded() {
  render(<RouteExplorer />);
  await waitFor(() => expect(screen.getByText('Routes: 2')).toBeInTheDocument());
  act(() => mapInstances[0]?.handlers.get('load')?.());
}

vi.mock('@/lib/data', () => ({
  loadFlightDataWithTimeout: vi.fn(),
}));

describe('RouteExplorer', () => {
  beforeEach(() => {
    mapInstances.length = 0;
    overlayInstances.length = 0;
    vi.mocked(loadFlightDataWithTimeout).mockResolvedValue(makeTestData());
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should create the map with the configured style and center', () => {
    render(<RouteExplorer />);

    expect(maplibregl.Map).toHaveBeenCalledWith(
      expect.objectContaining({
        container: screen.getByTestId('explorer-map'),
        style: 'https://tiles.openfreemap.org/styles/liberty',
        center: [-84.4, 33.75],
        zoom: 3,
      })
    );
  });

  it('should select the default airport once data loads', async () => {
    render(<RouteExplorer />);

    await waitFor(() => expect(screen.getByText('Routes: 2')).toBeInTheDocument());
    expect(screen.getByLabelText('Select Airport')).toHaveValue('ATL');
    expect(screen.getByText('Atlanta Test Airport')).toBeInTheDocument();
  });

  it('should update the summary when another airport is selected', async () => {
    render(<RouteExplorer />);
    await waitFor(() => expect(screen.getByText('Routes: 2')).toBeInTheDocument());

    fireEvent.change(screen.getByLabelText('Select Airport'), { target: { value: 'ORD' } });

    expect(screen.getByText('Chicago Test Airport')).toBeInTheDocument();
    expect(screen.getByText('Routes: 1')).toBeInTheDocument();
    expect(screen.getByText('Destinations: 1')).toBeInTheDocument();
  });

  it('should add the overlay when the map loads', async () => {
    render(<RouteExplorer />);
    await waitFor(() => expect(screen.getByText('Routes: 2')).toBeInTheDocument());

    const map = mapInstances[0];
    expect(map).toBeDefined();
    act(() => map?.handlers.get('load')?.());

    // Navigation control plus the deck.gl overlay
    expect(map?.addControl).toHaveBeenCalledTimes(2);
  });

  it('should send both layers to the overlay and drop arcs when routes are hidden', async () => {
    await renderLoaded();
    expect(latestLayers().map((layer) => layer.id)).toEqual(['route-arcs', 'airports']);

    fireEvent.click(screen.getByLabelText('Show Flight Routes'));

    expect(latestLayers().map((layer) => layer.id)).toEqual(['airports']);
    expect(screen.getByText('Routes: 2')).toBeInTheDocument();
  });

  it('should select a source airport clicked on the map', async () => {
    await renderLoaded();
    const airports = latestLayers().find((layer) => layer.id === 'airports');

    act(() => airports?.props.onClick?.({ object: makeAirport('ORD', 'Chicago Test Airport') }));

    expect(screen.getByLabelText('Select Airport')).toHaveValue('ORD');
    expect(screen.getByText('Chicago Test Airport')).toBeInTheDocument();
    expect(screen.getByText('Routes: 1')).toBeInTheDocument();
  });

  it('should ignore clicks on airports without routes', async () => {
    await renderLoaded();
    const airports = latestLayers().find((layer) => layer.id === 'airports');

    act(() => airports?.props.onClick?.({ object: makeAirport('JFK', 'New York Test Airport') }));

    expect(screen.getByLabelText('Select Airport')).toHaveValue('ATL');
    expect(screen.getByText('Routes: 2')).toBeInTheDocument();
  });

  it('should report progress completion', async () => {
    const onLoadProgress = vi.fn();
    render(<RouteExplorer onLoadProgress={onLoadProgress} />);

    await waitFor(() => expect(onLoadProgress).toHaveBeenCalledWith(100));
  });

  it('should report load errors', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.mocked(loadFlightDataWithTimeout).mockRejectedValue(new Error('Failed to load routes: 500 Server Error'));
    const onError = vi.fn();

    render(<RouteExplorer onError={onError} />);

    await waitFor(() => expect(onError).toHaveBeenCalled());
    expect(onError.mock.calls[0]?.[0]).toEqual(new Error('Failed to load routes: 500 Server Error'));
  });
});
