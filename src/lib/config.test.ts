import { describe, it, expect } from 'vitest';
import { CONFIG } from './config';

describe('CONFIG', () => {
  describe('data paths', () => {
    it('should default to the files written by the data script', () => {
      expect(CONFIG.data.routes).toBe('/data/airport_routes.csv');
      expect(CONFIG.data.airports).toBe('/data/airports.geojson');
    });

    it('should have a positive load timeout', () => {
      expect(CONFIG.data.timeoutMs).toBeGreaterThan(0);
    });
  });

  describe('map settings', () => {
    it('should center on valid WGS84 coordinates', () => {
      const [lng, lat] = CONFIG.map.center;
      expect(lng).toBeGreaterThanOrEqual(-180);
      expect(lng).toBeLessThanOrEqual(180);
      expect(lat).toBeGreaterThanOrEqual(-90);
      expect(lat).toBeLessThanOrEqual(90);
    });

    it('should have a world-scale zoom', () => {
      expect(CONFIG.map.zoom).toBeGreaterThanOrEqual(0);
      expect(CONFIG.map.zoom).toBeLessThan(10);
    });
  });

  describe('explorer settings', () => {
    it('should default to ATL with both layers shown', () => {
      expect(CONFIG.explorer.defaultAirport).toBe('ATL');
      expect(CONFIG.explorer.showRoutes).toBe(true);
      expect(CONFIG.explorer.showAirports).toBe(true);
    });
  });

  describe('layer styling', () => {
    it('should use 0-255 color channels', () => {
      const colors = [
        CONFIG.layers.arcSourceColor,
        CONFIG.layers.arcTargetColor,
        CONFIG.layers.selectedAirportColor,
        CONFIG.layers.airportColor,
      ];
      for (const color of colors) {
        expect(color).toHaveLength(3);
        for (const channel of color) {
          expect(channel).toBeGreaterThanOrEqual(0);
          expect(channel).toBeLessThanOrEqual(255);
        }
      }
    });

    it('should draw the selected airport larger than the others', () => {
      expect(CONFIG.layers.selectedAirportRadius).toBeGreaterThan(CONFIG.layers.airportRadius);
    });
  });
});
