import { describe, expect, it } from 'vitest';

import { createDefaultConfig, DEFAULT_STORE_PATH } from '../config.js';
import { haversineDistance } from '../transform/geodesy.js';

describe('createDefaultConfig', () => {
  it('uses the documented defaults', () => {
    const config = createDefaultConfig({});

    expect(config.storePath).toBe(DEFAULT_STORE_PATH);
    expect(config.engine).toEqual({
      determinantEpsilon: 1e-10,
      distanceSquaredEpsilon: 1e-20,
      distance: haversineDistance,
    });
    expect(config.viewport).toEqual({ visibleMeters: 200, displayScale: 2, minScale: 0.1, maxScale: 20 });
    expect(config.collector).toEqual({ minSeparationMeters: 1, displayScale: 2 });
  });

  it('reads the store path from the environment', () => {
    expect(createDefaultConfig({ PLAN_STORE_PATH: '/data/plans.json' }).storePath).toBe('/data/plans.json');
  });
});
