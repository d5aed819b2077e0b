/**
 * Plan Locator Configuration
 *
 * Defaults for every tunable, and the environment overrides the CLI honours.
 */

import { haversineDistance } from './transform/geodesy.js';
import type {
  CollectorOptions,
  EngineOptions,
  PlanLocatorConfig,
  ViewportOptions,
} from './types.js';

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  determinantEpsilon: 1e-10,
  distanceSquaredEpsilon: 1e-20,
  distance: haversineDistance,
};

export const DEFAULT_VIEWPORT_OPTIONS: ViewportOptions = {
  visibleMeters: 200,
  displayScale: 2,
  minScale: 0.1,
  maxScale: 20,
};

export const DEFAULT_COLLECTOR_OPTIONS: CollectorOptions = {
  minSeparationMeters: 1.0,
  displayScale: 2,
};

export const DEFAULT_STORE_PATH = 'plans.json';

/**
 * Create the default configuration, applying environment overrides
 *
 * PLAN_STORE_PATH  JSON file holding saved plans
 */
export function createDefaultConfig(env: NodeJS.ProcessEnv = process.env): PlanLocatorConfig {
  return {
    engine: { ...DEFAULT_ENGINE_OPTIONS },
    viewport: { ...DEFAULT_VIEWPORT_OPTIONS },
    collector: { ...DEFAULT_COLLECTOR_OPTIONS },
    storePath: env.PLAN_STORE_PATH || DEFAULT_STORE_PATH,
  };
}
