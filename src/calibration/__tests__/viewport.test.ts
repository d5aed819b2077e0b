import { describe, expect, it } from 'vitest';

import { computeFocusTransform, headingMarkerRotation } from '../viewport.js';

describe('computeFocusTransform', () => {
  const viewport = { width: 400, height: 800 };

  it('centers the target at the current zoom', () => {
    const result = computeFocusTransform({
      target: { x: 100, y: 50 },
      viewport,
      currentScale: 1.5,
      pixelsPerMeter: null,
    });

    expect(result).toEqual({ scale: 1.5, translateX: -100, translateY: 250 });
  });

  it('zooms to show 200 meters across the viewport', () => {
    const result = computeFocusTransform({
      target: { x: 100, y: 50 },
      viewport,
      currentScale: 1.5,
      pixelsPerMeter: 0.5,
      fitDistance: true,
    });

    expect(result).toEqual({ scale: 2, translateX: -200, translateY: 200 });
  });

  it('keeps the current zoom when no scale is known', () => {
    const result = computeFocusTransform({
      target: { x: 0, y: 0 },
      viewport,
      currentScale: 3,
      pixelsPerMeter: null,
      fitDistance: true,
    });

    expect(result.scale).toBe(3);
  });

  it('clamps the zoom to the allowed range', () => {
    const result = computeFocusTransform({
      target: { x: 0, y: 0 },
      viewport,
      currentScale: 1,
      pixelsPerMeter: 1000,
      fitDistance: true,
    });

    expect(result.scale).toBe(0.1);
  });
});

describe('headingMarkerRotation', () => {
  const base = { northAngle: -Math.PI / 2, magnetometerHeading: 90, gpsHeading: 180 };

  it('uses the compass when standing still', () => {
    expect(headingMarkerRotation({ ...base, speed: 0.5 })).toBeCloseTo(Math.PI / 2, 12);
  });

  it('uses the GPS course when moving', () => {
    expect(headingMarkerRotation({ ...base, speed: 2 })).toBeCloseTo(Math.PI, 12);
  });

  it('keeps the compass at exactly the speed threshold', () => {
    expect(headingMarkerRotation({ ...base, speed: 1 })).toBeCloseTo(Math.PI / 2, 12);
  });
});
