import { describe, expect, it } from 'vitest';

import { EARTH_RADIUS_METERS, haversineDistance, pixelDistance } from '../geodesy.js';

describe('haversineDistance', () => {
  it('is zero for identical points', () => {
    const point = { latitude: 51.5, longitude: -0.12 };

    expect(haversineDistance(point, point)).toBe(0);
  });

  it('measures a thousandth of a degree along the equator', () => {
    const distance = haversineDistance(
      { latitude: 0, longitude: 0 },
      { latitude: 0, longitude: 0.001 }
    );

    expect(distance).toBeCloseTo(111.3195, 3);
  });

  it('measures half the circumference between antipodes', () => {
    const distance = haversineDistance(
      { latitude: 0, longitude: 0 },
      { latitude: 0, longitude: 180 }
    );

    expect(distance).toBeCloseTo(Math.PI * EARTH_RADIUS_METERS, 3);
  });

  it('is symmetric', () => {
    const a = { latitude: 48.8584, longitude: 2.2945 };
    const b = { latitude: 48.86, longitude: 2.3 };

    expect(haversineDistance(a, b)).toBeCloseTo(haversineDistance(b, a), 9);
  });
});

describe('pixelDistance', () => {
  it('is the Euclidean distance', () => {
    expect(pixelDistance({ x: 1, y: 1 }, { x: 4, y: 5 })).toBe(5);
  });
});
