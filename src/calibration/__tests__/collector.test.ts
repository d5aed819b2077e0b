import { describe, expect, it } from 'vitest';

import { CalibrationCollector, validateGeoPoint } from '../collector.js';
import { TransformEngine } from '../../engine/transform-engine.js';
import { CalibrationError, ValidationError } from '../../utils/errors.js';

describe('CalibrationCollector', () => {
  it('stores taps in native plan pixels', () => {
    const collector = new CalibrationCollector();

    const pair = collector.add({ latitude: 10, longitude: 20 }, { x: 200, y: 100 });

    expect(pair).toEqual({ world: { latitude: 10, longitude: 20 }, pixel: { x: 100, y: 50 } });
    expect(collector.count).toBe(1);
    expect(collector.step).toBe(2);
  });

  it('honours a custom display scale', () => {
    const collector = new CalibrationCollector({ displayScale: 1 });

    expect(collector.add({ latitude: 10, longitude: 20 }, { x: 200, y: 100 }).pixel).toEqual({ x: 200, y: 100 });
  });

  it('rejects a point closer than a meter to an earlier one', () => {
    const collector = new CalibrationCollector();
    collector.add({ latitude: 10, longitude: 20 }, { x: 0, y: 0 });

    expect(() => collector.add({ latitude: 10.000005, longitude: 20 }, { x: 50, y: 50 })).toThrow(
      CalibrationError
    );
    expect(collector.count).toBe(1);
  });

  it('accepts a point just over a meter away', () => {
    const collector = new CalibrationCollector();
    collector.add({ latitude: 10, longitude: 20 }, { x: 0, y: 0 });

    collector.add({ latitude: 10.00001, longitude: 20 }, { x: 50, y: 50 });

    expect(collector.count).toBe(2);
  });

  it('rejects invalid coordinates', () => {
    const collector = new CalibrationCollector();

    expect(() => collector.add({ latitude: 91, longitude: 0 }, { x: 0, y: 0 })).toThrow(ValidationError);
    expect(() => collector.add({ latitude: 0, longitude: 0 }, { x: Number.NaN, y: 0 })).toThrow(
      ValidationError
    );
  });

  it('refuses a fourth point', () => {
    const collector = new CalibrationCollector();
    collector.add({ latitude: 0, longitude: 0 }, { x: 0, y: 0 });
    collector.add({ latitude: 0.001, longitude: 0 }, { x: 200, y: 0 });
    collector.add({ latitude: 0, longitude: 0.001 }, { x: 0, y: 200 });

    expect(collector.isComplete).toBe(true);
    expect(collector.step).toBe(3);
    expect(() => collector.add({ latitude: 0.002, longitude: 0.002 }, { x: 10, y: 10 })).toThrow(
      'All three calibration points are already collected'
    );
  });

  it('requires three points before building a calibration', () => {
    const collector = new CalibrationCollector();
    collector.add({ latitude: 0, longitude: 0 }, { x: 0, y: 0 });

    expect(() => collector.toCalibration()).toThrow('Calibration needs 3 points, 1 collected');
  });

  it('commits the collected calibration to an engine', () => {
    const collector = new CalibrationCollector();
    const engine = new TransformEngine();
    collector.add({ latitude: 0, longitude: 0 }, { x: 0, y: 0 });
    collector.add({ latitude: 0.001, longitude: 0 }, { x: 200, y: 0 });
    collector.add({ latitude: 0, longitude: 0.001 }, { x: 0, y: 200 });

    collector.commit(engine);

    expect(engine.isCalibrated).toBe(true);
    const point = engine.worldToPixel(0.0005, 0.0005);
    expect(point?.x).toBeCloseTo(50, 6);
    expect(point?.y).toBeCloseTo(50, 6);
  });

  it('starts over after reset', () => {
    const collector = new CalibrationCollector();
    collector.add({ latitude: 0, longitude: 0 }, { x: 0, y: 0 });

    collector.reset();

    expect(collector.count).toBe(0);
    expect(collector.step).toBe(1);
  });
});

describe('validateGeoPoint', () => {
  it('accepts the extremes of the valid range', () => {
    expect(() => validateGeoPoint({ latitude: -90, longitude: 180 })).not.toThrow();
  });

  it('rejects longitudes outside ±180', () => {
    expect(() => validateGeoPoint({ latitude: 0, longitude: -180.5 })).toThrow('Invalid longitude: -180.5');
  });
});
