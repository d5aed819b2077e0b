import { describe, expect, it } from 'vitest';

import { UsageError, parseArgs, parsePoint } from '../cli-args.js';

describe('parseArgs', () => {
  it('reads the command and its options', () => {
    const options = parseArgs(['locate', '--id', 'plan-1', '--lat', '48.85', '--lng', '2.29']);

    expect(options).toEqual({ command: 'locate', points: [], id: 'plan-1', lat: 48.85, lng: 2.29 });
  });

  it('collects repeated --point values', () => {
    const options = parseArgs(['calibrate', '--point', '1,2,3,4', '--point', '5,6,7,8']);

    expect(options.points).toEqual(['1,2,3,4', '5,6,7,8']);
  });

  it('raises a usage error when --point has no value', () => {
    expect(() => parseArgs(['calibrate', '--point', '1,2,3,4', '--point'])).toThrow(UsageError);
    expect(() => parseArgs(['calibrate', '--point'])).toThrow('--point is required');
  });
});

describe('parsePoint', () => {
  it('splits latitude, longitude and pixel', () => {
    expect(parsePoint('48.85, 2.29, 120, 80')).toEqual({
      world: { latitude: 48.85, longitude: 2.29 },
      pixel: { x: 120, y: 80 },
    });
  });

  it('rejects values that are not four numbers', () => {
    expect(() => parsePoint('48.85,2.29,120')).toThrow(
      'Invalid --point "48.85,2.29,120", expected four comma-separated numbers'
    );
  });
});
