import { describe, expect, it } from 'vitest';

import { projectFromGeo, projectToGeo, registerEPSG } from '../projection.js';
import { ProjectionError } from '../../utils/errors.js';

describe('projectToGeo', () => {
  it('places the central meridian of UTM zone 31N at easting 500000', () => {
    const point = projectToGeo(500000, 0, 32631);

    expect(point.latitude).toBeCloseTo(0, 6);
    expect(point.longitude).toBeCloseTo(3, 6);
  });

  it('rejects unknown EPSG codes', () => {
    expect(() => projectToGeo(0, 0, 999999)).toThrow(ProjectionError);
  });

  it('uses registered definitions', () => {
    registerEPSG(990001, '+proj=longlat +datum=WGS84 +no_defs');

    const point = projectToGeo(12.5, 41.9, 990001);

    expect(point.latitude).toBeCloseTo(41.9, 9);
    expect(point.longitude).toBeCloseTo(12.5, 9);
  });
});

describe('projectFromGeo', () => {
  it('projects onto UTM zone 31N', () => {
    const { easting, northing } = projectFromGeo({ latitude: 0, longitude: 3 }, 32631);

    expect(easting).toBeCloseTo(500000, 3);
    expect(northing).toBeCloseTo(0, 3);
  });
});
