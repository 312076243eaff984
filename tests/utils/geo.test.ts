import { describe, expect, it } from 'vitest';
import { assertValidLocation, distanceKm } from '../../src/utils/geo';
import { ErrorCode } from '../../src/types/error.types';
import { thrownBy } from '../support/errors';

describe('geo', () => {
  it('is zero between identical points', () => {
    expect(distanceKm({ latitude: 40.7, longitude: -74 }, { latitude: 40.7, longitude: -74 })).toBe(0);
  });

  it('measures one degree of longitude on the equator', () => {
    expect(distanceKm({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 })).toBeCloseTo(
      111.19492664455873,
      9
    );
  });

  it('is symmetric', () => {
    const a = { latitude: 51.5, longitude: -0.12 };
    const b = { latitude: 48.85, longitude: 2.35 };
    expect(distanceKm(a, b)).toBeCloseTo(distanceKm(b, a), 9);
  });

  it('accepts coordinates on the boundary', () => {
    const corner = { latitude: -90, longitude: 180 };
    expect(assertValidLocation(corner)).toBe(corner);
  });

  it('rejects coordinates out of range', () => {
    expect(() => assertValidLocation({ latitude: 91, longitude: 0 })).toThrowError(
      'Latitude must be between -90 and 90'
    );
    expect(() => assertValidLocation({ latitude: 0, longitude: -180.5 })).toThrowError(
      'Longitude must be between -180 and 180'
    );
    expect(thrownBy(() => assertValidLocation({ latitude: Number.NaN, longitude: 0 }))).toMatchObject({
      code: ErrorCode.INVALID_INPUT,
    });
  });
});
