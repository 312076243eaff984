import { describe, expect, it } from 'vitest';
import { roundToHundredths } from '../../src/utils/rounding';

describe('roundToHundredths', () => {
  it('rounds ordinary values to the nearest hundredth', () => {
    expect(roundToHundredths(100 / 3)).toBe(33.33);
    expect(roundToHundredths(200 / 3)).toBe(66.67);
    expect(roundToHundredths(50)).toBe(50);
    expect(roundToHundredths(12.5)).toBe(12.5);
  });

  it('sends exact halves to the even neighbour', () => {
    expect(roundToHundredths(3.125)).toBe(3.12);
    expect(roundToHundredths(9.375)).toBe(9.38);
    expect(roundToHundredths(15.625)).toBe(15.62);
    expect(roundToHundredths(0.875)).toBe(0.88);
  });

  it('rounds values just off a half by their binary value', () => {
    // 1.005 is stored as 1.00499999...
    expect(roundToHundredths(1.005)).toBe(1);
  });
});
