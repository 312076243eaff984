/**
 * Round to two decimals, ties to even.
 *
 * A double lies exactly halfway between two hundredths only when it is an odd
 * multiple of 1/8 (x.125, x.375, x.625, x.875); everything else is rounded on
 * its exact binary value by toFixed.
 */
export function roundToHundredths(value: number): number {
  const eighths = value * 8;

  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    const lower = Math.floor(value * 100);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return even / 100;
  }

  return Number(value.toFixed(2));
}
