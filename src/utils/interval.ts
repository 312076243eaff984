/**
 * Half-open time intervals: [start, end)
 */
export interface Interval {
  start: Date;
  end: Date;
}

const MS_PER_MINUTE = 60 * 1000;

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MS_PER_MINUTE);
}

export function intervalFrom(start: Date, durationMinutes: number): Interval {
  return { start, end: addMinutes(start, durationMinutes) };
}

/**
 * Two intervals overlap when each starts before the other ends.
 * Touching endpoints do not overlap.
 */
export function overlaps(a: Interval, b: Interval): boolean {
  return a.start.getTime() < b.end.getTime() && a.end.getTime() > b.start.getTime();
}
