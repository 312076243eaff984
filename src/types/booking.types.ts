/**
 * Booking types
 *
 * Bookings are written by the booking subsystem; this service only reads the
 * fields it needs to decide whether a resource is occupied.
 */

export enum BookingStatus {
  PENDING = 'pending',
  CONFIRMED = 'confirmed',
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
  NO_SHOW = 'no_show',
}

// Statuses that still hold a resource
export const OCCUPYING_BOOKING_STATUSES: readonly BookingStatus[] = [
  BookingStatus.PENDING,
  BookingStatus.CONFIRMED,
  BookingStatus.IN_PROGRESS,
];

export interface BookingOccupancy {
  id: string;
  scheduledAt: Date;
  durationMinutes: number;
}

export interface BookingOccupancyRow {
  id: string;
  scheduled_at: string;
  estimated_duration_minutes: number;
}

/** Bounds on a booking's scheduled start, both inclusive */
export interface BookingSearchWindow {
  from: Date;
  to: Date;
}
