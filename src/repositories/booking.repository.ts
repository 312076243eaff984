import { SupabaseClient } from '@supabase/supabase-js';
import {
  BookingOccupancy,
  BookingOccupancyRow,
  BookingSearchWindow,
  OCCUPYING_BOOKING_STATUSES,
} from '../types/booking.types';
import { ResourceKind, ResourceRef } from '../types/facility.types';
import { BookingStore } from '../types/store.types';
import { storeUnavailable } from '../types/error.types';
import { toUtcDate } from './row-mapping';
import { createComponentLogger } from '../config/logger';

const log = createComponentLogger('booking-repository');

const ASSIGNMENT_COLUMN: Record<ResourceKind, string> = {
  wash_bay: 'wash_bay_id',
  mobile_team: 'mobile_team_id',
};

/**
 * Booking Repository
 *
 * Read-only view of the bookings table, limited to what occupancy checks need
 */
export class BookingRepository implements BookingStore {
  constructor(private client: SupabaseClient) {}

  async listActiveForResource(
    resource: ResourceRef,
    window: BookingSearchWindow | null
  ): Promise<BookingOccupancy[]> {
    let request = this.client
      .from('bookings')
      .select('id, scheduled_at, estimated_duration_minutes')
      .eq(ASSIGNMENT_COLUMN[resource.kind], resource.id)
      .in('status', [...OCCUPYING_BOOKING_STATUSES]);

    if (window) {
      request = request
        .gte('scheduled_at', window.from.toISOString())
        .lte('scheduled_at', window.to.toISOString());
    }

    const { data, error } = await request;

    if (error) {
      log.error('Failed to list bookings for resource', {
        resource,
        error: error.message,
      });
      throw storeUnavailable('list bookings', error.message);
    }

    return (data ?? []).map((row: BookingOccupancyRow) => this.mapToOccupancy(row));
  }

  private mapToOccupancy(row: BookingOccupancyRow): BookingOccupancy {
    return {
      id: row.id,
      scheduledAt: toUtcDate(row.scheduled_at),
      durationMinutes: row.estimated_duration_minutes,
    };
  }
}
