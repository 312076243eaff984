import { z } from 'zod';
import { VehicleSize } from '../types/facility.types';
import { isoDateTime, latitude, longitude, positiveMinutes, resourceIdParams } from './common';

/**
 * Availability query schemas
 *
 * Range and ordering checks (end before start, too many slots) live in the
 * service so that in-process callers get them too.
 */

const slotQuery = {
  scheduled_at: isoDateTime('scheduled_at'),
  duration_minutes: positiveMinutes('duration_minutes'),
};

export const checkResourceSchema = z.object({
  params: resourceIdParams('resource'),
  query: z.object({
    ...slotQuery,
    exclude_booking_id: z.string().min(1).optional(),
  }),
});

export const findWashBaySchema = z.object({
  query: z.object({
    ...slotQuery,
    vehicle_size: z.nativeEnum(VehicleSize, {
      errorMap: () => ({ message: 'Vehicle size must be compact, standard, large or oversized' }),
    }),
  }),
});

export const findMobileTeamSchema = z.object({
  query: z.object({
    ...slotQuery,
    latitude,
    longitude,
  }),
});

export const capacitySchema = z.object({
  query: z.object(slotQuery),
});

export const timeSlotsSchema = z.object({
  query: z.object({
    start_date: isoDateTime('start_date'),
    end_date: isoDateTime('end_date'),
    duration_minutes: positiveMinutes('duration_minutes'),
    slot_interval_minutes: positiveMinutes('slot_interval_minutes').optional(),
  }),
});
