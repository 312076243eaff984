import { z } from 'zod';

export const isoDateTime = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .datetime({ offset: true, message: `${field} must be an ISO-8601 timestamp` })
    .transform((value) => new Date(value));

export const positiveMinutes = (field: string) =>
  z.coerce
    .number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be an integer`)
    .positive(`${field} must be positive`);

export const latitude = z.coerce
  .number({ invalid_type_error: 'Latitude must be a number' })
  .min(-90, 'Latitude must be between -90 and 90')
  .max(90, 'Latitude must be between -90 and 90');

export const longitude = z.coerce
  .number({ invalid_type_error: 'Longitude must be a number' })
  .min(-180, 'Longitude must be between -180 and 180')
  .max(180, 'Longitude must be between -180 and 180');

export const resourceIdParams = (label: string) =>
  z.object({
    id: z.string().uuid(`Invalid ${label} ID format`),
  });

// Query strings only carry text
export const queryBoolean = z
  .enum(['true', 'false'])
  .optional()
  .transform((value) => value === 'true');
