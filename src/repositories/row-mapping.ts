import { Location, ResourceStatus, StatusCounts, VehicleSize } from '../types/facility.types';
import { AppError, ErrorCode } from '../types/error.types';
import { isVehicleSize } from '../utils/vehicle-size';

// PostgREST: no rows for .single()
export const PGRST_NO_ROWS = 'PGRST116';
// PostgreSQL unique_violation
export const PG_UNIQUE_VIOLATION = '23505';

const RESOURCE_STATUSES: readonly string[] = Object.values(ResourceStatus);

function isResourceStatus(value: string): value is ResourceStatus {
  return RESOURCE_STATUSES.includes(value);
}

function corruptRow(table: string, column: string, value: unknown): AppError {
  return new AppError(
    ErrorCode.INTERNAL_ERROR,
    `Unexpected ${column} value in ${table}: ${String(value)}`,
    500
  );
}

export function toResourceStatus(table: string, value: string): ResourceStatus {
  if (!isResourceStatus(value)) throw corruptRow(table, 'status', value);
  return value;
}

export function toVehicleSize(table: string, value: string): VehicleSize {
  if (!isVehicleSize(value)) throw corruptRow(table, 'max_vehicle_size', value);
  return value;
}

// numeric columns arrive as strings
export function toNumber(value: number | string): number {
  return typeof value === 'number' ? value : Number(value);
}

export function toLocation(
  latitude: number | string | null,
  longitude: number | string | null
): Location | null {
  if (latitude === null || longitude === null) return null;
  return { latitude: toNumber(latitude), longitude: toNumber(longitude) };
}

// Trailing Z, or an offset such as +00 or -05:00
const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Timestamp columns without a time zone come back with no offset and hold UTC.
 * Date would read those as host-local time.
 */
export function toUtcDate(value: string): Date {
  return new Date(ZONE_DESIGNATOR.test(value) ? value : `${value}Z`);
}

export function toDateOrNull(value: string | null): Date | null {
  return value ? toUtcDate(value) : null;
}

export function emptyStatusCounts(): StatusCounts {
  return {
    [ResourceStatus.ACTIVE]: 0,
    [ResourceStatus.INACTIVE]: 0,
    [ResourceStatus.MAINTENANCE]: 0,
  };
}

export function countStatuses(table: string, rows: Array<{ status: string }>): StatusCounts {
  return rows.reduce((counts, row) => {
    const status = toResourceStatus(table, row.status);
    counts[status] += 1;
    return counts;
  }, emptyStatusCounts());
}
