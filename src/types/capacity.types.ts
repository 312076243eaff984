/**
 * Capacity report types
 *
 * These are serialized as-is, hence snake_case.
 */

import { VehicleSize } from './facility.types';

export interface BayAvailability {
  bay_id: string;
  bay_number: string;
  max_vehicle_size: VehicleSize;
  is_available: boolean;
}

export interface CapacitySnapshot {
  scheduled_at: string;
  duration_minutes: number;
  total_bays: number;
  available_bays: number;
  booked_bays: number;
  utilization_percent: number;
  bay_details: BayAvailability[];
}

export interface TimeSlot {
  start_time: string;
  end_time: string;
  available_capacity: number;
  duration_minutes: number;
}

export interface TimeSlotQuery {
  startDate: Date;
  endDate: Date;
  durationMinutes: number;
  slotIntervalMinutes?: number;
}
