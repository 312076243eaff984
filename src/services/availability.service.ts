import { Location, ResourceRef, WashBay } from '../types/facility.types';
import { BookingSearchWindow } from '../types/booking.types';
import { BayAvailability, CapacitySnapshot, TimeSlot, TimeSlotQuery } from '../types/capacity.types';
import { BookingStore } from '../types/store.types';
import { AppError, ErrorCode, invalidInput } from '../types/error.types';
import { ResourceCatalogService } from './resource-catalog.service';
import { addMinutes, intervalFrom, overlaps } from '../utils/interval';
import { parseVehicleSize } from '../utils/vehicle-size';
import { assertValidLocation } from '../utils/geo';
import { roundToHundredths } from '../utils/rounding';

export interface AvailabilityOptions {
  /**
   * Bookings are read only when their start lies within this many hours of
   * the requested interval. 0 reads every non-terminal booking.
   */
  searchWindowHours: number;
  defaultSlotIntervalMinutes: number;
  /** Upper bound on slots examined by one enumeration */
  maxSlotSteps: number;
}

export const DEFAULT_AVAILABILITY_OPTIONS: AvailabilityOptions = {
  searchWindowHours: 24,
  defaultSlotIntervalMinutes: 30,
  maxSlotSteps: 1000,
};

function assertPositiveMinutes(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw invalidInput(`${name} must be a positive whole number of minutes`, { [name]: value });
  }
}

function assertValidDate(name: string, value: Date): void {
  if (Number.isNaN(value.getTime())) {
    throw invalidInput(`${name} is not a valid date`);
  }
}

/**
 * Availability Service
 *
 * Answers whether a wash bay or mobile team is free for a time interval, picks
 * the first free resource, and reports capacity over time. Every call is a
 * fresh read of the stores; nothing is cached between calls.
 *
 * Checking availability does not reserve anything. A caller that books the
 * resource it was offered must close the gap itself, either by holding a
 * per-resource lock from the check until the booking is committed, or by
 * relying on an exclusion constraint over (resource_id, time range) in the
 * bookings table.
 */
export class AvailabilityService {
  private options: AvailabilityOptions;

  constructor(
    private catalog: ResourceCatalogService,
    private bookingStore: BookingStore,
    options: Partial<AvailabilityOptions> = {}
  ) {
    this.options = { ...DEFAULT_AVAILABILITY_OPTIONS, ...options };
  }

  /**
   * Is the resource free for [scheduledAt, scheduledAt + durationMinutes)?
   *
   * @param excludeBookingId - a booking to ignore, typically the one being rescheduled
   * @throws AppError RESOURCE_NOT_FOUND when the id names no live bay or team
   */
  async checkResourceAvailability(
    resourceId: string,
    scheduledAt: Date,
    durationMinutes: number,
    excludeBookingId?: string
  ): Promise<boolean> {
    assertValidDate('scheduledAt', scheduledAt);
    assertPositiveMinutes('durationMinutes', durationMinutes);

    const resource = await this.catalog.findResource(resourceId);
    if (!resource) {
      throw new AppError(
        ErrorCode.RESOURCE_NOT_FOUND,
        `Resource with ID ${resourceId} not found`,
        404
      );
    }

    return this.isFree(resource, scheduledAt, durationMinutes, excludeBookingId);
  }

  /**
   * First free bay, in bay-number order, that fits the vehicle
   *
   * @returns the bay id, or null when every compatible bay is taken
   */
  async findAvailableResource(
    scheduledAt: Date,
    durationMinutes: number,
    vehicleSize: string
  ): Promise<string | null> {
    assertValidDate('scheduledAt', scheduledAt);
    assertPositiveMinutes('durationMinutes', durationMinutes);
    const size = parseVehicleSize(vehicleSize);

    const bays = await this.catalog.listCompatibleBays(size);
    for (const bay of bays) {
      if (await this.isFree(bay, scheduledAt, durationMinutes)) {
        return bay.id;
      }
    }

    return null;
  }

  /**
   * First free team, by team name, whose service area covers the location
   */
  async findAvailableMobileTeam(
    scheduledAt: Date,
    durationMinutes: number,
    location: Location
  ): Promise<string | null> {
    assertValidDate('scheduledAt', scheduledAt);
    assertPositiveMinutes('durationMinutes', durationMinutes);
    assertValidLocation(location);

    const teams = await this.catalog.listTeamsWithinRadius(location);
    for (const team of teams) {
      if (await this.isFree(team, scheduledAt, durationMinutes)) {
        return team.id;
      }
    }

    return null;
  }

  /**
   * Number of active bays free for the interval, regardless of vehicle size
   */
  async getAvailableCapacity(scheduledAt: Date, durationMinutes: number): Promise<number> {
    assertValidDate('scheduledAt', scheduledAt);
    assertPositiveMinutes('durationMinutes', durationMinutes);

    const bays = await this.catalog.listActiveBays();
    const availability = await this.checkBays(bays, scheduledAt, durationMinutes);

    return availability.filter((bay) => bay.is_available).length;
  }

  async getTimeSlotCapacityInfo(
    scheduledAt: Date,
    durationMinutes: number
  ): Promise<CapacitySnapshot> {
    assertValidDate('scheduledAt', scheduledAt);
    assertPositiveMinutes('durationMinutes', durationMinutes);

    const bays = await this.catalog.listActiveBays();
    const bayDetails = await this.checkBays(bays, scheduledAt, durationMinutes);

    const totalBays = bayDetails.length;
    const availableBays = bayDetails.filter((bay) => bay.is_available).length;
    const bookedBays = totalBays - availableBays;

    return {
      scheduled_at: scheduledAt.toISOString(),
      duration_minutes: durationMinutes,
      total_bays: totalBays,
      available_bays: availableBays,
      booked_bays: bookedBays,
      utilization_percent: totalBays > 0 ? roundToHundredths((bookedBays / totalBays) * 100) : 0,
      bay_details: bayDetails,
    };
  }

  /**
   * Slots from startDate to endDate inclusive, one every slotIntervalMinutes,
   * that have at least one free bay. Slots without capacity are left out.
   *
   * Arguments are checked before the first slot is produced.
   */
  enumerateAvailableTimeSlots(query: TimeSlotQuery): AsyncGenerator<TimeSlot> {
    const { startDate, endDate, durationMinutes } = query;
    const slotIntervalMinutes = query.slotIntervalMinutes ?? this.options.defaultSlotIntervalMinutes;

    assertValidDate('startDate', startDate);
    assertValidDate('endDate', endDate);
    assertPositiveMinutes('durationMinutes', durationMinutes);
    assertPositiveMinutes('slotIntervalMinutes', slotIntervalMinutes);

    if (endDate.getTime() < startDate.getTime()) {
      throw invalidInput('endDate must not be before startDate');
    }

    const steps =
      Math.floor((endDate.getTime() - startDate.getTime()) / (slotIntervalMinutes * 60_000)) + 1;
    if (steps > this.options.maxSlotSteps) {
      throw invalidInput(
        `Range covers ${steps} slots; at most ${this.options.maxSlotSteps} can be checked at once`,
        { steps, maxSlotSteps: this.options.maxSlotSteps }
      );
    }

    return this.generateSlots(startDate, steps, durationMinutes, slotIntervalMinutes);
  }

  async listAvailableTimeSlots(query: TimeSlotQuery): Promise<TimeSlot[]> {
    const slots: TimeSlot[] = [];
    for await (const slot of this.enumerateAvailableTimeSlots(query)) {
      slots.push(slot);
    }
    return slots;
  }

  private async *generateSlots(
    startDate: Date,
    steps: number,
    durationMinutes: number,
    slotIntervalMinutes: number
  ): AsyncGenerator<TimeSlot> {
    for (let step = 0; step < steps; step++) {
      const slotStart = addMinutes(startDate, step * slotIntervalMinutes);
      const capacity = await this.getAvailableCapacity(slotStart, durationMinutes);

      if (capacity > 0) {
        yield {
          start_time: slotStart.toISOString(),
          end_time: addMinutes(slotStart, durationMinutes).toISOString(),
          available_capacity: capacity,
          duration_minutes: durationMinutes,
        };
      }
    }
  }

  private async checkBays(
    bays: WashBay[],
    scheduledAt: Date,
    durationMinutes: number
  ): Promise<BayAvailability[]> {
    return Promise.all(
      bays.map(async (bay) => ({
        bay_id: bay.id,
        bay_number: bay.bayNumber,
        max_vehicle_size: bay.maxVehicleSize,
        is_available: await this.isFree(bay, scheduledAt, durationMinutes),
      }))
    );
  }

  private async isFree(
    resource: ResourceRef,
    scheduledAt: Date,
    durationMinutes: number,
    excludeBookingId?: string
  ): Promise<boolean> {
    const requested = intervalFrom(scheduledAt, durationMinutes);
    const bookings = await this.bookingStore.listActiveForResource(
      { kind: resource.kind, id: resource.id },
      this.searchWindow(requested.start, requested.end)
    );

    return !bookings.some(
      (booking) =>
        booking.id !== excludeBookingId &&
        overlaps(requested, intervalFrom(booking.scheduledAt, booking.durationMinutes))
    );
  }

  private searchWindow(start: Date, end: Date): BookingSearchWindow | null {
    const hours = this.options.searchWindowHours;
    if (hours <= 0) return null;

    return {
      from: addMinutes(start, -hours * 60),
      to: addMinutes(end, hours * 60),
    };
  }
}
