import { Request, Response } from 'express';
import { AvailabilityService } from '../services/availability.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../middleware/validation.middleware';
import {
  capacitySchema,
  checkResourceSchema,
  findMobileTeamSchema,
  findWashBaySchema,
  timeSlotsSchema,
} from '../validators/availability.validator';

/**
 * Availability Controller
 *
 * "Nothing free" is a normal 200 answer with a null id, never an error
 */
export class AvailabilityController {
  constructor(private availabilityService: AvailabilityService) {}

  /**
   * GET /v1/availability/resources/:id
   */
  checkResource = asyncHandler(async (req: Request, res: Response) => {
    const { params, query } = parseRequest(checkResourceSchema, req, res);

    const isAvailable = await this.availabilityService.checkResourceAvailability(
      params.id,
      query.scheduled_at,
      query.duration_minutes,
      query.exclude_booking_id
    );

    res.status(200).json(
      createSuccessResponse({
        resource_id: params.id,
        scheduled_at: query.scheduled_at.toISOString(),
        duration_minutes: query.duration_minutes,
        is_available: isAvailable,
      })
    );
  });

  /**
   * GET /v1/availability/wash-bay
   */
  findWashBay = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(findWashBaySchema, req, res);

    const washBayId = await this.availabilityService.findAvailableResource(
      query.scheduled_at,
      query.duration_minutes,
      query.vehicle_size
    );

    res.status(200).json(
      createSuccessResponse(
        {
          wash_bay_id: washBayId,
          vehicle_size: query.vehicle_size,
          scheduled_at: query.scheduled_at.toISOString(),
          duration_minutes: query.duration_minutes,
        },
        washBayId ? undefined : 'No compatible wash bay is free for this slot'
      )
    );
  });

  /**
   * GET /v1/availability/mobile-team
   */
  findMobileTeam = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(findMobileTeamSchema, req, res);

    const mobileTeamId = await this.availabilityService.findAvailableMobileTeam(
      query.scheduled_at,
      query.duration_minutes,
      { latitude: query.latitude, longitude: query.longitude }
    );

    res.status(200).json(
      createSuccessResponse(
        {
          mobile_team_id: mobileTeamId,
          scheduled_at: query.scheduled_at.toISOString(),
          duration_minutes: query.duration_minutes,
        },
        mobileTeamId ? undefined : 'No mobile team covering this location is free for this slot'
      )
    );
  });

  /**
   * GET /v1/availability/capacity
   */
  getCapacity = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(capacitySchema, req, res);

    const availableCapacity = await this.availabilityService.getAvailableCapacity(
      query.scheduled_at,
      query.duration_minutes
    );

    res.status(200).json(
      createSuccessResponse({
        scheduled_at: query.scheduled_at.toISOString(),
        duration_minutes: query.duration_minutes,
        available_capacity: availableCapacity,
      })
    );
  });

  /**
   * GET /v1/availability/capacity/details
   */
  getCapacityDetails = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(capacitySchema, req, res);

    const snapshot = await this.availabilityService.getTimeSlotCapacityInfo(
      query.scheduled_at,
      query.duration_minutes
    );

    res.status(200).json(createSuccessResponse(snapshot));
  });

  /**
   * GET /v1/availability/time-slots
   */
  listTimeSlots = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(timeSlotsSchema, req, res);

    const slots = await this.availabilityService.listAvailableTimeSlots({
      startDate: query.start_date,
      endDate: query.end_date,
      durationMinutes: query.duration_minutes,
      slotIntervalMinutes: query.slot_interval_minutes,
    });

    res.status(200).json(createSuccessResponse(slots));
  });
}
