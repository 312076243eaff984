import { Request, Response } from 'express';
import { FacilityService } from '../services/facility.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../middleware/validation.middleware';
import {
  createWashBaySchema,
  listResourcesSchema,
  updateWashBaySchema,
  washBayIdSchema,
} from '../validators/facility.validator';

/**
 * Wash Bay Controller
 *
 * HTTP request handlers for wash bay endpoints
 */
export class WashBayController {
  constructor(private facilityService: FacilityService) {}

  /**
   * POST /v1/wash-bays
   */
  createWashBay = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(createWashBaySchema, req, res);

    const bay = await this.facilityService.createWashBay({
      bayNumber: body.bay_number,
      maxVehicleSize: body.max_vehicle_size,
      equipmentTypes: body.equipment_types,
      latitude: body.latitude,
      longitude: body.longitude,
    });

    res.status(201).json(createSuccessResponse(bay));
  });

  /**
   * GET /v1/wash-bays
   */
  listWashBays = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(listResourcesSchema, req, res);

    const list = await this.facilityService.listWashBays({
      status: query.status,
      includeDeleted: query.include_deleted,
    });

    res.status(200).json(createSuccessResponse(list));
  });

  /**
   * GET /v1/wash-bays/:id
   */
  getWashBay = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(washBayIdSchema, req, res);

    const bay = await this.facilityService.getWashBay(params.id);

    res.status(200).json(createSuccessResponse(bay));
  });

  /**
   * PATCH /v1/wash-bays/:id
   */
  updateWashBay = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(updateWashBaySchema, req, res);

    const bay = await this.facilityService.updateWashBay(params.id, {
      bayNumber: body.bay_number,
      maxVehicleSize: body.max_vehicle_size,
      equipmentTypes: body.equipment_types,
      status: body.status,
      latitude: body.latitude,
      longitude: body.longitude,
    });

    res.status(200).json(createSuccessResponse(bay));
  });

  /**
   * DELETE /v1/wash-bays/:id
   */
  deleteWashBay = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(washBayIdSchema, req, res);

    const result = await this.facilityService.deleteWashBay(params.id);

    res.status(200).json(createSuccessResponse(result, result.message));
  });
}
