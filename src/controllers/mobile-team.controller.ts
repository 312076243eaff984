import { Request, Response } from 'express';
import { FacilityService } from '../services/facility.service';
import { ResourceCatalogService } from '../services/resource-catalog.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../middleware/validation.middleware';
import {
  coverageSchema,
  createMobileTeamSchema,
  listResourcesSchema,
  mobileTeamIdSchema,
  updateMobileTeamSchema,
} from '../validators/facility.validator';

/**
 * Mobile Team Controller
 */
export class MobileTeamController {
  constructor(
    private facilityService: FacilityService,
    private catalog: ResourceCatalogService
  ) {}

  /**
   * POST /v1/mobile-teams
   */
  createMobileTeam = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(createMobileTeamSchema, req, res);

    const team = await this.facilityService.createMobileTeam({
      teamName: body.team_name,
      baseLatitude: body.base_latitude,
      baseLongitude: body.base_longitude,
      serviceRadiusKm: body.service_radius_km,
      dailyCapacity: body.daily_capacity,
      equipmentTypes: body.equipment_types,
    });

    res.status(201).json(createSuccessResponse(team));
  });

  /**
   * GET /v1/mobile-teams
   */
  listMobileTeams = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(listResourcesSchema, req, res);

    const list = await this.facilityService.listMobileTeams({
      status: query.status,
      includeDeleted: query.include_deleted,
    });

    res.status(200).json(createSuccessResponse(list));
  });

  /**
   * GET /v1/mobile-teams/coverage
   * Active teams whose service radius reaches the location
   */
  listTeamsCovering = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(coverageSchema, req, res);

    const teams = await this.catalog.listTeamsWithinRadius({
      latitude: query.latitude,
      longitude: query.longitude,
    });

    res.status(200).json(createSuccessResponse(teams));
  });

  /**
   * GET /v1/mobile-teams/:id
   */
  getMobileTeam = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(mobileTeamIdSchema, req, res);

    const team = await this.facilityService.getMobileTeam(params.id);

    res.status(200).json(createSuccessResponse(team));
  });

  /**
   * PATCH /v1/mobile-teams/:id
   */
  updateMobileTeam = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(updateMobileTeamSchema, req, res);

    const team = await this.facilityService.updateMobileTeam(params.id, {
      teamName: body.team_name,
      baseLatitude: body.base_latitude,
      baseLongitude: body.base_longitude,
      serviceRadiusKm: body.service_radius_km,
      dailyCapacity: body.daily_capacity,
      equipmentTypes: body.equipment_types,
      status: body.status,
    });

    res.status(200).json(createSuccessResponse(team));
  });

  /**
   * DELETE /v1/mobile-teams/:id
   */
  deleteMobileTeam = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(mobileTeamIdSchema, req, res);

    const result = await this.facilityService.deleteMobileTeam(params.id);

    res.status(200).json(createSuccessResponse(result, result.message));
  });
}
