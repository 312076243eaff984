import { Router } from 'express';
import { MobileTeamController } from '../../controllers/mobile-team.controller';
import { FacilityService } from '../../services/facility.service';
import { ResourceCatalogService } from '../../services/resource-catalog.service';
import { validate } from '../../middleware/validation.middleware';
import {
  coverageSchema,
  createMobileTeamSchema,
  listResourcesSchema,
  mobileTeamIdSchema,
  updateMobileTeamSchema,
} from '../../validators/facility.validator';

/**
 * Mobile team routes (v1)
 */
export function createMobileTeamRoutes(
  facilityService: FacilityService,
  catalog: ResourceCatalogService
): Router {
  const router = Router();
  const controller = new MobileTeamController(facilityService, catalog);

  /**
   * @swagger
   * /v1/mobile-teams:
   *   post:
   *     summary: Create a mobile team
   *     tags: [Mobile Teams]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - team_name
   *               - base_latitude
   *               - base_longitude
   *             properties:
   *               team_name:
   *                 type: string
   *               base_latitude:
   *                 type: number
   *               base_longitude:
   *                 type: number
   *               service_radius_km:
   *                 type: number
   *                 default: 50
   *               daily_capacity:
   *                 type: integer
   *                 default: 8
   *               equipment_types:
   *                 type: array
   *                 items:
   *                   type: string
   *     responses:
   *       201:
   *         description: Mobile team created
   *       409:
   *         description: Team name already in use
   */
  router.post('/', validate(createMobileTeamSchema), controller.createMobileTeam);

  /**
   * @swagger
   * /v1/mobile-teams:
   *   get:
   *     summary: List mobile teams with per-status counts
   *     tags: [Mobile Teams]
   *     responses:
   *       200:
   *         description: Mobile teams ordered by name
   */
  router.get('/', validate(listResourcesSchema), controller.listMobileTeams);

  /**
   * @swagger
   * /v1/mobile-teams/coverage:
   *   get:
   *     summary: Active teams whose service area covers a location
   *     tags: [Mobile Teams]
   *     parameters:
   *       - in: query
   *         name: latitude
   *         required: true
   *         schema:
   *           type: number
   *       - in: query
   *         name: longitude
   *         required: true
   *         schema:
   *           type: number
   *     responses:
   *       200:
   *         description: Covering teams, possibly none
   */
  router.get('/coverage', validate(coverageSchema), controller.listTeamsCovering);

  /**
   * @swagger
   * /v1/mobile-teams/{id}:
   *   get:
   *     summary: Get a mobile team
   *     tags: [Mobile Teams]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Mobile team
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/MobileTeam'
   *       404:
   *         description: Mobile team not found or deleted
   */
  router.get('/:id', validate(mobileTeamIdSchema), controller.getMobileTeam);

  /**
   * @swagger
   * /v1/mobile-teams/{id}:
   *   patch:
   *     summary: Update a mobile team
   *     tags: [Mobile Teams]
   *     responses:
   *       200:
   *         description: Updated mobile team
   */
  router.patch('/:id', validate(updateMobileTeamSchema), controller.updateMobileTeam);

  /**
   * @swagger
   * /v1/mobile-teams/{id}:
   *   delete:
   *     summary: Soft-delete a mobile team
   *     tags: [Mobile Teams]
   *     responses:
   *       200:
   *         description: Mobile team deactivated
   */
  router.delete('/:id', validate(mobileTeamIdSchema), controller.deleteMobileTeam);

  return router;
}
