import { Router } from 'express';
import { WashBayController } from '../../controllers/wash-bay.controller';
import { FacilityService } from '../../services/facility.service';
import { validate } from '../../middleware/validation.middleware';
import {
  createWashBaySchema,
  listResourcesSchema,
  updateWashBaySchema,
  washBayIdSchema,
} from '../../validators/facility.validator';

/**
 * Wash bay routes (v1)
 */
export function createWashBayRoutes(facilityService: FacilityService): Router {
  const router = Router();
  const controller = new WashBayController(facilityService);

  /**
   * @swagger
   * /v1/wash-bays:
   *   post:
   *     summary: Create a wash bay
   *     tags: [Wash Bays]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - bay_number
   *               - max_vehicle_size
   *             properties:
   *               bay_number:
   *                 type: string
   *                 maxLength: 50
   *               max_vehicle_size:
   *                 $ref: '#/components/schemas/VehicleSize'
   *               equipment_types:
   *                 type: array
   *                 items:
   *                   type: string
   *               latitude:
   *                 type: number
   *               longitude:
   *                 type: number
   *     responses:
   *       201:
   *         description: Wash bay created
   *       409:
   *         description: Bay number already in use
   */
  router.post('/', validate(createWashBaySchema), controller.createWashBay);

  /**
   * @swagger
   * /v1/wash-bays:
   *   get:
   *     summary: List wash bays with per-status counts
   *     tags: [Wash Bays]
   *     parameters:
   *       - in: query
   *         name: status
   *         schema:
   *           type: string
   *           enum: [active, inactive, maintenance]
   *       - in: query
   *         name: include_deleted
   *         schema:
   *           type: boolean
   *     responses:
   *       200:
   *         description: Wash bays ordered by bay number
   */
  router.get('/', validate(listResourcesSchema), controller.listWashBays);

  /**
   * @swagger
   * /v1/wash-bays/{id}:
   *   get:
   *     summary: Get a wash bay
   *     tags: [Wash Bays]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Wash bay
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/WashBay'
   *       404:
   *         description: Wash bay not found or deleted
   */
  router.get('/:id', validate(washBayIdSchema), controller.getWashBay);

  /**
   * @swagger
   * /v1/wash-bays/{id}:
   *   patch:
   *     summary: Update a wash bay
   *     tags: [Wash Bays]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Updated wash bay
   *       404:
   *         description: Wash bay not found or deleted
   *       409:
   *         description: Bay number already in use
   */
  router.patch('/:id', validate(updateWashBaySchema), controller.updateWashBay);

  /**
   * @swagger
   * /v1/wash-bays/{id}:
   *   delete:
   *     summary: Soft-delete a wash bay
   *     tags: [Wash Bays]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Wash bay deactivated
   *       404:
   *         description: Wash bay not found or already deleted
   */
  router.delete('/:id', validate(washBayIdSchema), controller.deleteWashBay);

  return router;
}
