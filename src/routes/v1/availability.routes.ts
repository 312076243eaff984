import { Router } from 'express';
import { AvailabilityController } from '../../controllers/availability.controller';
import { AvailabilityService } from '../../services/availability.service';
import { validate } from '../../middleware/validation.middleware';
import {
  capacitySchema,
  checkResourceSchema,
  findMobileTeamSchema,
  findWashBaySchema,
  timeSlotsSchema,
} from '../../validators/availability.validator';

/**
 * Availability routes (v1)
 */
export function createAvailabilityRoutes(availabilityService: AvailabilityService): Router {
  const router = Router();
  const controller = new AvailabilityController(availabilityService);

  /**
   * @swagger
   * /v1/availability/resources/{id}:
   *   get:
   *     summary: Check whether a wash bay or mobile team is free
   *     description: |
   *       Read-only. Nothing is held between this check and a later booking;
   *       the booking writer must lock the resource or rely on an exclusion
   *       constraint.
   *     tags: [Availability]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *       - $ref: '#/components/parameters/ScheduledAt'
   *       - $ref: '#/components/parameters/DurationMinutes'
   *       - in: query
   *         name: exclude_booking_id
   *         description: Booking to ignore, e.g. the one being rescheduled
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Availability of the resource
   *       404:
   *         description: Resource not found or deleted
   */
  router.get('/resources/:id', validate(checkResourceSchema), controller.checkResource);

  /**
   * @swagger
   * /v1/availability/wash-bay:
   *   get:
   *     summary: First free wash bay (lowest bay number) that fits the vehicle
   *     tags: [Availability]
   *     parameters:
   *       - $ref: '#/components/parameters/ScheduledAt'
   *       - $ref: '#/components/parameters/DurationMinutes'
   *       - in: query
   *         name: vehicle_size
   *         required: true
   *         schema:
   *           $ref: '#/components/schemas/VehicleSize'
   *     responses:
   *       200:
   *         description: Bay id, or null when none is free
   */
  router.get('/wash-bay', validate(findWashBaySchema), controller.findWashBay);

  /**
   * @swagger
   * /v1/availability/mobile-team:
   *   get:
   *     summary: First free mobile team covering a location
   *     tags: [Availability]
   *     parameters:
   *       - $ref: '#/components/parameters/ScheduledAt'
   *       - $ref: '#/components/parameters/DurationMinutes'
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
   *         description: Team id, or null when none is free
   */
  router.get('/mobile-team', validate(findMobileTeamSchema), controller.findMobileTeam);

  /**
   * @swagger
   * /v1/availability/capacity:
   *   get:
   *     summary: Number of active wash bays free for a slot
   *     tags: [Availability]
   *     parameters:
   *       - $ref: '#/components/parameters/ScheduledAt'
   *       - $ref: '#/components/parameters/DurationMinutes'
   *     responses:
   *       200:
   *         description: Available capacity
   */
  router.get('/capacity', validate(capacitySchema), controller.getCapacity);

  /**
   * @swagger
   * /v1/availability/capacity/details:
   *   get:
   *     summary: Per-bay availability and utilization for a slot
   *     tags: [Availability]
   *     parameters:
   *       - $ref: '#/components/parameters/ScheduledAt'
   *       - $ref: '#/components/parameters/DurationMinutes'
   *     responses:
   *       200:
   *         description: Capacity snapshot
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/CapacitySnapshot'
   */
  router.get('/capacity/details', validate(capacitySchema), controller.getCapacityDetails);

  /**
   * @swagger
   * /v1/availability/time-slots:
   *   get:
   *     summary: Slots in a range that have at least one free wash bay
   *     description: Slots with no capacity are omitted, not returned with zero.
   *     tags: [Availability]
   *     parameters:
   *       - in: query
   *         name: start_date
   *         required: true
   *         schema:
   *           type: string
   *           format: date-time
   *       - in: query
   *         name: end_date
   *         required: true
   *         schema:
   *           type: string
   *           format: date-time
   *       - $ref: '#/components/parameters/DurationMinutes'
   *       - in: query
   *         name: slot_interval_minutes
   *         schema:
   *           type: integer
   *           default: 30
   *     responses:
   *       200:
   *         description: Open time slots
   *         content:
   *           application/json:
   *             schema:
   *               type: array
   *               items:
   *                 $ref: '#/components/schemas/TimeSlot'
   *       400:
   *         description: End before start, or range too long
   */
  router.get('/time-slots', validate(timeSlotsSchema), controller.listTimeSlots);

  return router;
}
