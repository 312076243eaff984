import { Router } from 'express';
import { AppServices } from '../services';
import { createWashBayRoutes } from './v1/wash-bays.routes';
import { createMobileTeamRoutes } from './v1/mobile-teams.routes';
import { createAvailabilityRoutes } from './v1/availability.routes';
import { HealthCheckResponse } from '../types/api.types';

export const API_VERSION = '1.0.0';

/**
 * API Routes Aggregator
 */
export function createRoutes(services: AppServices): Router {
  const router = Router();

  router.use('/v1/wash-bays', createWashBayRoutes(services.facilities));
  router.use('/v1/mobile-teams', createMobileTeamRoutes(services.facilities, services.catalog));
  router.use('/v1/availability', createAvailabilityRoutes(services.availability));

  router.get('/health', (_req, res) => {
    const body: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
    res.status(200).json(body);
  });

  router.get('/v1', (_req, res) => {
    res.status(200).json({
      version: API_VERSION,
      api: 'Wash Bay Capacity API',
    });
  });

  return router;
}
