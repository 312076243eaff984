import { z } from 'zod';
import { ResourceStatus, VehicleSize } from '../types/facility.types';
import { latitude, longitude, queryBoolean, resourceIdParams } from './common';

/**
 * Wash bay and mobile team request schemas
 */

const equipmentTypes = z.array(z.string().min(1).max(100)).max(50);

export const createWashBaySchema = z.object({
  body: z.object({
    bay_number: z
      .string({ required_error: 'Bay number is required' })
      .trim()
      .min(1, 'Bay number is required')
      .max(50, 'Bay number must be at most 50 characters'),
    max_vehicle_size: z.nativeEnum(VehicleSize, {
      errorMap: () => ({ message: 'Max vehicle size must be compact, standard, large or oversized' }),
    }),
    equipment_types: equipmentTypes.optional(),
    latitude: latitude.optional(),
    longitude: longitude.optional(),
  }),
});

export const updateWashBaySchema = z.object({
  params: resourceIdParams('wash bay'),
  body: z.object({
    bay_number: z.string().trim().min(1).max(50).optional(),
    max_vehicle_size: z.nativeEnum(VehicleSize).optional(),
    equipment_types: equipmentTypes.optional(),
    status: z.nativeEnum(ResourceStatus).optional(),
    latitude: latitude.optional(),
    longitude: longitude.optional(),
  }),
});

export const washBayIdSchema = z.object({
  params: resourceIdParams('wash bay'),
});

export const listResourcesSchema = z.object({
  query: z.object({
    status: z.nativeEnum(ResourceStatus).optional(),
    include_deleted: queryBoolean,
  }),
});

const mobileTeamStatus = z.enum([ResourceStatus.ACTIVE, ResourceStatus.INACTIVE]);

export const createMobileTeamSchema = z.object({
  body: z.object({
    team_name: z
      .string({ required_error: 'Team name is required' })
      .trim()
      .min(1, 'Team name is required')
      .max(100, 'Team name must be at most 100 characters'),
    base_latitude: latitude,
    base_longitude: longitude,
    service_radius_km: z.number().positive('Service radius must be positive').optional(),
    daily_capacity: z.number().int().positive('Daily capacity must be positive').optional(),
    equipment_types: equipmentTypes.optional(),
  }),
});

export const updateMobileTeamSchema = z.object({
  params: resourceIdParams('mobile team'),
  body: z.object({
    team_name: z.string().trim().min(1).max(100).optional(),
    base_latitude: latitude.optional(),
    base_longitude: longitude.optional(),
    service_radius_km: z.number().positive('Service radius must be positive').optional(),
    daily_capacity: z.number().int().positive('Daily capacity must be positive').optional(),
    equipment_types: equipmentTypes.optional(),
    status: mobileTeamStatus.optional(),
  }),
});

export const mobileTeamIdSchema = z.object({
  params: resourceIdParams('mobile team'),
});

export const coverageSchema = z.object({
  query: z.object({
    latitude,
    longitude,
  }),
});
