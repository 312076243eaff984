import { VehicleSize } from '../types/facility.types';
import { invalidInput } from '../types/error.types';

export const VEHICLE_SIZE_RANK: Readonly<Record<VehicleSize, number>> = {
  [VehicleSize.COMPACT]: 1,
  [VehicleSize.STANDARD]: 2,
  [VehicleSize.LARGE]: 3,
  [VehicleSize.OVERSIZED]: 4,
};

export const VEHICLE_SIZES: readonly VehicleSize[] = Object.values(VehicleSize);

export function isVehicleSize(value: string): value is VehicleSize {
  return VEHICLE_SIZES.some((size) => size === value);
}

/**
 * Unknown sizes are rejected rather than treated as oversized
 */
export function parseVehicleSize(value: string): VehicleSize {
  if (!isVehicleSize(value)) {
    throw invalidInput(`Unknown vehicle size '${value}'`, {
      allowed: [...VEHICLE_SIZES],
    });
  }
  return value;
}

/**
 * A bay rated for a size also takes every smaller size
 */
export function canAccommodate(maxVehicleSize: VehicleSize, vehicleSize: VehicleSize): boolean {
  return VEHICLE_SIZE_RANK[vehicleSize] <= VEHICLE_SIZE_RANK[maxVehicleSize];
}

/**
 * Bay ratings that can take the given vehicle, smallest first
 */
export function compatibleBaySizes(vehicleSize: VehicleSize): VehicleSize[] {
  return VEHICLE_SIZES.filter((maxSize) => canAccommodate(maxSize, vehicleSize));
}
