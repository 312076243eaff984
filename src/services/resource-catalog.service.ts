import {
  Location,
  MobileTeam,
  Resource,
  ResourceStatus,
  VehicleSize,
  WashBay,
} from '../types/facility.types';
import { MobileTeamStore, WashBayStore } from '../types/store.types';
import { canAccommodate, compatibleBaySizes } from '../utils/vehicle-size';
import { distanceKm } from '../utils/geo';

export function bayCanAccommodate(bay: WashBay, vehicleSize: VehicleSize): boolean {
  return canAccommodate(bay.maxVehicleSize, vehicleSize);
}

export function teamCanServiceLocation(team: MobileTeam, location: Location): boolean {
  if (team.status !== ResourceStatus.ACTIVE) return false;
  return distanceKm(team.baseLocation, location) <= team.serviceRadiusKm;
}

// Plain code-point order, so the same catalog always yields the same sequence
function byKey<T>(key: (item: T) => string) {
  return (a: T, b: T): number => {
    const left = key(a);
    const right = key(b);
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
  };
}

const byBayNumber = byKey<WashBay>((bay) => bay.bayNumber);
const byTeamName = byKey<MobileTeam>((team) => team.teamName);

/**
 * Resource Catalog Service
 *
 * Read-only queries over schedulable resources. Only active, non-deleted
 * resources are ever returned; an empty list is a normal answer.
 */
export class ResourceCatalogService {
  constructor(
    private washBayStore: WashBayStore,
    private mobileTeamStore: MobileTeamStore
  ) {}

  /**
   * Active bays able to take the vehicle, by bay number ascending
   */
  async listCompatibleBays(vehicleSize: VehicleSize): Promise<WashBay[]> {
    const bays = await this.washBayStore.list({
      status: ResourceStatus.ACTIVE,
      maxVehicleSizes: compatibleBaySizes(vehicleSize),
    });

    return bays
      .filter((bay) => bay.deletedAt === null && bayCanAccommodate(bay, vehicleSize))
      .sort(byBayNumber);
  }

  async listActiveBays(): Promise<WashBay[]> {
    const bays = await this.washBayStore.list({ status: ResourceStatus.ACTIVE });
    return bays.filter((bay) => bay.deletedAt === null).sort(byBayNumber);
  }

  async listTeamsWithinRadius(location: Location): Promise<MobileTeam[]> {
    const teams = await this.mobileTeamStore.list({ status: ResourceStatus.ACTIVE });

    return teams
      .filter((team) => team.deletedAt === null && teamCanServiceLocation(team, location))
      .sort(byTeamName);
  }

  /**
   * Bay or team by id, whatever its status; null when unknown or deleted
   */
  async findResource(id: string): Promise<Resource | null> {
    const bay = await this.washBayStore.findById(id);
    if (bay) return bay;

    return this.mobileTeamStore.findById(id);
  }
}
