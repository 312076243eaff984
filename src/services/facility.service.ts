import {
  CreateMobileTeamInput,
  CreateWashBayInput,
  DeleteResourceResult,
  ListResourcesFilter,
  Location,
  MobileTeam,
  MobileTeamList,
  UpdateMobileTeamInput,
  UpdateWashBayInput,
  WashBay,
  WashBayList,
} from '../types/facility.types';
import { MobileTeamChanges, MobileTeamStore, WashBayChanges, WashBayStore } from '../types/store.types';
import { AppError, ErrorCode, invalidInput } from '../types/error.types';
import { assertValidLocation } from '../utils/geo';
import { createComponentLogger } from '../config/logger';

const log = createComponentLogger('facility-service');

const DEFAULT_SERVICE_RADIUS_KM = 50;
const DEFAULT_DAILY_CAPACITY = 8;

// Coordinates are optional for bays but only as a pair
function optionalLocation(latitude?: number, longitude?: number): Location | null | undefined {
  if (latitude === undefined && longitude === undefined) return undefined;
  if (latitude === undefined || longitude === undefined) {
    throw invalidInput('latitude and longitude must be provided together');
  }
  return assertValidLocation({ latitude, longitude });
}

function requireNonBlank(field: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw invalidInput(`${field} cannot be empty`);
  }
  return trimmed;
}

function requirePositive(field: string, value: number, integer = false): number {
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw invalidInput(`${field} must be positive${integer ? ' integer' : ''}`, { [field]: value });
  }
  return value;
}

function washBayNotFound(id: string): AppError {
  return new AppError(ErrorCode.WASH_BAY_NOT_FOUND, `Wash bay with ID ${id} not found`, 404);
}

function mobileTeamNotFound(id: string): AppError {
  return new AppError(ErrorCode.MOBILE_TEAM_NOT_FOUND, `Mobile team with ID ${id} not found`, 404);
}

/**
 * Facility Service
 *
 * Management operations for wash bays and mobile teams: the writes that keep
 * the resource catalog populated
 */
export class FacilityService {
  constructor(
    private washBayStore: WashBayStore,
    private mobileTeamStore: MobileTeamStore
  ) {}

  async createWashBay(input: CreateWashBayInput): Promise<WashBay> {
    const bayNumber = requireNonBlank('bayNumber', input.bayNumber);
    log.info('Creating wash bay', { bayNumber, maxVehicleSize: input.maxVehicleSize });

    await this.assertBayNumberFree(bayNumber);

    const bay = await this.washBayStore.create({
      bayNumber,
      maxVehicleSize: input.maxVehicleSize,
      equipmentTypes: input.equipmentTypes ?? [],
      location: optionalLocation(input.latitude, input.longitude) ?? null,
    });

    log.info('Wash bay created', { id: bay.id, bayNumber });
    return bay;
  }

  async getWashBay(id: string): Promise<WashBay> {
    const bay = await this.washBayStore.findById(id);
    if (!bay) throw washBayNotFound(id);
    return bay;
  }

  /**
   * Bays by bay number, plus per-status counts for dashboards.
   * The counts always cover every non-deleted bay, whatever the filter.
   */
  async listWashBays(filter: ListResourcesFilter = {}): Promise<WashBayList> {
    const [washBays, statusCounts] = await Promise.all([
      this.washBayStore.list({ status: filter.status, includeDeleted: filter.includeDeleted }),
      this.washBayStore.countByStatus(),
    ]);

    return { washBays, totalCount: washBays.length, statusCounts };
  }

  async updateWashBay(id: string, input: UpdateWashBayInput): Promise<WashBay> {
    const existing = await this.getWashBay(id);
    const changes: WashBayChanges = {};

    if (input.bayNumber !== undefined) {
      const bayNumber = requireNonBlank('bayNumber', input.bayNumber);
      if (bayNumber !== existing.bayNumber) {
        await this.assertBayNumberFree(bayNumber, existing.id);
        changes.bayNumber = bayNumber;
      }
    }
    if (input.maxVehicleSize !== undefined) changes.maxVehicleSize = input.maxVehicleSize;
    if (input.equipmentTypes !== undefined) changes.equipmentTypes = input.equipmentTypes;
    if (input.status !== undefined) changes.status = input.status;

    const location = optionalLocation(input.latitude, input.longitude);
    if (location !== undefined) changes.location = location;

    const updated = await this.washBayStore.update(id, changes);
    if (!updated) throw washBayNotFound(id);

    log.info('Wash bay updated', { id, fields: Object.keys(changes) });
    return updated;
  }

  /**
   * Soft delete: the bay stays in the table, inactive, and drops out of
   * every lookup and availability check
   */
  async deleteWashBay(id: string): Promise<DeleteResourceResult> {
    const deleted = await this.washBayStore.softDelete(id);
    if (!deleted) throw washBayNotFound(id);

    log.info('Wash bay deleted', { id, bayNumber: deleted.bayNumber });
    return {
      id,
      name: deleted.bayNumber,
      deleted: true,
      message: `Wash bay '${deleted.bayNumber}' has been deactivated`,
    };
  }

  async createMobileTeam(input: CreateMobileTeamInput): Promise<MobileTeam> {
    const teamName = requireNonBlank('teamName', input.teamName);
    log.info('Creating mobile team', { teamName });

    await this.assertTeamNameFree(teamName);

    const team = await this.mobileTeamStore.create({
      teamName,
      baseLocation: assertValidLocation({
        latitude: input.baseLatitude,
        longitude: input.baseLongitude,
      }),
      serviceRadiusKm: requirePositive(
        'serviceRadiusKm',
        input.serviceRadiusKm ?? DEFAULT_SERVICE_RADIUS_KM
      ),
      dailyCapacity: requirePositive(
        'dailyCapacity',
        input.dailyCapacity ?? DEFAULT_DAILY_CAPACITY,
        true
      ),
      equipmentTypes: input.equipmentTypes ?? [],
    });

    log.info('Mobile team created', { id: team.id, teamName });
    return team;
  }

  async getMobileTeam(id: string): Promise<MobileTeam> {
    const team = await this.mobileTeamStore.findById(id);
    if (!team) throw mobileTeamNotFound(id);
    return team;
  }

  async listMobileTeams(filter: ListResourcesFilter = {}): Promise<MobileTeamList> {
    const [mobileTeams, statusCounts] = await Promise.all([
      this.mobileTeamStore.list({ status: filter.status, includeDeleted: filter.includeDeleted }),
      this.mobileTeamStore.countByStatus(),
    ]);

    return { mobileTeams, totalCount: mobileTeams.length, statusCounts };
  }

  async updateMobileTeam(id: string, input: UpdateMobileTeamInput): Promise<MobileTeam> {
    const existing = await this.getMobileTeam(id);
    const changes: MobileTeamChanges = {};

    if (input.teamName !== undefined) {
      const teamName = requireNonBlank('teamName', input.teamName);
      if (teamName !== existing.teamName) {
        await this.assertTeamNameFree(teamName, existing.id);
        changes.teamName = teamName;
      }
    }

    // A single coordinate moves the base along one axis
    if (input.baseLatitude !== undefined || input.baseLongitude !== undefined) {
      changes.baseLocation = assertValidLocation({
        latitude: input.baseLatitude ?? existing.baseLocation.latitude,
        longitude: input.baseLongitude ?? existing.baseLocation.longitude,
      });
    }
    if (input.serviceRadiusKm !== undefined) {
      changes.serviceRadiusKm = requirePositive('serviceRadiusKm', input.serviceRadiusKm);
    }
    if (input.dailyCapacity !== undefined) {
      changes.dailyCapacity = requirePositive('dailyCapacity', input.dailyCapacity, true);
    }
    if (input.equipmentTypes !== undefined) changes.equipmentTypes = input.equipmentTypes;
    if (input.status !== undefined) changes.status = input.status;

    const updated = await this.mobileTeamStore.update(id, changes);
    if (!updated) throw mobileTeamNotFound(id);

    log.info('Mobile team updated', { id, fields: Object.keys(changes) });
    return updated;
  }

  async deleteMobileTeam(id: string): Promise<DeleteResourceResult> {
    const deleted = await this.mobileTeamStore.softDelete(id);
    if (!deleted) throw mobileTeamNotFound(id);

    log.info('Mobile team deleted', { id, teamName: deleted.teamName });
    return {
      id,
      name: deleted.teamName,
      deleted: true,
      message: `Mobile team '${deleted.teamName}' has been deactivated`,
    };
  }

  private async assertBayNumberFree(bayNumber: string, ownId?: string): Promise<void> {
    const clash = await this.washBayStore.findByBayNumber(bayNumber);
    if (clash && clash.id !== ownId) {
      throw new AppError(
        ErrorCode.BAY_NUMBER_EXISTS,
        `Wash bay with number '${bayNumber}' already exists`,
        409
      );
    }
  }

  private async assertTeamNameFree(teamName: string, ownId?: string): Promise<void> {
    const clash = await this.mobileTeamStore.findByTeamName(teamName);
    if (clash && clash.id !== ownId) {
      throw new AppError(
        ErrorCode.TEAM_NAME_EXISTS,
        `Mobile team named '${teamName}' already exists`,
        409
      );
    }
  }
}
