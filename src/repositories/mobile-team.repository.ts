import { SupabaseClient } from '@supabase/supabase-js';
import { MobileTeam, MobileTeamRow, StatusCounts } from '../types/facility.types';
import {
  MobileTeamChanges,
  MobileTeamQuery,
  MobileTeamStore,
  NewMobileTeam,
} from '../types/store.types';
import { AppError, ErrorCode, storeUnavailable } from '../types/error.types';
import { createComponentLogger } from '../config/logger';
import {
  PGRST_NO_ROWS,
  PG_UNIQUE_VIOLATION,
  countStatuses,
  toDateOrNull,
  toUtcDate,
  toNumber,
  toResourceStatus,
} from './row-mapping';

const log = createComponentLogger('mobile-team-repository');

const TABLE = 'mobile_teams';

/**
 * Mobile Team Repository
 *
 * Supabase access to the mobile_teams table. Radius filtering happens in the
 * catalog service, not here; PostGIS would let it move into the query.
 */
export class MobileTeamRepository implements MobileTeamStore {
  constructor(private client: SupabaseClient) {}

  async create(team: NewMobileTeam): Promise<MobileTeam> {
    log.debug('Inserting mobile team', { teamName: team.teamName });

    const { data, error } = await this.client
      .from(TABLE)
      .insert({
        team_name: team.teamName,
        base_latitude: team.baseLocation.latitude,
        base_longitude: team.baseLocation.longitude,
        service_radius_km: team.serviceRadiusKm,
        daily_capacity: team.dailyCapacity,
        equipment_types: team.equipmentTypes,
      })
      .select()
      .single();

    if (error) {
      if (error.code === PG_UNIQUE_VIOLATION) {
        throw this.duplicateName(team.teamName);
      }
      log.error('Failed to create mobile team', { error: error.message });
      throw storeUnavailable('create mobile team', error.message);
    }

    return this.mapToMobileTeam(data);
  }

  async findById(id: string): Promise<MobileTeam | null> {
    return this.findOne('id', id);
  }

  async findByTeamName(teamName: string): Promise<MobileTeam | null> {
    return this.findOne('team_name', teamName);
  }

  async list(query: MobileTeamQuery): Promise<MobileTeam[]> {
    let request = this.client.from(TABLE).select('*');

    if (!query.includeDeleted) {
      request = request.is('deleted_at', null);
    }
    if (query.status) {
      request = request.eq('status', query.status);
    }

    const { data, error } = await request.order('team_name', { ascending: true });

    if (error) {
      log.error('Failed to list mobile teams', { error: error.message });
      throw storeUnavailable('list mobile teams', error.message);
    }

    return (data ?? []).map((row: MobileTeamRow) => this.mapToMobileTeam(row));
  }

  async update(id: string, changes: MobileTeamChanges): Promise<MobileTeam | null> {
    log.debug('Updating mobile team', { id, changes });

    const patch: Record<string, unknown> = { updated_at: new Date().toISOString() };
    if (changes.teamName !== undefined) patch['team_name'] = changes.teamName;
    if (changes.baseLocation !== undefined) {
      patch['base_latitude'] = changes.baseLocation.latitude;
      patch['base_longitude'] = changes.baseLocation.longitude;
    }
    if (changes.serviceRadiusKm !== undefined) patch['service_radius_km'] = changes.serviceRadiusKm;
    if (changes.dailyCapacity !== undefined) patch['daily_capacity'] = changes.dailyCapacity;
    if (changes.equipmentTypes !== undefined) patch['equipment_types'] = changes.equipmentTypes;
    if (changes.status !== undefined) patch['status'] = changes.status;

    const { data, error } = await this.client
      .from(TABLE)
      .update(patch)
      .eq('id', id)
      .is('deleted_at', null)
      .select()
      .single();

    if (error) {
      if (error.code === PGRST_NO_ROWS) return null;
      if (error.code === PG_UNIQUE_VIOLATION) {
        throw this.duplicateName(changes.teamName ?? '');
      }
      log.error('Failed to update mobile team', { id, error: error.message });
      throw storeUnavailable('update mobile team', error.message);
    }

    return this.mapToMobileTeam(data);
  }

  async softDelete(id: string): Promise<MobileTeam | null> {
    const now = new Date().toISOString();

    const { data, error } = await this.client
      .from(TABLE)
      .update({ status: 'inactive', deleted_at: now, updated_at: now })
      .eq('id', id)
      .is('deleted_at', null)
      .select()
      .single();

    if (error) {
      if (error.code === PGRST_NO_ROWS) return null;
      log.error('Failed to delete mobile team', { id, error: error.message });
      throw storeUnavailable('delete mobile team', error.message);
    }

    log.info('Mobile team soft-deleted', { id });
    return this.mapToMobileTeam(data);
  }

  async countByStatus(): Promise<StatusCounts> {
    const { data, error } = await this.client
      .from(TABLE)
      .select('status')
      .is('deleted_at', null);

    if (error) {
      log.error('Failed to count mobile teams', { error: error.message });
      throw storeUnavailable('count mobile teams', error.message);
    }

    return countStatuses(TABLE, data ?? []);
  }

  private async findOne(column: 'id' | 'team_name', value: string): Promise<MobileTeam | null> {
    const { data, error } = await this.client
      .from(TABLE)
      .select('*')
      .eq(column, value)
      .is('deleted_at', null)
      .single();

    if (error) {
      if (error.code === PGRST_NO_ROWS) return null;
      log.error('Failed to find mobile team', { [column]: value, error: error.message });
      throw storeUnavailable('find mobile team', error.message);
    }

    return data ? this.mapToMobileTeam(data) : null;
  }

  private duplicateName(teamName: string): AppError {
    return new AppError(
      ErrorCode.TEAM_NAME_EXISTS,
      `Mobile team named '${teamName}' already exists`,
      409
    );
  }

  private mapToMobileTeam(row: MobileTeamRow): MobileTeam {
    return {
      kind: 'mobile_team',
      id: row.id,
      teamName: row.team_name,
      baseLocation: {
        latitude: toNumber(row.base_latitude),
        longitude: toNumber(row.base_longitude),
      },
      serviceRadiusKm: toNumber(row.service_radius_km),
      dailyCapacity: row.daily_capacity,
      equipmentTypes: row.equipment_types ?? [],
      status: toResourceStatus(TABLE, row.status),
      createdAt: toUtcDate(row.created_at),
      updatedAt: toUtcDate(row.updated_at),
      deletedAt: toDateOrNull(row.deleted_at),
    };
  }
}
