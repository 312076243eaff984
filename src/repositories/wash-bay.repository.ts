import { SupabaseClient } from '@supabase/supabase-js';
import { StatusCounts, WashBay, WashBayRow } from '../types/facility.types';
import { NewWashBay, WashBayChanges, WashBayQuery, WashBayStore } from '../types/store.types';
import { AppError, ErrorCode, storeUnavailable } from '../types/error.types';
import { createComponentLogger } from '../config/logger';
import {
  PGRST_NO_ROWS,
  PG_UNIQUE_VIOLATION,
  countStatuses,
  toDateOrNull,
  toUtcDate,
  toLocation,
  toResourceStatus,
  toVehicleSize,
} from './row-mapping';

const log = createComponentLogger('wash-bay-repository');

const TABLE = 'wash_bays';

/**
 * Wash Bay Repository
 *
 * Supabase access to the wash_bays table. Deleted rows keep their data with
 * deleted_at set; every lookup except list({ includeDeleted }) skips them.
 */
export class WashBayRepository implements WashBayStore {
  constructor(private client: SupabaseClient) {}

  async create(bay: NewWashBay): Promise<WashBay> {
    log.debug('Inserting wash bay', { bayNumber: bay.bayNumber });

    const { data, error } = await this.client
      .from(TABLE)
      .insert({
        bay_number: bay.bayNumber,
        max_vehicle_size: bay.maxVehicleSize,
        equipment_types: bay.equipmentTypes,
        location_latitude: bay.location?.latitude ?? null,
        location_longitude: bay.location?.longitude ?? null,
      })
      .select()
      .single();

    if (error) {
      if (error.code === PG_UNIQUE_VIOLATION) {
        throw new AppError(
          ErrorCode.BAY_NUMBER_EXISTS,
          `Wash bay with number '${bay.bayNumber}' already exists`,
          409
        );
      }
      log.error('Failed to create wash bay', { error: error.message });
      throw storeUnavailable('create wash bay', error.message);
    }

    return this.mapToWashBay(data);
  }

  async findById(id: string): Promise<WashBay | null> {
    const { data, error } = await this.client
      .from(TABLE)
      .select('*')
      .eq('id', id)
      .is('deleted_at', null)
      .single();

    if (error) {
      if (error.code === PGRST_NO_ROWS) return null;
      log.error('Failed to find wash bay', { id, error: error.message });
      throw storeUnavailable('find wash bay', error.message);
    }

    return data ? this.mapToWashBay(data) : null;
  }

  async findByBayNumber(bayNumber: string): Promise<WashBay | null> {
    const { data, error } = await this.client
      .from(TABLE)
      .select('*')
      .eq('bay_number', bayNumber)
      .is('deleted_at', null)
      .single();

    if (error) {
      if (error.code === PGRST_NO_ROWS) return null;
      log.error('Failed to find wash bay by number', { bayNumber, error: error.message });
      throw storeUnavailable('find wash bay', error.message);
    }

    return data ? this.mapToWashBay(data) : null;
  }

  async list(query: WashBayQuery): Promise<WashBay[]> {
    let request = this.client.from(TABLE).select('*');

    if (!query.includeDeleted) {
      request = request.is('deleted_at', null);
    }
    if (query.status) {
      request = request.eq('status', query.status);
    }
    if (query.maxVehicleSizes) {
      request = request.in('max_vehicle_size', [...query.maxVehicleSizes]);
    }

    const { data, error } = await request.order('bay_number', { ascending: true });

    if (error) {
      log.error('Failed to list wash bays', { error: error.message });
      throw storeUnavailable('list wash bays', error.message);
    }

    return (data ?? []).map((row: WashBayRow) => this.mapToWashBay(row));
  }

  async update(id: string, changes: WashBayChanges): Promise<WashBay | null> {
    log.debug('Updating wash bay', { id, changes });

    const patch: Record<string, unknown> = { updated_at: new Date().toISOString() };
    if (changes.bayNumber !== undefined) patch['bay_number'] = changes.bayNumber;
    if (changes.maxVehicleSize !== undefined) patch['max_vehicle_size'] = changes.maxVehicleSize;
    if (changes.equipmentTypes !== undefined) patch['equipment_types'] = changes.equipmentTypes;
    if (changes.status !== undefined) patch['status'] = changes.status;
    if (changes.location !== undefined) {
      patch['location_latitude'] = changes.location?.latitude ?? null;
      patch['location_longitude'] = changes.location?.longitude ?? null;
    }

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
        throw new AppError(
          ErrorCode.BAY_NUMBER_EXISTS,
          `Wash bay with number '${changes.bayNumber ?? ''}' already exists`,
          409
        );
      }
      log.error('Failed to update wash bay', { id, error: error.message });
      throw storeUnavailable('update wash bay', error.message);
    }

    return this.mapToWashBay(data);
  }

  async softDelete(id: string): Promise<WashBay | null> {
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
      log.error('Failed to delete wash bay', { id, error: error.message });
      throw storeUnavailable('delete wash bay', error.message);
    }

    log.info('Wash bay soft-deleted', { id });
    return this.mapToWashBay(data);
  }

  async countByStatus(): Promise<StatusCounts> {
    const { data, error } = await this.client
      .from(TABLE)
      .select('status')
      .is('deleted_at', null);

    if (error) {
      log.error('Failed to count wash bays', { error: error.message });
      throw storeUnavailable('count wash bays', error.message);
    }

    return countStatuses(TABLE, data ?? []);
  }

  private mapToWashBay(row: WashBayRow): WashBay {
    return {
      kind: 'wash_bay',
      id: row.id,
      bayNumber: row.bay_number,
      maxVehicleSize: toVehicleSize(TABLE, row.max_vehicle_size),
      equipmentTypes: row.equipment_types ?? [],
      location: toLocation(row.location_latitude, row.location_longitude),
      status: toResourceStatus(TABLE, row.status),
      createdAt: toUtcDate(row.created_at),
      updatedAt: toUtcDate(row.updated_at),
      deletedAt: toDateOrNull(row.deleted_at),
    };
  }
}
