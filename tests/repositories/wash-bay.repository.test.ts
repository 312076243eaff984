import { describe, expect, it } from 'vitest';
import { WashBayRepository } from '../../src/repositories/wash-bay.repository';
import { ResourceStatus, VehicleSize } from '../../src/types/facility.types';
import { ErrorCode } from '../../src/types/error.types';
import { QueryStub } from '../support/supabase-stub';

const BAY_ID = '00000000-0000-4000-8000-00000000a001';

function row(overrides: Record<string, unknown> = {}) {
  return {
    id: BAY_ID,
    bay_number: 'B1',
    max_vehicle_size: 'large',
    equipment_types: null,
    location_latitude: '40.7128',
    location_longitude: '-74.006',
    status: 'active',
    created_at: '2023-12-01T00:00:00+00:00',
    updated_at: '2023-12-02T00:00:00+00:00',
    deleted_at: null,
    ...overrides,
  };
}

describe('WashBayRepository', () => {
  it('maps rows and converts numeric strings', async () => {
    const stub = new QueryStub({ data: [row()], error: null });
    const bays = await new WashBayRepository(stub.asClient()).list({});

    expect(bays).toEqual([
      {
        kind: 'wash_bay',
        id: BAY_ID,
        bayNumber: 'B1',
        maxVehicleSize: VehicleSize.LARGE,
        equipmentTypes: [],
        location: { latitude: 40.7128, longitude: -74.006 },
        status: ResourceStatus.ACTIVE,
        createdAt: new Date('2023-12-01T00:00:00.000Z'),
        updatedAt: new Date('2023-12-02T00:00:00.000Z'),
        deletedAt: null,
      },
    ]);
  });

  it('builds the list filters in order', async () => {
    const stub = new QueryStub({ data: [], error: null });

    await new WashBayRepository(stub.asClient()).list({
      status: ResourceStatus.ACTIVE,
      maxVehicleSizes: [VehicleSize.LARGE, VehicleSize.OVERSIZED],
    });

    expect(stub.calls).toEqual([
      ['from', 'wash_bays'],
      ['select', '*'],
      ['is', 'deleted_at', null],
      ['eq', 'status', 'active'],
      ['in', 'max_vehicle_size', ['large', 'oversized']],
      ['order', 'bay_number', { ascending: true }],
    ]);
  });

  it('leaves deleted rows in when asked', async () => {
    const stub = new QueryStub({ data: [], error: null });
    await new WashBayRepository(stub.asClient()).list({ includeDeleted: true });

    expect(stub.calls.map(([method]) => method)).toEqual(['from', 'select', 'order']);
  });

  it('treats a missing row as null', async () => {
    const stub = new QueryStub({ data: null, error: { code: 'PGRST116', message: 'no rows' } });

    expect(await new WashBayRepository(stub.asClient()).findById(BAY_ID)).toBeNull();
  });

  it('turns a unique violation into a conflict', async () => {
    const stub = new QueryStub({ data: null, error: { code: '23505', message: 'duplicate key' } });

    await expect(
      new WashBayRepository(stub.asClient()).create({
        bayNumber: 'B1',
        maxVehicleSize: VehicleSize.STANDARD,
        equipmentTypes: [],
        location: null,
      })
    ).rejects.toMatchObject({ code: ErrorCode.BAY_NUMBER_EXISTS, statusCode: 409 });
  });

  it('refuses rows with an unknown vehicle size', async () => {
    const stub = new QueryStub({ data: [row({ max_vehicle_size: 'huge' })], error: null });

    await expect(new WashBayRepository(stub.asClient()).list({})).rejects.toMatchObject({
      code: ErrorCode.INTERNAL_ERROR,
      message: 'Unexpected max_vehicle_size value in wash_bays: huge',
    });
  });

  it('counts non-deleted bays by status', async () => {
    const stub = new QueryStub({
      data: [{ status: 'active' }, { status: 'maintenance' }, { status: 'active' }],
      error: null,
    });

    expect(await new WashBayRepository(stub.asClient()).countByStatus()).toEqual({
      active: 2,
      inactive: 0,
      maintenance: 1,
    });
  });
});
