import { describe, expect, it } from 'vitest';
import { BookingRepository } from '../../src/repositories/booking.repository';
import { ErrorCode } from '../../src/types/error.types';
import { QueryStub } from '../support/supabase-stub';

const BAY_ID = '00000000-0000-4000-8000-00000000a001';
const TEAM_ID = '00000000-0000-4000-8000-00000000b001';

describe('BookingRepository', () => {
  it('selects occupying bookings for a bay inside the window', async () => {
    const stub = new QueryStub({
      data: [{ id: 'bk-1', scheduled_at: '2024-01-01T09:00:00+00:00', estimated_duration_minutes: 45 }],
      error: null,
    });
    const repository = new BookingRepository(stub.asClient());

    const bookings = await repository.listActiveForResource(
      { kind: 'wash_bay', id: BAY_ID },
      { from: new Date('2023-12-31T09:00:00.000Z'), to: new Date('2024-01-02T09:30:00.000Z') }
    );

    expect(stub.calls).toEqual([
      ['from', 'bookings'],
      ['select', 'id, scheduled_at, estimated_duration_minutes'],
      ['eq', 'wash_bay_id', BAY_ID],
      ['in', 'status', ['pending', 'confirmed', 'in_progress']],
      ['gte', 'scheduled_at', '2023-12-31T09:00:00.000Z'],
      ['lte', 'scheduled_at', '2024-01-02T09:30:00.000Z'],
    ]);
    expect(bookings).toEqual([
      { id: 'bk-1', scheduledAt: new Date('2024-01-01T09:00:00.000Z'), durationMinutes: 45 },
    ]);
  });

  it('reads scheduled_at without an offset as UTC', async () => {
    const stub = new QueryStub({
      data: [{ id: 'bk-2', scheduled_at: '2024-01-01T09:00:00', estimated_duration_minutes: 30 }],
      error: null,
    });
    const repository = new BookingRepository(stub.asClient());

    const [occupancy] = await repository.listActiveForResource({ kind: 'wash_bay', id: BAY_ID }, null);

    expect(occupancy?.scheduledAt.toISOString()).toBe('2024-01-01T09:00:00.000Z');
  });

  it('filters on the team column and skips the window when none is given', async () => {
    const stub = new QueryStub({ data: null, error: null });
    const repository = new BookingRepository(stub.asClient());

    expect(await repository.listActiveForResource({ kind: 'mobile_team', id: TEAM_ID }, null)).toEqual([]);
    expect(stub.calls.map(([method]) => method)).toEqual(['from', 'select', 'eq', 'in']);
    expect(stub.calls[2]).toEqual(['eq', 'mobile_team_id', TEAM_ID]);
  });

  it('reports query failures as a retryable store error', async () => {
    const stub = new QueryStub({ data: null, error: { message: 'timeout' } });
    const repository = new BookingRepository(stub.asClient());

    await expect(
      repository.listActiveForResource({ kind: 'wash_bay', id: BAY_ID }, null)
    ).rejects.toMatchObject({
      code: ErrorCode.STORE_UNAVAILABLE,
      statusCode: 503,
      message: 'Failed to list bookings: timeout',
      details: { retryable: true },
    });
  });
});
