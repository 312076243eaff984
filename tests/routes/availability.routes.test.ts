import { afterEach, describe, expect, it } from 'vitest';
import { ResourceStatus, VehicleSize } from '../../src/types/facility.types';
import { storeUnavailable } from '../../src/types/error.types';
import { at, booking, mobileTeam, washBay } from '../support/fixtures';
import { createHarness, Harness, startTestServer, TestServer } from '../support/harness';

const UNKNOWN_ID = 'ffffffff-ffff-4fff-bfff-ffffffffffff';

describe('availability routes', () => {
  let server: TestServer | undefined;

  async function serve(harness: Harness): Promise<TestServer> {
    server = await startTestServer(harness.services);
    return server;
  }

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  describe('GET /v1/availability/resources/:id', () => {
    it('reports whether the resource is free', async () => {
      const bay = washBay('B1', VehicleSize.STANDARD);
      const { http } = await serve(
        createHarness({ washBays: [bay], bookings: [booking(bay, at('09:00'), 30)] })
      );

      const busy = await http.get(`/v1/availability/resources/${bay.id}`, {
        params: { scheduled_at: '2024-01-01T09:15:00Z', duration_minutes: 30 },
      });
      const free = await http.get(`/v1/availability/resources/${bay.id}`, {
        params: { scheduled_at: '2024-01-01T09:30:00Z', duration_minutes: '30' },
      });

      expect(busy.status).toBe(200);
      expect(busy.data).toEqual({
        data: {
          resource_id: bay.id,
          scheduled_at: '2024-01-01T09:15:00.000Z',
          duration_minutes: 30,
          is_available: false,
        },
      });
      expect(free.data.data.is_available).toBe(true);
    });

    it('honours exclude_booking_id', async () => {
      const bay = washBay('B1', VehicleSize.STANDARD);
      const own = booking(bay, at('09:00'), 30, undefined, 'booking-being-moved');
      const { http } = await serve(createHarness({ washBays: [bay], bookings: [own] }));

      const response = await http.get(`/v1/availability/resources/${bay.id}`, {
        params: {
          scheduled_at: '2024-01-01T09:15:00Z',
          duration_minutes: 30,
          exclude_booking_id: 'booking-being-moved',
        },
      });

      expect(response.data.data.is_available).toBe(true);
    });

    it('answers 404 for an unknown resource', async () => {
      const { http } = await serve(createHarness());

      const response = await http.get(`/v1/availability/resources/${UNKNOWN_ID}`, {
        params: { scheduled_at: '2024-01-01T09:00:00Z', duration_minutes: 30 },
      });

      expect(response.status).toBe(404);
      expect(response.data).toEqual({
        error: { code: 'RESOURCE_NOT_FOUND', message: `Resource with ID ${UNKNOWN_ID} not found` },
      });
    });

    it('validates the id and query', async () => {
      const { http } = await serve(createHarness());

      const response = await http.get('/v1/availability/resources/not-a-uuid', {
        params: { scheduled_at: 'tomorrow' },
      });

      expect(response.status).toBe(400);
      expect(response.data.error.code).toBe('VALIDATION_ERROR');
      const fields = response.data.error.details.errors.map((error: { field: string }) => error.field);
      expect(fields).toEqual(['params.id', 'query.scheduled_at', 'query.duration_minutes']);
    });

    it('answers 503 when bookings cannot be read', async () => {
      const bay = washBay('B1', VehicleSize.STANDARD);
      const harness = createHarness({ washBays: [bay] });
      harness.bookings.failure = storeUnavailable('list bookings', 'connection refused');
      const { http } = await serve(harness);

      const response = await http.get(`/v1/availability/resources/${bay.id}`, {
        params: { scheduled_at: '2024-01-01T09:00:00Z', duration_minutes: 30 },
      });

      expect(response.status).toBe(503);
      expect(response.data).toEqual({
        error: {
          code: 'STORE_UNAVAILABLE',
          message: 'Failed to list bookings: connection refused',
          details: { retryable: true },
        },
      });
    });
  });

  describe('GET /v1/availability/wash-bay', () => {
    it('returns the first free compatible bay', async () => {
      const b1 = washBay('B1', VehicleSize.STANDARD);
      const b2 = washBay('B2', VehicleSize.LARGE);
      const { http } = await serve(createHarness({ washBays: [b1, b2] }));

      const response = await http.get('/v1/availability/wash-bay', {
        params: { scheduled_at: '2024-01-01T09:00:00Z', duration_minutes: 60, vehicle_size: 'large' },
      });

      expect(response.status).toBe(200);
      expect(response.data).toEqual({
        data: {
          wash_bay_id: b2.id,
          vehicle_size: 'large',
          scheduled_at: '2024-01-01T09:00:00.000Z',
          duration_minutes: 60,
        },
      });
    });

    it('returns a null id with a message when nothing is free', async () => {
      const b1 = washBay('B1', VehicleSize.STANDARD);
      const { http } = await serve(
        createHarness({ washBays: [b1], bookings: [booking(b1, at('09:00'), 30)] })
      );

      const response = await http.get('/v1/availability/wash-bay', {
        params: { scheduled_at: '2024-01-01T09:00:00Z', duration_minutes: 30, vehicle_size: 'compact' },
      });

      expect(response.status).toBe(200);
      expect(response.data.data.wash_bay_id).toBeNull();
      expect(response.data.message).toBe('No compatible wash bay is free for this slot');
    });

    it('rejects unknown vehicle sizes', async () => {
      const { http } = await serve(createHarness());

      const response = await http.get('/v1/availability/wash-bay', {
        params: { scheduled_at: '2024-01-01T09:00:00Z', duration_minutes: 30, vehicle_size: 'huge' },
      });

      expect(response.status).toBe(400);
      expect(response.data.error.details.errors).toEqual([
        {
          field: 'query.vehicle_size',
          message: 'Vehicle size must be compact, standard, large or oversized',
        },
      ]);
    });
  });

  describe('GET /v1/availability/mobile-team', () => {
    it('returns a team covering the location', async () => {
      const team = mobileTeam('Alpha', { latitude: 0, longitude: 0 }, 200);
      const { http } = await serve(createHarness({ mobileTeams: [team] }));

      const response = await http.get('/v1/availability/mobile-team', {
        params: { scheduled_at: '2024-01-01T09:00:00Z', duration_minutes: 30, latitude: 0, longitude: 1 },
      });

      expect(response.data.data.mobile_team_id).toBe(team.id);
    });

    it('rejects out-of-range coordinates', async () => {
      const { http } = await serve(createHarness());

      const response = await http.get('/v1/availability/mobile-team', {
        params: { scheduled_at: '2024-01-01T09:00:00Z', duration_minutes: 30, latitude: 120, longitude: 0 },
      });

      expect(response.status).toBe(400);
      expect(response.data.error.details.errors).toEqual([
        { field: 'query.latitude', message: 'Latitude must be between -90 and 90' },
      ]);
    });
  });

  describe('capacity', () => {
    function twoBays() {
      const b1 = washBay('B1', VehicleSize.STANDARD);
      const b2 = washBay('B2', VehicleSize.LARGE);
      const b3 = washBay('B3', VehicleSize.LARGE, { status: ResourceStatus.MAINTENANCE });
      return {
        b1,
        b2,
        harness: createHarness({ washBays: [b1, b2, b3], bookings: [booking(b1, at('09:00'), 30)] }),
      };
    }

    it('counts free active bays', async () => {
      const { harness } = twoBays();
      const { http } = await serve(harness);

      const response = await http.get('/v1/availability/capacity', {
        params: { scheduled_at: '2024-01-01T09:00:00Z', duration_minutes: 30 },
      });

      expect(response.data).toEqual({
        data: { scheduled_at: '2024-01-01T09:00:00.000Z', duration_minutes: 30, available_capacity: 1 },
      });
    });

    it('returns the per-bay snapshot', async () => {
      const { b1, b2, harness } = twoBays();
      const { http } = await serve(harness);

      const response = await http.get('/v1/availability/capacity/details', {
        params: { scheduled_at: '2024-01-01T09:00:00Z', duration_minutes: 30 },
      });

      expect(response.data.data).toEqual({
        scheduled_at: '2024-01-01T09:00:00.000Z',
        duration_minutes: 30,
        total_bays: 2,
        available_bays: 1,
        booked_bays: 1,
        utilization_percent: 50,
        bay_details: [
          { bay_id: b1.id, bay_number: 'B1', max_vehicle_size: 'standard', is_available: false },
          { bay_id: b2.id, bay_number: 'B2', max_vehicle_size: 'large', is_available: true },
        ],
      });
    });
  });

  describe('GET /v1/availability/time-slots', () => {
    it('lists slots with free capacity', async () => {
      const bay = washBay('B1', VehicleSize.STANDARD);
      const { http } = await serve(
        createHarness({ washBays: [bay], bookings: [booking(bay, at('10:00'), 30)] })
      );

      const response = await http.get('/v1/availability/time-slots', {
        params: {
          start_date: '2024-01-01T09:00:00Z',
          end_date: '2024-01-01T11:00:00Z',
          duration_minutes: 30,
          slot_interval_minutes: 60,
        },
      });

      expect(response.status).toBe(200);
      expect(response.data.data.map((slot: { start_time: string }) => slot.start_time)).toEqual([
        '2024-01-01T09:00:00.000Z',
        '2024-01-01T11:00:00.000Z',
      ]);
    });

    it('rejects a range that ends before it starts', async () => {
      const { http } = await serve(createHarness());

      const response = await http.get('/v1/availability/time-slots', {
        params: {
          start_date: '2024-01-01T11:00:00Z',
          end_date: '2024-01-01T09:00:00Z',
          duration_minutes: 30,
        },
      });

      expect(response.status).toBe(400);
      expect(response.data.error).toEqual({
        code: 'INVALID_INPUT',
        message: 'endDate must not be before startDate',
      });
    });
  });
});
