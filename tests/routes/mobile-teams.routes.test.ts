import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createHarness, startTestServer, TestServer } from '../support/harness';

describe('mobile team routes', () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await startTestServer(createHarness().services);
  });

  afterEach(async () => {
    await server.close();
  });

  it('creates a team with defaults', async () => {
    const response = await server.http.post('/v1/mobile-teams', {
      team_name: 'Alpha',
      base_latitude: 0,
      base_longitude: 0,
    });

    expect(response.status).toBe(201);
    expect(response.data.data).toMatchObject({
      kind: 'mobile_team',
      teamName: 'Alpha',
      baseLocation: { latitude: 0, longitude: 0 },
      serviceRadiusKm: 50,
      dailyCapacity: 8,
      status: 'active',
    });
  });

  it('lists teams whose radius reaches a location', async () => {
    await server.http.post('/v1/mobile-teams', {
      team_name: 'Near',
      base_latitude: 0,
      base_longitude: 0,
      service_radius_km: 50,
    });
    await server.http.post('/v1/mobile-teams', {
      team_name: 'Far',
      base_latitude: 0,
      base_longitude: 0,
      service_radius_km: 200,
    });

    const response = await server.http.get('/v1/mobile-teams/coverage', {
      params: { latitude: 0, longitude: 1 },
    });

    expect(response.status).toBe(200);
    expect(response.data.data.map((team: { teamName: string }) => team.teamName)).toEqual(['Far']);
  });

  it('refuses to put a team under maintenance', async () => {
    const created = await server.http.post('/v1/mobile-teams', {
      team_name: 'Alpha',
      base_latitude: 0,
      base_longitude: 0,
    });

    const response = await server.http.patch(`/v1/mobile-teams/${created.data.data.id}`, {
      status: 'maintenance',
    });

    expect(response.status).toBe(400);
    expect(response.data.error.details.errors[0].field).toBe('body.status');
  });

  it('updates, deletes and then forgets a team', async () => {
    const created = await server.http.post('/v1/mobile-teams', {
      team_name: 'Alpha',
      base_latitude: 0,
      base_longitude: 0,
    });
    const id: string = created.data.data.id;

    const updated = await server.http.patch(`/v1/mobile-teams/${id}`, { service_radius_km: 75.5 });
    expect(updated.data.data.serviceRadiusKm).toBe(75.5);

    const deleted = await server.http.delete(`/v1/mobile-teams/${id}`);
    expect(deleted.data.data).toEqual({
      id,
      name: 'Alpha',
      deleted: true,
      message: "Mobile team 'Alpha' has been deactivated",
    });

    const list = await server.http.get('/v1/mobile-teams', { params: { include_deleted: 'true' } });
    expect(list.data.data.mobileTeams).toHaveLength(1);
    expect(list.data.data.mobileTeams[0].status).toBe('inactive');
    expect(list.data.data.statusCounts).toEqual({ active: 0, inactive: 0, maintenance: 0 });

    const gone = await server.http.get(`/v1/mobile-teams/${id}`);
    expect(gone.status).toBe(404);
    expect(gone.data.error.code).toBe('MOBILE_TEAM_NOT_FOUND');
  });

  it('rejects duplicate names with 409', async () => {
    await server.http.post('/v1/mobile-teams', { team_name: 'Alpha', base_latitude: 0, base_longitude: 0 });

    const response = await server.http.post('/v1/mobile-teams', {
      team_name: 'Alpha',
      base_latitude: 1,
      base_longitude: 1,
    });

    expect(response.status).toBe(409);
    expect(response.data.error.code).toBe('TEAM_NAME_EXISTS');
  });
});
