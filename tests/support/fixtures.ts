import {
  Location,
  MobileTeam,
  ResourceRef,
  ResourceStatus,
  VehicleSize,
  WashBay,
} from '../../src/types/facility.types';
import { BookingStatus } from '../../src/types/booking.types';
import { StoredBooking, nextId } from './in-memory-stores';

const CREATED = new Date('2023-12-01T00:00:00.000Z');

/** 2024-01-01 at the given UTC time, e.g. at('09:30') */
export function at(time: string): Date {
  return new Date(`2024-01-01T${time}:00.000Z`);
}

export function washBay(
  bayNumber: string,
  maxVehicleSize: VehicleSize,
  overrides: Partial<WashBay> = {}
): WashBay {
  return {
    kind: 'wash_bay',
    id: nextId(),
    bayNumber,
    maxVehicleSize,
    equipmentTypes: ['pressure_washer'],
    location: null,
    status: ResourceStatus.ACTIVE,
    createdAt: CREATED,
    updatedAt: CREATED,
    deletedAt: null,
    ...overrides,
  };
}

export function mobileTeam(
  teamName: string,
  baseLocation: Location,
  serviceRadiusKm: number,
  overrides: Partial<MobileTeam> = {}
): MobileTeam {
  return {
    kind: 'mobile_team',
    id: nextId(),
    teamName,
    baseLocation,
    serviceRadiusKm,
    dailyCapacity: 8,
    equipmentTypes: ['portable_washer'],
    status: ResourceStatus.ACTIVE,
    createdAt: CREATED,
    updatedAt: CREATED,
    deletedAt: null,
    ...overrides,
  };
}

export function booking(
  resource: ResourceRef,
  scheduledAt: Date,
  durationMinutes: number,
  status: BookingStatus = BookingStatus.CONFIRMED,
  id: string = nextId()
): StoredBooking {
  return {
    id,
    resource: { kind: resource.kind, id: resource.id },
    scheduledAt,
    durationMinutes,
    status,
  };
}
