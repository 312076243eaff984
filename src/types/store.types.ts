/**
 * Persistence ports
 *
 * Services depend on these; the Supabase repositories implement them.
 */

import {
  MobileTeam,
  ResourceRef,
  ResourceStatus,
  StatusCounts,
  VehicleSize,
  WashBay,
  Location,
} from './facility.types';
import { BookingOccupancy, BookingSearchWindow } from './booking.types';

export interface WashBayQuery {
  status?: ResourceStatus;
  maxVehicleSizes?: readonly VehicleSize[];
  includeDeleted?: boolean;
}

export interface NewWashBay {
  bayNumber: string;
  maxVehicleSize: VehicleSize;
  equipmentTypes: string[];
  location: Location | null;
}

export type WashBayChanges = Partial<NewWashBay & { status: ResourceStatus }>;

export interface WashBayStore {
  create(bay: NewWashBay): Promise<WashBay>;
  /** Non-deleted bay by id */
  findById(id: string): Promise<WashBay | null>;
  /** Non-deleted bay by number */
  findByBayNumber(bayNumber: string): Promise<WashBay | null>;
  /** Ordered by bay number */
  list(query: WashBayQuery): Promise<WashBay[]>;
  update(id: string, changes: WashBayChanges): Promise<WashBay | null>;
  /** Marks the bay inactive and deleted; null when already gone */
  softDelete(id: string): Promise<WashBay | null>;
  /** Counts over non-deleted bays */
  countByStatus(): Promise<StatusCounts>;
}

export interface MobileTeamQuery {
  status?: ResourceStatus;
  includeDeleted?: boolean;
}

export interface NewMobileTeam {
  teamName: string;
  baseLocation: Location;
  serviceRadiusKm: number;
  dailyCapacity: number;
  equipmentTypes: string[];
}

export type MobileTeamChanges = Partial<NewMobileTeam & { status: ResourceStatus }>;

export interface MobileTeamStore {
  create(team: NewMobileTeam): Promise<MobileTeam>;
  findById(id: string): Promise<MobileTeam | null>;
  findByTeamName(teamName: string): Promise<MobileTeam | null>;
  /** Ordered by team name */
  list(query: MobileTeamQuery): Promise<MobileTeam[]>;
  update(id: string, changes: MobileTeamChanges): Promise<MobileTeam | null>;
  softDelete(id: string): Promise<MobileTeam | null>;
  countByStatus(): Promise<StatusCounts>;
}

export interface BookingStore {
  /**
   * Pending, confirmed and in-progress bookings assigned to the resource.
   * With a window, only bookings whose start falls inside it.
   */
  listActiveForResource(
    resource: ResourceRef,
    window: BookingSearchWindow | null
  ): Promise<BookingOccupancy[]>;
}
