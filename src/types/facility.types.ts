/**
 * Facility domain types
 *
 * Wash bays and mobile teams are the two schedulable resource kinds. They
 * share no behaviour: bays are matched by vehicle size, teams by distance.
 */

export enum VehicleSize {
  COMPACT = 'compact',
  STANDARD = 'standard',
  LARGE = 'large',
  OVERSIZED = 'oversized',
}

export enum ResourceStatus {
  ACTIVE = 'active',
  INACTIVE = 'inactive',
  MAINTENANCE = 'maintenance',
}

export type ResourceKind = 'wash_bay' | 'mobile_team';

export interface Location {
  latitude: number;
  longitude: number;
}

export interface WashBay {
  kind: 'wash_bay';
  id: string;
  bayNumber: string;
  maxVehicleSize: VehicleSize;
  equipmentTypes: string[];
  location: Location | null;
  status: ResourceStatus;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export interface MobileTeam {
  kind: 'mobile_team';
  id: string;
  teamName: string;
  baseLocation: Location;
  serviceRadiusKm: number;
  dailyCapacity: number;
  equipmentTypes: string[];
  status: ResourceStatus;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export type Resource = WashBay | MobileTeam;

// Enough to address a resource's bookings
export type ResourceRef = Pick<Resource, 'kind' | 'id'>;

// Database row types (snake_case from PostgreSQL)
export interface WashBayRow {
  id: string;
  bay_number: string;
  max_vehicle_size: string;
  equipment_types: string[] | null;
  location_latitude: number | string | null;
  location_longitude: number | string | null;
  status: string;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}

export interface MobileTeamRow {
  id: string;
  team_name: string;
  base_latitude: number | string;
  base_longitude: number | string;
  service_radius_km: number | string;
  daily_capacity: number;
  equipment_types: string[] | null;
  status: string;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}

export interface CreateWashBayInput {
  bayNumber: string;
  maxVehicleSize: VehicleSize;
  equipmentTypes?: string[];
  latitude?: number;
  longitude?: number;
}

export interface UpdateWashBayInput {
  bayNumber?: string;
  maxVehicleSize?: VehicleSize;
  equipmentTypes?: string[];
  status?: ResourceStatus;
  latitude?: number;
  longitude?: number;
}

export interface CreateMobileTeamInput {
  teamName: string;
  baseLatitude: number;
  baseLongitude: number;
  serviceRadiusKm?: number;
  dailyCapacity?: number;
  equipmentTypes?: string[];
}

export interface UpdateMobileTeamInput {
  teamName?: string;
  baseLatitude?: number;
  baseLongitude?: number;
  serviceRadiusKm?: number;
  dailyCapacity?: number;
  equipmentTypes?: string[];
  status?: ResourceStatus;
}

export interface ListResourcesFilter {
  status?: ResourceStatus;
  includeDeleted?: boolean;
}

export type StatusCounts = Record<ResourceStatus, number>;

export interface WashBayList {
  washBays: WashBay[];
  totalCount: number;
  statusCounts: StatusCounts;
}

export interface MobileTeamList {
  mobileTeams: MobileTeam[];
  totalCount: number;
  statusCounts: StatusCounts;
}

export interface DeleteResourceResult {
  id: string;
  name: string;
  deleted: true;
  message: string;
}
