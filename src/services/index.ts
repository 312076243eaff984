import { SupabaseClient } from '@supabase/supabase-js';
import { WashBayRepository } from '../repositories/wash-bay.repository';
import { MobileTeamRepository } from '../repositories/mobile-team.repository';
import { BookingRepository } from '../repositories/booking.repository';
import { BookingStore, MobileTeamStore, WashBayStore } from '../types/store.types';
import { ResourceCatalogService } from './resource-catalog.service';
import { AvailabilityOptions, AvailabilityService } from './availability.service';
import { FacilityService } from './facility.service';
import { env } from '../config/environment';

export interface AppServices {
  catalog: ResourceCatalogService;
  availability: AvailabilityService;
  facilities: FacilityService;
}

export interface AppStores {
  washBays: WashBayStore;
  mobileTeams: MobileTeamStore;
  bookings: BookingStore;
}

export function availabilityOptionsFromEnv(): AvailabilityOptions {
  return {
    searchWindowHours: env.BOOKING_SEARCH_WINDOW_HOURS,
    defaultSlotIntervalMinutes: env.DEFAULT_SLOT_INTERVAL_MINUTES,
    maxSlotSteps: env.MAX_SLOT_STEPS,
  };
}

/**
 * Wire services over the given stores
 */
export function createServices(
  stores: AppStores,
  options: Partial<AvailabilityOptions> = availabilityOptionsFromEnv()
): AppServices {
  const catalog = new ResourceCatalogService(stores.washBays, stores.mobileTeams);

  return {
    catalog,
    availability: new AvailabilityService(catalog, stores.bookings, options),
    facilities: new FacilityService(stores.washBays, stores.mobileTeams),
  };
}

export function createSupabaseStores(client: SupabaseClient): AppStores {
  return {
    washBays: new WashBayRepository(client),
    mobileTeams: new MobileTeamRepository(client),
    bookings: new BookingRepository(client),
  };
}
