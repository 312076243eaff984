import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logger } from './logger';
import { env } from './environment';

let supabaseClient: SupabaseClient | null = null;

/**
 * Get or create the shared Supabase client
 *
 * Uses the service role key: the API reads wash bays and bookings across
 * tenants and has no user sessions of its own.
 */
export const getSupabaseClient = (): SupabaseClient => {
  if (!supabaseClient) {
    supabaseClient = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
      db: {
        schema: 'public',
      },
    });

    logger.info('Supabase client initialized', {
      url: env.SUPABASE_URL,
      schema: 'public',
    });
  }

  return supabaseClient;
};

/**
 * Probe the wash_bays table
 *
 * @returns true when the table answers a one-row select
 */
export const testConnection = async (): Promise<boolean> => {
  try {
    const { error } = await getSupabaseClient().from('wash_bays').select('id').limit(1);

    if (error) {
      logger.error('Database connection test failed', { error: error.message });
      return false;
    }

    logger.info('Database connection test successful');
    return true;
  } catch (error) {
    logger.error('Database connection test failed', { error });
    return false;
  }
};

/**
 * Drop the cached client (for graceful shutdown)
 */
export const closeConnection = (): void => {
  if (supabaseClient) {
    // PostgREST is stateless over HTTP; there is no socket to close
    supabaseClient = null;
    logger.info('Supabase client released');
  }
};
