import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

// Define environment variable schema with Zod for type-safe validation
const envSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Server configuration
  PORT: z.string().default('3000').transform(Number),

  // Supabase configuration (required)
  SUPABASE_URL: z.string().url('Invalid Supabase URL'),
  SUPABASE_ANON_KEY: z.string().min(1, 'Supabase anon key is required'),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'Supabase service role key is required'),

  // Availability configuration
  BOOKING_SEARCH_WINDOW_HOURS: z
    .string()
    .default('24')
    .transform(Number)
    .pipe(z.number().min(0, 'Search window cannot be negative')),
  DEFAULT_SLOT_INTERVAL_MINUTES: z
    .string()
    .default('30')
    .transform(Number)
    .pipe(z.number().int().positive('Slot interval must be positive')),
  MAX_SLOT_STEPS: z
    .string()
    .default('1000')
    .transform(Number)
    .pipe(z.number().int().positive('Max slot steps must be positive')),

  // Logging configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // CORS configuration
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000,http://localhost:3001'),
});

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const errorMessage = `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
  console.error(errorMessage);
  throw new Error(errorMessage);
}

// Export validated environment variables
export const env = parsed.data;

export const ALLOWED_ORIGINS = env.ALLOWED_ORIGINS.split(',')
  .map((origin) => origin.trim())
  .filter((origin) => origin.length > 0);

// Log environment on startup
if (env.NODE_ENV !== 'test') {
  console.log('✅ Environment variables validated successfully');
  console.log(`📝 Environment: ${env.NODE_ENV}`);
  console.log(`🚀 Port: ${env.PORT}`);
  console.log(`🔎 Booking search window: ${env.BOOKING_SEARCH_WINDOW_HOURS} hours`);
}
