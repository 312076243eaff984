import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

const vehicleSizes = ['compact', 'standard', 'large', 'oversized'];
const resourceStatuses = ['active', 'inactive', 'maintenance'];

const timestamps = {
  createdAt: { type: 'string', format: 'date-time' },
  updatedAt: { type: 'string', format: 'date-time' },
  deletedAt: { type: 'string', format: 'date-time', nullable: true },
};

/**
 * OpenAPI 3 document built from the @swagger blocks in the route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Wash Bay Capacity API',
      version: '1.0.0',
      description: `
Scheduling backend for a car wash: wash bays, mobile teams and the
availability of both over time.

## Availability rules
- A booking occupies its resource over \`[scheduled_at, scheduled_at + duration)\`;
  bookings that only touch end to start do not conflict.
- Only pending, confirmed and in-progress bookings occupy a resource.
- A bay takes its rated vehicle size and every smaller one
  (compact < standard < large < oversized).
- A mobile team covers locations within its service radius (haversine distance).
- Wash bays are offered first-fit in bay-number order.

## Booking writers
Availability answers are not reservations. Hold a per-resource lock, or rely on
an exclusion constraint on \`(resource_id, time range)\`, between checking and
writing a booking.

Bookings starting within ${env.BOOKING_SEARCH_WINDOW_HOURS} hours of a requested
slot are considered.
      `.trim(),
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      { name: 'Wash Bays', description: 'Fixed wash bay management' },
      { name: 'Mobile Teams', description: 'Mobile team management and coverage' },
      { name: 'Availability', description: 'Free/busy checks, capacity and open slots' },
    ],
    components: {
      parameters: {
        ScheduledAt: {
          in: 'query',
          name: 'scheduled_at',
          required: true,
          schema: { type: 'string', format: 'date-time' },
        },
        DurationMinutes: {
          in: 'query',
          name: 'duration_minutes',
          required: true,
          schema: { type: 'integer', minimum: 1 },
        },
      },
      schemas: {
        VehicleSize: { type: 'string', enum: vehicleSizes },
        Location: {
          type: 'object',
          properties: {
            latitude: { type: 'number', minimum: -90, maximum: 90 },
            longitude: { type: 'number', minimum: -180, maximum: 180 },
          },
        },
        WashBay: {
          type: 'object',
          properties: {
            kind: { type: 'string', enum: ['wash_bay'] },
            id: { type: 'string', format: 'uuid' },
            bayNumber: { type: 'string' },
            maxVehicleSize: { $ref: '#/components/schemas/VehicleSize' },
            equipmentTypes: { type: 'array', items: { type: 'string' } },
            location: { $ref: '#/components/schemas/Location' },
            status: { type: 'string', enum: resourceStatuses },
            ...timestamps,
          },
        },
        MobileTeam: {
          type: 'object',
          properties: {
            kind: { type: 'string', enum: ['mobile_team'] },
            id: { type: 'string', format: 'uuid' },
            teamName: { type: 'string' },
            baseLocation: { $ref: '#/components/schemas/Location' },
            serviceRadiusKm: { type: 'number', exclusiveMinimum: 0 },
            dailyCapacity: { type: 'integer', minimum: 1 },
            equipmentTypes: { type: 'array', items: { type: 'string' } },
            status: { type: 'string', enum: ['active', 'inactive'] },
            ...timestamps,
          },
        },
        CapacitySnapshot: {
          type: 'object',
          properties: {
            scheduled_at: { type: 'string', format: 'date-time' },
            duration_minutes: { type: 'integer' },
            total_bays: { type: 'integer' },
            available_bays: { type: 'integer' },
            booked_bays: { type: 'integer' },
            utilization_percent: {
              type: 'number',
              description: 'booked / total * 100, two decimals; 0 with no bays',
            },
            bay_details: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  bay_id: { type: 'string', format: 'uuid' },
                  bay_number: { type: 'string' },
                  max_vehicle_size: { $ref: '#/components/schemas/VehicleSize' },
                  is_available: { type: 'boolean' },
                },
              },
            },
          },
        },
        TimeSlot: {
          type: 'object',
          properties: {
            start_time: { type: 'string', format: 'date-time' },
            end_time: { type: 'string', format: 'date-time' },
            available_capacity: { type: 'integer', minimum: 1 },
            duration_minutes: { type: 'integer' },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: { type: 'string' },
                message: { type: 'string' },
                details: { type: 'object' },
              },
            },
          },
        },
      },
    },
  },
  apis: ['./src/routes/**/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
