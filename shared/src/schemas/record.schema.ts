import { z } from 'zod';
import { LOCATION_EVENT_TYPES } from '../types/location';
import { SINK_NAMES } from '../types/record';
import type { NormalizedRecord } from '../types/record';

const instant = z.string().datetime({ offset: true });

export const locationRecordSchema = z.object({
  user_id: z.string().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  event_timestamp: instant,
  event_type: z.enum(LOCATION_EVENT_TYPES),
});

export const tripRecordSchema = z.object({
  trip_id: z.string().min(1),
  external_id: z.string().nullable(),
  user_id: z.string().min(1),
  created_at: instant,
  updated_at: instant,
  started_at: instant.nullable(),
  route_session_type: z.string().nullable(),
});

export const userRecordSchema = z.object({
  user_id: z.string().min(1),
  event_id: z.string().min(1),
  created_at: instant,
  live: z.boolean(),
});

/** Validates normalized records read back from storage. */
export const normalizedRecordSchema: z.ZodType<NormalizedRecord> = z.object({
  location: locationRecordSchema,
  trip: tripRecordSchema.nullable(),
  user: userRecordSchema.nullable(),
});

export const sinkNameSchema = z.enum(SINK_NAMES);

export const deliveryStateSchema = z.enum(['pending', 'delivered', 'failed']);
