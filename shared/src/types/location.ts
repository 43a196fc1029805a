export const LOCATION_EVENT_TYPES = [
  'location_update',
  'geofence_enter',
  'geofence_exit',
  'trip_started',
  'trip_updated',
  'trip_completed',
] as const;

export type LocationEventType = (typeof LOCATION_EVENT_TYPES)[number];

export const GEOFENCE_EVENT_TYPES: readonly LocationEventType[] = ['geofence_enter', 'geofence_exit'];

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface LocationRecord extends Coordinates {
  user_id: string;
  /** UTC ISO-8601 instant */
  event_timestamp: string;
  event_type: LocationEventType;
}

export function isGeofenceEvent(eventType: LocationEventType): boolean {
  return GEOFENCE_EVENT_TYPES.includes(eventType);
}
