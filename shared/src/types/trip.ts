export interface TripRecord {
  trip_id: string;
  external_id: string | null;
  user_id: string;
  created_at: string;
  updated_at: string;
  started_at: string | null;
  route_session_type: string | null;
}
