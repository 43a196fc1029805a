export interface UserRecord {
  user_id: string;
  event_id: string;
  created_at: string;
  live: boolean;
}
