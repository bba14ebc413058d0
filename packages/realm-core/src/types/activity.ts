/**
 * UserActivity Types
 *
 * One record per (user, query) pair, bumped every time the user calls
 * that endpoint.
 */

/**
 * Activity queries that count as reading messages
 */
export const UPDATE_MESSAGE_FLAG_QUERIES = [
  'update_message_flags',
  'update_message_flags_for_narrow',
] as const;

export interface UserActivity {
  userId: number;
  /** Endpoint name the activity was recorded for */
  query: string;
  /** Client that made the calls */
  client: string;
  /** Number of calls */
  count: number;
  /** Last call timestamp (ISO8601, UTC) */
  lastVisit: string;
}
