import type { UserProfile } from '@homeview/realm-core';
import { InvariantViolationError } from './errors';
import type { HomeDataStore } from './types';

export type ActivityLookup = Pick<HomeDataStore, 'getLatestUpdateMessageFlagActivity'>;

/**
 * Time up to which the user has read messages, in epoch seconds
 *
 * Spectators are always caught up, so they get the current time. A user
 * who never updated message flags gets null.
 */
export async function getFurthestReadTime(
  user: UserProfile | null,
  activity: ActivityLookup,
  now: () => number = Date.now
): Promise<number | null> {
  if (user === null) {
    return now() / 1000;
  }

  const latest = await activity.getLatestUpdateMessageFlagActivity(user.userId);
  if (latest === null) {
    return null;
  }

  const lastVisit = Date.parse(latest.lastVisit);
  if (Number.isNaN(lastVisit)) {
    throw new InvariantViolationError(`activity record has an invalid lastVisit: ${latest.lastVisit}`);
  }
  return Math.floor(lastVisit / 1000);
}
