import { describe, expect, it } from 'vitest';
import { InvariantViolationError } from './errors';
import { getFurthestReadTime } from './read-state';
import { FakeStore, makeUser } from './test-fixtures';

describe('getFurthestReadTime', () => {
  it('should treat spectators as caught up to now', async () => {
    const before = Date.now() / 1000;
    const time = await getFurthestReadTime(null, new FakeStore());
    const after = Date.now() / 1000;

    expect(time).not.toBeNull();
    expect(time).toBeGreaterThanOrEqual(before);
    expect(time).toBeLessThanOrEqual(after);
  });

  it('should use the injected clock', async () => {
    expect(await getFurthestReadTime(null, new FakeStore(), () => 1_700_000_000_500)).toBe(
      1_700_000_000.5
    );
  });

  it('should return null for a user who never read anything', async () => {
    expect(await getFurthestReadTime(makeUser(), new FakeStore())).toBeNull();
  });

  it('should convert the last visit to whole UTC seconds', async () => {
    const store = new FakeStore();
    store.activity.set(10, {
      userId: 10,
      query: 'update_message_flags',
      client: 'website',
      count: 3,
      lastVisit: '2024-03-01T12:00:00.750Z',
    });

    expect(await getFurthestReadTime(makeUser(), store)).toBe(1709294400);
  });

  it('should reject an unparseable last visit', async () => {
    const store = new FakeStore();
    store.activity.set(10, {
      userId: 10,
      query: 'update_message_flags',
      client: 'website',
      count: 1,
      lastVisit: 'yesterday',
    });

    await expect(getFurthestReadTime(makeUser(), store)).rejects.toThrow(InvariantViolationError);
  });
});
