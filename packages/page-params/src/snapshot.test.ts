import { describe, expect, it } from 'vitest';
import { Snapshot, isRecord } from './snapshot';

describe('Snapshot', () => {
  it('should keep the position of a rewritten field', () => {
    const snapshot = new Snapshot().set('a', 1).set('b', 2).set('a', 3);

    expect(snapshot.keys()).toEqual(['a', 'b']);
    expect(snapshot.get('a')).toBe(3);
    expect(snapshot.toJSON()).toEqual({ a: 3, b: 2 });
  });

  it('should log every write including rewrites', () => {
    const snapshot = new Snapshot().set('a', 1).merge({ b: 2, a: 3 });

    expect(snapshot.writes).toEqual([
      { field: 'a', value: 1 },
      { field: 'b', value: 2 },
      { field: 'a', value: 3 },
    ]);
  });

  it('should serialize through JSON.stringify', () => {
    const snapshot = new Snapshot().set('queue_id', null).set('narrow', []);

    expect(JSON.stringify(snapshot)).toBe('{"queue_id":null,"narrow":[]}');
    expect(snapshot.has('queue_id')).toBe(true);
    expect(snapshot.has('missing')).toBe(false);
  });
});

describe('isRecord', () => {
  it('should accept plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});
