import { describe, it, expect } from 'vitest';
import { determineEvents, isDue, quantizeToCadence } from '../../src/domain/event-determiner.js';
import type { Candidate, SupplementalEvent } from '../../src/domain/entity.js';
import { at, DAY, HOUR, MINUTE, T0 } from '../helpers.js';

function entity(lastRegularUpdate: Date = T0, tsAdded: Date = T0): Candidate {
  return { entity_key: '192.0.2.1', ts_added: tsAdded, last_regular_update: lastRegularUpdate };
}

const HOURLY = new Map([['!every1h', 60]]);
const HOURLY_AND_DAILY = new Map([['!every1h', 60], ['!every1d', 1440]]);

function reprocess(expiresAt: Date = new Date('2099-01-01T00:00:00Z')): SupplementalEvent {
  return { entity_type: 'ip', event_name: 'reprocess', expires_at: expiresAt };
}

describe('isDue', () => {
  it('does not fire before the first boundary', () => {
    expect(isDue(entity(), 60, at(59 * MINUTE))).toBe(false);
  });

  it('fires once the boundary is crossed', () => {
    expect(isDue(entity(), 60, at(61 * MINUTE))).toBe(true);
  });

  it('fires on the boundary itself', () => {
    expect(isDue(entity(), 60, at(60 * MINUTE))).toBe(true);
  });

  it('does not fire again within the same interval', () => {
    expect(isDue(entity(at(60 * MINUTE)), 60, at(119 * MINUTE))).toBe(false);
  });

  it('counts boundaries from ts_added, not from the epoch', () => {
    const added = at(30 * MINUTE);
    expect(isDue(entity(added, added), 60, at(80 * MINUTE))).toBe(false);
    expect(isDue(entity(added, added), 60, at(90 * MINUTE))).toBe(true);
  });
});

describe('quantizeToCadence', () => {
  it('snaps down onto the cadence grid anchored at ts_added', () => {
    expect(quantizeToCadence(T0, at(125 * MINUTE), 60)).toEqual(at(120 * MINUTE));
    expect(quantizeToCadence(T0, at(125 * MINUTE), 7)).toEqual(at(119 * MINUTE));
  });

  it('returns ts_added before the first full step', () => {
    expect(quantizeToCadence(T0, at(59 * MINUTE), 60)).toEqual(T0);
  });
});

describe('determineEvents', () => {
  it('fires nothing at T+59m', () => {
    const decision = determineEvents(entity(), HOURLY, [], 60, at(59 * MINUTE));
    expect(decision.events).toEqual([]);
    expect(decision.last_regular_update).toEqual(T0);
  });

  it('fires the hourly event once at T+61m', () => {
    const decision = determineEvents(entity(), HOURLY, [], 60, at(61 * MINUTE));
    expect(decision.events).toEqual(['!every1h']);
    expect(decision.last_regular_update).toEqual(at(60 * MINUTE));
  });

  it('coalesces missed periods into a single event at T+125m', () => {
    const decision = determineEvents(entity(), HOURLY, [], 60, at(125 * MINUTE));
    expect(decision.events).toEqual(['!every1h']);
    expect(decision.last_regular_update).toEqual(at(120 * MINUTE));
  });

  it('reports events in configuration order', () => {
    const decision = determineEvents(entity(), HOURLY_AND_DAILY, [], 60, at(DAY + 5 * MINUTE));
    expect(decision.events).toEqual(['!every1h', '!every1d']);
  });

  it('appends a supplemental event once the day rolls over', () => {
    const decision = determineEvents(entity(), HOURLY_AND_DAILY, [reprocess()], 60, at(DAY + HOUR));
    expect(decision.events).toEqual(['!every1h', '!every1d', 'reprocess']);
  });

  it('does not repeat a supplemental event within the same day', () => {
    const decision = determineEvents(
      entity(at(DAY + HOUR)),
      HOURLY,
      [reprocess()],
      60,
      at(DAY + 2 * HOUR),
    );
    expect(decision.events).toEqual(['!every1h']);
  });

  it('fires the supplemental event again on the next day', () => {
    const decision = determineEvents(
      entity(at(DAY + 23 * HOUR)),
      new Map(),
      [reprocess()],
      60,
      at(2 * DAY),
    );
    expect(decision.events).toEqual(['reprocess']);
  });

  it('ignores supplemental events that have expired', () => {
    const decision = determineEvents(entity(), new Map(), [reprocess(at(DAY))], 60, at(DAY + HOUR));
    expect(decision.events).toEqual([]);
  });

  it('reports a name shared by a periodic and a supplemental event once', () => {
    const daily = new Map([['reprocess', 1440]]);
    const decision = determineEvents(entity(), daily, [reprocess()], 60, at(DAY));
    expect(decision.events).toEqual(['reprocess']);
  });

  it('collapses repeated supplemental entries for the same event', () => {
    const decision = determineEvents(entity(), new Map(), [reprocess(), reprocess()], 60, at(DAY));
    expect(decision.events).toEqual(['reprocess']);
  });
});
