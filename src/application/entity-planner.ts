import {
  evaluateLeases,
  determineEvents,
  toStoredLeases,
  LEASES_ATTRIBUTE,
  LAST_REGULAR_UPDATE_ATTRIBUTE,
  type AttributeUpdate,
  type Candidate,
  type DispatchItem,
  type LeaseMap,
  type LeaseVerdict,
  type SupplementalEvent,
  type TypeSchedule,
} from '../domain/index.js';

export interface EntityPlan {
  readonly item: DispatchItem;
  readonly verdict: LeaseVerdict;
}

/**
 * Builds the single dispatch item for one candidate entity.
 *
 * Leases are evaluated first; a delete verdict short-circuits event
 * evaluation. Otherwise the lease rewrite (if any) and the new
 * last_regular_update are merged into one item with the fired events.
 */
export function planEntity(
  schedule: TypeSchedule,
  cadenceMinutes: number,
  entity: Candidate,
  leases: LeaseMap,
  supplemental: readonly SupplementalEvent[],
  now: Date,
): EntityPlan {
  const verdict = evaluateLeases(leases, schedule.leases, now);

  if (verdict.action === 'delete') {
    return {
      verdict,
      item: {
        entity_type: schedule.entity_type,
        entity_key: entity.entity_key,
        events: [],
        attribute_updates: [],
        delete: true,
      },
    };
  }

  const decision = determineEvents(entity, schedule.events, supplemental, cadenceMinutes, now);

  const updates: AttributeUpdate[] = [];
  if (verdict.leases !== null) {
    updates.push({ op: 'set', attribute: LEASES_ATTRIBUTE, value: toStoredLeases(verdict.leases) });
  }
  updates.push({
    op: 'set',
    attribute: LAST_REGULAR_UPDATE_ATTRIBUTE,
    value: decision.last_regular_update.toISOString(),
  });

  return {
    verdict,
    item: {
      entity_type: schedule.entity_type,
      entity_key: entity.entity_key,
      events: decision.events,
      attribute_updates: updates,
      delete: false,
    },
  };
}
