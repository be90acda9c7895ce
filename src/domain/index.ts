export { ConfigError } from './errors.js';
export { INDEFINITE, parseInterval, parseLeaseInterval, isIndefinite } from './interval.js';
export type { Indefinite, LeaseInterval } from './interval.js';
export { buildSchedules, cadenceOf } from './schedule.js';
export type { TypeSchedule, ScheduleDocument } from './schedule.js';
export {
  LEASES_ATTRIBUTE,
  LAST_REGULAR_UPDATE_ATTRIBUTE,
  toStoredLeases,
} from './entity.js';
export type {
  LeaseMap,
  StoredLeases,
  Candidate,
  AttributeValue,
  AttributeUpdate,
  DispatchItem,
  SupplementalEvent,
} from './entity.js';
export { evaluateLeases } from './lease-evaluator.js';
export type { LeaseVerdict } from './lease-evaluator.js';
export { determineEvents, isDue, quantizeToCadence } from './event-determiner.js';
export type { EventDecision } from './event-determiner.js';
