export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export type { EntityStore, TaskProducer, SupplementalEventSource } from './ports.js';
export { planEntity } from './entity-planner.js';
export type { EntityPlan } from './entity-planner.js';
export { RateLimitedDispatcher } from './rate-limited-dispatcher.js';
export type { DispatchResult } from './rate-limited-dispatcher.js';
export { CycleDriver } from './cycle-driver.js';
export type { CycleDriverOptions, CycleReport, TypeReport } from './cycle-driver.js';
export { scheduleDocumentSchema } from './schedule-schema.js';
