import { z } from 'zod';

/** `{ entity_type: { name: interval_string } }` */
const intervalTableSchema = z.record(
  z.string().min(1),
  z.record(z.string().min(1), z.string()).nullable().transform((v) => v ?? {}),
);

/**
 * Zod schema for the schedule document (config/updater.yml).
 *
 * Interval strings are only checked for being strings here; unit and
 * range checks happen when the document is resolved into TypeSchedules.
 * `ttl_tokens` is accepted as an older name for `leases`.
 */
export const scheduleDocumentSchema = z
  .object({
    events: intervalTableSchema.nullish(),
    leases: intervalTableSchema.nullish(),
    ttl_tokens: intervalTableSchema.nullish(),
  })
  .transform((doc) => ({
    events: doc.events ?? {},
    leases: doc.leases ?? doc.ttl_tokens ?? {},
  }));

export type ScheduleDocumentInput = z.input<typeof scheduleDocumentSchema>;
