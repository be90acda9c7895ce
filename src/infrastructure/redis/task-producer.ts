import type { Redis } from 'ioredis';
import type { TaskProducer } from '../../application/ports.js';
import type { DispatchItem } from '../../domain/index.js';

export const DEFAULT_STREAM_KEY = 'entity_tasks';

/** Marks tasks produced by the lifecycle updater on the wire. */
export const TASK_SOURCE = 'updater';

/**
 * Flattens a dispatch item into the field/value list stored in the stream.
 * Redis Streams only hold strings, so arrays are JSON-encoded.
 */
export function toStreamFields(item: DispatchItem): string[] {
  return [
    'entity_type', item.entity_type,
    'entity_key', item.entity_key,
    'events', JSON.stringify(item.events),
    'attribute_updates', JSON.stringify(item.attribute_updates),
    'delete', String(item.delete),
    'source', TASK_SOURCE,
  ];
}

/**
 * Appends a dispatch item to the task stream with `XADD <stream> *`.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueTask(redis: Redis, stream: string, item: DispatchItem): Promise<string> {
  const entryId = await redis.xadd(stream, '*', ...toStreamFields(item));
  if (entryId === null) {
    throw new Error(`XADD to ${stream} returned no entry id`);
  }
  return entryId;
}

export function createTaskProducer(redis: Redis, stream: string = DEFAULT_STREAM_KEY): TaskProducer {
  return {
    async send(item: DispatchItem): Promise<void> {
      await enqueueTask(redis, stream, item);
    },
  };
}
