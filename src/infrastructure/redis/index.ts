export { createRedisClient } from './client.js';
export { enqueueTask, createTaskProducer, toStreamFields, DEFAULT_STREAM_KEY, TASK_SOURCE } from './task-producer.js';
