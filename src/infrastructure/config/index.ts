export { loadSchedules, parseSchedules, SCHEDULE_FILE } from './schedule-loader.js';
export { loadSettings } from './settings.js';
export type { UpdaterSettings } from './settings.js';
