export { FileSupplementalEventSource, parseSupplementalLine, SUPPLEMENTAL_FILE } from './file-source.js';
export type { LineResult } from './file-source.js';
export { InMemorySupplementalEventSource } from './in-memory-source.js';
