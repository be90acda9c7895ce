import type { SupplementalEventSource } from '../../application/ports.js';
import type { SupplementalEvent } from '../../domain/index.js';

/**
 * In-memory supplemental event source.
 *
 * Applies the same filters as the file-backed source (known type,
 * not yet expired) so tests and embedded callers see identical results.
 */
export class InMemorySupplementalEventSource implements SupplementalEventSource {
  private events: SupplementalEvent[];

  constructor(events: SupplementalEvent[] = []) {
    this.events = [...events];
  }

  add(event: SupplementalEvent): void {
    this.events.push(event);
  }

  clear(): void {
    this.events = [];
  }

  async read(entityTypes: readonly string[], now: Date): Promise<SupplementalEvent[]> {
    const known = new Set(entityTypes);
    return this.events.filter(
      (e) => known.has(e.entity_type) && e.expires_at.getTime() > now.getTime(),
    );
  }
}

