import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { SupplementalEventSource } from '../../application/ports.js';
import type { SupplementalEvent } from '../../domain/index.js';

export const SUPPLEMENTAL_FILE = 'supplemental_events.txt';

const expirySchema = z.string().datetime({ offset: true });

export type LineResult =
  | { readonly ok: true; readonly event: SupplementalEvent }
  | { readonly ok: false; readonly reason: string }
  | { readonly ok: 'skip' };

/**
 * Parses one side-channel line: `<entity_type> <event_name> <rfc3339>`.
 * Blank lines and `#` comments are skipped.
 */
export function parseSupplementalLine(
  rawLine: string,
  entityTypes: ReadonlySet<string>,
  now: Date,
): LineResult {
  const line = rawLine.trim();
  if (line === '' || line.startsWith('#')) return { ok: 'skip' };

  const fields = line.split(/\s+/);
  if (fields.length !== 3) {
    return { ok: false, reason: 'expected "<entity_type> <event_name> <expiry>"' };
  }

  const [entityType = '', eventName = '', expiry = ''] = fields;
  if (!entityTypes.has(entityType)) {
    return { ok: false, reason: `unknown entity type "${entityType}"` };
  }
  if (!expirySchema.safeParse(expiry).success) {
    return { ok: false, reason: `invalid timestamp "${expiry}"` };
  }

  const expiresAt = new Date(expiry);
  if (expiresAt.getTime() <= now.getTime()) {
    return { ok: false, reason: 'already expired' };
  }

  return { ok: true, event: { entity_type: entityType, event_name: eventName, expires_at: expiresAt } };
}

/**
 * Reads supplemental events from a plain-text file on every call.
 *
 * A missing file yields no events. Bad lines are logged and skipped;
 * they never stop the rest of the file from being read.
 */
export class FileSupplementalEventSource implements SupplementalEventSource {
  private readonly filePath: string;
  private readonly log: Logger;

  constructor(filePath: string, log: Logger) {
    this.filePath = filePath;
    this.log = log;
  }

  static inConfigDir(configDir: string, log: Logger): FileSupplementalEventSource {
    return new FileSupplementalEventSource(resolve(configDir, SUPPLEMENTAL_FILE), log);
  }

  async read(entityTypes: readonly string[], now: Date): Promise<SupplementalEvent[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err: unknown) {
      if (isNotFound(err)) {
        this.log.debug({ path: this.filePath }, 'No supplemental events file');
        return [];
      }
      throw err;
    }

    const known = new Set(entityTypes);
    const events: SupplementalEvent[] = [];

    content.split('\n').forEach((line, index) => {
      const result = parseSupplementalLine(line, known, now);
      if (result.ok === 'skip') return;
      if (result.ok) {
        events.push(result.event);
        return;
      }
      this.log.warn(
        { path: this.filePath, lineNumber: index + 1, line: line.trim(), reason: result.reason },
        'Ignoring supplemental event line',
      );
    });

    this.log.debug({ path: this.filePath, count: events.length }, 'Supplemental events loaded');
    return events;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
