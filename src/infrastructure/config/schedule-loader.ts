import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { scheduleDocumentSchema } from '../../application/schedule-schema.js';
import { buildSchedules, ConfigError, type TypeSchedule } from '../../domain/index.js';

export const SCHEDULE_FILE = 'updater.yml';

/**
 * Loads and resolves the schedule document from `<configDir>/updater.yml`.
 *
 * Unlike the side-channel file, a missing or invalid schedule is fatal:
 * every failure surfaces as a ConfigError.
 */
export function loadSchedules(configDir: string): Map<string, TypeSchedule> {
  const filePath = resolve(configDir, SCHEDULE_FILE);

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read schedule file: ${reason}`, filePath);
  }

  return parseSchedules(content, filePath);
}

/** Parses YAML text into resolved schedules. `source` is used in error messages. */
export function parseSchedules(content: string, source = SCHEDULE_FILE): Map<string, TypeSchedule> {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid YAML: ${reason}`, source);
  }

  const parsed = scheduleDocumentSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    throw new ConfigError(issue?.message ?? 'Invalid schedule document', path);
  }

  return buildSchedules(parsed.data);
}
