/**
 * Raised for schedule configuration that cannot be resolved:
 * malformed interval strings, "*" used for an event interval,
 * or a document whose shape does not match the expected layout.
 *
 * `path` points at the offending entry, e.g. `events.ip.!every1h`.
 */
export class ConfigError extends Error {
  readonly path: string;

  constructor(message: string, path = '') {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigError';
    this.path = path;
  }
}
