/**
 * Error hierarchy for manifest-hub.
 *
 * HubError (base)
 * ├── ConfigError
 * ├── ManifestError
 * │   └── SchemaViolation
 * ├── ManifestDirectoryError
 * └── PatternError
 *     ├── InvalidStateTransition
 *     └── CrossTypeComparisonError
 */

export class HubError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HubError";
  }
}

export class ConfigError extends HubError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ── Manifests ────────────────────────────────────

export class ManifestError extends HubError {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}

/** Well-formed manifest with a missing or invalid field. */
export class SchemaViolation extends ManifestError {
  readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message);
    this.name = "SchemaViolation";
    this.field = field;
  }
}

/** The manifests directory itself cannot be listed. Fatal for a reload. */
export class ManifestDirectoryError extends HubError {
  readonly dir: string;

  constructor(dir: string, message: string) {
    super(`Cannot read manifests directory ${dir}: ${message}`);
    this.name = "ManifestDirectoryError";
    this.dir = dir;
  }
}

// ── Patterns ─────────────────────────────────────

export class PatternError extends HubError {
  constructor(message: string) {
    super(message);
    this.name = "PatternError";
  }
}

export class InvalidStateTransition extends PatternError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateTransition";
  }
}

export class CrossTypeComparisonError extends PatternError {
  constructor(message: string) {
    super(message);
    this.name = "CrossTypeComparisonError";
  }
}

// ── Utilities ───────────────────────────────────

/**
 * Extract a loggable string from an unknown caught value.
 *
 * Error objects have non-enumerable `message` and `stack` properties,
 * so `JSON.stringify(err)` returns `"{}"`. pino serializes log fields
 * via JSON before handing them to the transport worker thread, which
 * means `logger.warn({ error: err })` loses all error information.
 *
 * Use this helper everywhere an error is passed to logger fields:
 *   `logger.warn({ error: errorToString(err) }, "something_failed")`
 */
export function errorToString(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
