/**
 * Error taxonomy. Every error is raised synchronously at the call site that
 * detects it; `code` lets callers branch without instanceof checks across
 * package boundaries.
 */

export type ErrorCode =
  | 'INVALID_TRANSITION'
  | 'NO_SUCH_TRIAL'
  | 'NO_SUCH_BLOCK'
  | 'SCHEMA_VIOLATION'
  | 'PATH_NOT_FOUND'
  | 'UNINITIALIZED_USE'
  | 'KEY_NOT_FOUND'
  | 'SETTING_TYPE'
  | 'PERSISTENCE'
  | 'PROTOCOL';

export class TrialkitError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Begin/End called out of sequence. */
export class InvalidTransitionError extends TrialkitError {
  constructor(message: string) {
    super('INVALID_TRANSITION', message);
  }
}

/** Position outside the valid trial range. "No more trials" is signalled this way. */
export class NoSuchTrialError extends TrialkitError {
  constructor(message: string) {
    super('NO_SUCH_TRIAL', message);
  }
}

export class NoSuchBlockError extends TrialkitError {
  constructor(message: string) {
    super('NO_SUCH_BLOCK', message);
  }
}

/** Undeclared result key in strict mode, or a tracker row of the wrong width. */
export class SchemaViolationError extends TrialkitError {
  constructor(message: string) {
    super('SCHEMA_VIOLATION', message);
  }
}

export class PathNotFoundError extends TrialkitError {
  readonly path: string;

  constructor(path: string, message?: string) {
    super('PATH_NOT_FOUND', message ?? `Cannot find ${path}`);
    this.path = path;
  }
}

export class UninitializedUseError extends TrialkitError {
  constructor(message: string) {
    super('UNINITIALIZED_USE', message);
  }
}

export class KeyNotFoundError extends TrialkitError {
  readonly key: string;

  constructor(key: string) {
    super('KEY_NOT_FOUND', `The key "${key}" was not found in the settings chain`);
    this.key = key;
  }
}

export class SettingTypeError extends TrialkitError {
  constructor(key: string, expected: string, actual: unknown) {
    super('SETTING_TYPE', `Setting "${key}" is ${describeValue(actual)}, expected ${expected}`);
  }
}

/** One or more queued write jobs failed. `errors` holds each job's failure in queue order. */
export class PersistenceError extends TrialkitError {
  readonly errors: unknown[];

  constructor(errors: unknown[]) {
    const first = errors[0];
    const detail = first instanceof Error ? first.message : String(first);
    super(
      'PERSISTENCE',
      `${errors.length} write job(s) failed; first failure: ${detail}`,
      { cause: first },
    );
    this.errors = errors;
  }
}

export class ProtocolError extends TrialkitError {
  constructor(message: string) {
    super('PROTOCOL', message);
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return `a ${typeof value}`;
}
