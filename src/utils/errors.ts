import type { ValidationError } from './validation.js';

export type PgFixtureErrorCode =
  | 'COMPLETE_PLAN_FAILED'
  | 'RESOURCE_ACQUISITION_FAILED'
  | 'CLEANUP_FAILED'
  | 'INVALID_CONFIG_FILE';

export class PgFixtureError extends Error {
  readonly code: PgFixtureErrorCode;

  constructor(code: PgFixtureErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Completing the merged plan failed; carries every missing option at once. */
export class CompletePlanError extends PgFixtureError {
  readonly errors: readonly string[];
  readonly renderedPlan: string;

  constructor(renderedPlan: string, errors: readonly string[]) {
    super(
      'COMPLETE_PLAN_FAILED',
      [
        'Could not complete the plan:',
        ...errors.map(error => `  ${error}`),
        'Plan:',
        renderedPlan,
      ].join('\n')
    );
    this.errors = errors;
    this.renderedPlan = renderedPlan;
  }
}

export class ResourceAcquisitionError extends PgFixtureError {
  readonly resource: string;

  constructor(resource: string, cause: unknown) {
    super('RESOURCE_ACQUISITION_FAILED', `Failed to acquire ${resource}: ${errorMessage(cause)}`, { cause });
    this.resource = resource;
  }
}

export class CleanupError extends PgFixtureError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('CLEANUP_FAILED', `Failed to remove '${path}': ${errorMessage(cause)}`, { cause });
    this.path = path;
  }
}

export class ConfigFileError extends PgFixtureError {
  readonly path: string;
  readonly errors: readonly ValidationError[];

  constructor(path: string, errors: readonly ValidationError[]) {
    super(
      'INVALID_CONFIG_FILE',
      [`Invalid config file '${path}':`, ...errors.map(error => `  ${error.field}: ${error.message}`)].join('\n')
    );
    this.path = path;
    this.errors = errors;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function isMissingPathError(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}
