export type FamilyIntakeErrorCode =
  | 'extraction_failed'
  | 'store_unavailable'
  | 'not_found'
  | 'grouping_unknown_person'
  | 'config_invalid';

export class FamilyIntakeError extends Error {
  readonly code: FamilyIntakeErrorCode;

  constructor(code: FamilyIntakeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FamilyIntakeError';
    this.code = code;
  }
}

/** Extraction produced nothing usable; the run is never attempted. */
export class ExtractionError extends FamilyIntakeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('extraction_failed', message, options);
    this.name = 'ExtractionError';
  }
}

export class StoreUnavailableError extends FamilyIntakeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('store_unavailable', message, options);
    this.name = 'StoreUnavailableError';
  }
}

export class NotFoundError extends FamilyIntakeError {
  readonly id: string;

  constructor(id: string, message = `not_found:${id}`) {
    super('not_found', message);
    this.name = 'NotFoundError';
    this.id = id;
  }
}

/** A relationship names someone missing from the batch. Fatal to that batch only. */
export class GroupingError extends FamilyIntakeError {
  readonly unknownNames: string[];

  constructor(unknownNames: string[]) {
    super(
      'grouping_unknown_person',
      `relationship references unknown person(s): ${unknownNames.join(', ')}`,
    );
    this.name = 'GroupingError';
    this.unknownNames = unknownNames;
  }
}

export class ConfigError extends FamilyIntakeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('config_invalid', `invalid pipeline config: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function errorCode(error: unknown, fallback = 'unexpected_error'): string {
  if (error instanceof FamilyIntakeError) return error.code;
  return fallback;
}

export function formatSchemaIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>,
): string[] {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
