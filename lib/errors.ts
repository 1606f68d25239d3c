export type TutorErrorCode = 'NOT_FOUND' | 'INTEGRITY' | 'EXTRACTION' | 'GENERATION_PARSE';

export class TutorError extends Error {
  readonly code: TutorErrorCode;
  readonly status: number;

  constructor(code: TutorErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TutorError';
    this.code = code;
    this.status = status;
  }
}

export class NotFoundError extends TutorError {
  constructor(entity: string, id: number | string) {
    super('NOT_FOUND', 404, `${entity} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

// Write that references a missing parent, or breaks a uniqueness rule.
export class IntegrityError extends TutorError {
  constructor(message: string) {
    super('INTEGRITY', 409, message);
    this.name = 'IntegrityError';
  }
}

export class ExtractionError extends TutorError {
  constructor(message: string, cause?: unknown) {
    super('EXTRACTION', 422, message, { cause });
    this.name = 'ExtractionError';
  }
}

export class GenerationParseError extends TutorError {
  readonly raw: string;

  constructor(message: string, raw: string, cause?: unknown) {
    super('GENERATION_PARSE', 502, message, { cause });
    this.name = 'GenerationParseError';
    this.raw = raw;
  }
}

export function isTutorError(error: unknown): error is TutorError {
  return error instanceof TutorError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof TutorError && error.code === 'NOT_FOUND';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
