/**
 * Failures that stop a pipeline pass. Each carries the HTTP status it maps to
 * and a user-facing message; the error handler in app.ts turns them into
 * `{ error, code }` bodies.
 */
export class PipelineError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export type DecodeAttempt = { encoding: string; reason: string };

export class DecodeError extends PipelineError {
  readonly attempts: DecodeAttempt[];

  constructor(attempts: DecodeAttempt[]) {
    super('Could not parse the upload as CSV in any supported encoding.', 'DECODE_FAILED', 422);
    this.attempts = attempts;
  }
}

export class EmptyTableError extends PipelineError {
  constructor() {
    super('Could not read the file. Upload a valid CSV.', 'EMPTY_TABLE', 422);
  }
}

export class UnknownColumnError extends PipelineError {
  readonly column: string;

  constructor(column: string) {
    super(`Column '${column}' is not present in the uploaded file.`, 'UNKNOWN_COLUMN', 400);
    this.column = column;
  }
}

export class InvalidDateRangeInput extends PipelineError {
  constructor(detail?: string) {
    super(
      detail ? `Select a valid date range. ${detail}` : 'Select a valid date range.',
      'INVALID_DATE_RANGE',
      400
    );
  }
}

// Not fatal for the dashboard (it answers with status 'empty'); only an export has to halt on it.
export class EmptyFilterResultWarning extends PipelineError {
  constructor() {
    super('No records found for selected filters.', 'EMPTY_FILTER_RESULT', 422);
  }
}

export class MissingUploadError extends PipelineError {
  constructor() {
    super('No CSV file uploaded', 'MISSING_UPLOAD', 400);
  }
}
