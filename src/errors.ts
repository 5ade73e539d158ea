export type ErrorCode = 'PARSING_ERROR' | 'CONFIGURATION_ERROR' | 'SCORING_ERROR';

export class ControlScoreError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Input is not JSON, or matches none of the known result layouts
export class ParsingError extends ControlScoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PARSING_ERROR', message, options);
  }
}

// A settings value or table entry is invalid
export class ConfigurationError extends ControlScoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION_ERROR', message, options);
  }
}

// Nothing left to score after parsing
export class ScoringError extends ControlScoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SCORING_ERROR', message, options);
  }
}

export function isControlScoreError(error: unknown): error is ControlScoreError {
  return error instanceof ControlScoreError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
