/**
 * Error types for the compliance engine
 */

export class ComplianceError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ComplianceError';
  }
}

export class InvalidAnalysisRequestError extends ComplianceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, details);
    this.name = 'InvalidAnalysisRequestError';
  }
}

export class RegulationNotFoundError extends ComplianceError {
  constructor(public regulationId: string) {
    super('NOT_FOUND', `Regulation ${regulationId} not found`, 404, { regulationId });
    this.name = 'RegulationNotFoundError';
  }
}

export class ComplianceConfigError extends ComplianceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_ERROR', message, 500, details);
    this.name = 'ComplianceConfigError';
  }
}

export type TextGenerationFailureKind = 'unavailable' | 'timeout' | 'malformed';

export class TextGenerationError extends ComplianceError {
  constructor(public kind: TextGenerationFailureKind, message: string) {
    super('EXTERNAL_SERVICE_ERROR', `Text generation ${kind}: ${message}`, 502, { kind });
    this.name = 'TextGenerationError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
