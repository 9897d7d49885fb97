export class AnalysisServiceError extends Error {
  constructor(message: string, public code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AnalysisServiceError";
  }
}

export class ValidationError extends AnalysisServiceError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class PayloadTooLargeError extends AnalysisServiceError {
  constructor(message: string) {
    super(message, "PAYLOAD_TOO_LARGE");
    this.name = "PayloadTooLargeError";
  }
}

export class RateLimitError extends AnalysisServiceError {
  constructor(message: string, public retryAfterMs: number) {
    super(message, "RATE_LIMITED");
    this.name = "RateLimitError";
  }
}

export class NotFoundError extends AnalysisServiceError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class ConflictError extends AnalysisServiceError {
  constructor(message: string) {
    super(message, "CONFLICT");
    this.name = "ConflictError";
  }
}

export class ConfigurationError extends AnalysisServiceError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

export class PersistenceError extends AnalysisServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PERSISTENCE_ERROR", options);
    this.name = "PersistenceError";
  }
}

/**
 * Raised at the task boundary once the failed attempt has been recorded.
 * `analysisId` is null when the failure row itself could not be written.
 */
export class AnalysisTaskError extends AnalysisServiceError {
  constructor(
    message: string,
    public analysisId: number | null,
    options?: ErrorOptions
  ) {
    super(message, "ANALYSIS_FAILED", options);
    this.name = "AnalysisTaskError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
