/**
 * Semantic error codes shared by every integration error.
 * They abstract over HTTP status codes so callers can branch without
 * re-deriving transport details.
 */
export type IntegrationErrorCode =
  | 'INVALID_SOURCE'
  | 'INVALID_DESTINATION'
  | 'COLLECTION_NOT_LOADED'
  | 'REMOTE_LISTING_FAILED'
  | 'PERMISSION_DENIED'
  | 'RETRIES_EXHAUSTED'
  | 'REMOTE_API_ERROR'
  | 'EXPORT_TRIGGER_FAILED'
  | 'EXPORT_POLL_FAILED'
  | 'EXPORT_TIMEOUT'
  | 'EXPORT_FAILED'
  | 'EXPORT_DOWNLOAD_FAILED'
  | 'INVALID_CONFIG'
  | 'INVALID_SURVEY_ID'
  | 'INVALID_COMMUNITY'
  | 'INVALID_QUESTION_UPDATE';

/**
 * Base error class for all listbridge errors
 */
export class IntegrationError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: IntegrationErrorCode,
    /** HTTP status code (if applicable) */
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'IntegrationError';
    Object.setPrototypeOf(this, IntegrationError.prototype);
  }
}

/**
 * Thrown when a membership source is neither an identifier list nor a
 * membership collection, or when a raw list carries non-string entries.
 */
export class InvalidSourceError extends IntegrationError {
  constructor(reason: string) {
    super(`Invalid membership source: ${reason}`, 'INVALID_SOURCE');
    this.name = 'InvalidSourceError';
    Object.setPrototypeOf(this, InvalidSourceError.prototype);
  }
}

/**
 * Thrown when a destination reference cannot be resolved: unknown service,
 * unknown list name, or an object that is not a destination.
 */
export class InvalidDestinationError extends IntegrationError {
  constructor(
    reason: string,
    public readonly service?: string,
    public readonly listName?: string,
  ) {
    super(`Invalid destination: ${reason}`, 'INVALID_DESTINATION');
    this.name = 'InvalidDestinationError';
    Object.setPrototypeOf(this, InvalidDestinationError.prototype);
  }
}

/**
 * Thrown when a destination's membership is read before the first refresh.
 */
export class CollectionNotLoadedError extends IntegrationError {
  constructor(public readonly destination: string) {
    super(`Membership of ${destination} has not been fetched yet; call refresh() first`, 'COLLECTION_NOT_LOADED');
    this.name = 'CollectionNotLoadedError';
    Object.setPrototypeOf(this, CollectionNotLoadedError.prototype);
  }
}

/**
 * Thrown when any page of a paginated listing fails. No partial data is
 * returned alongside it.
 */
export class RemoteListingError extends IntegrationError {
  constructor(
    message: string,
    public readonly url: string,
    statusCode?: number,
  ) {
    super(message, 'REMOTE_LISTING_FAILED', statusCode);
    this.name = 'RemoteListingError';
    Object.setPrototypeOf(this, RemoteListingError.prototype);
  }
}

/**
 * Thrown on 401/403. Aborts the whole batch.
 */
export class PermissionError extends IntegrationError {
  constructor(context: string, statusCode: number) {
    super(`Permission denied (${statusCode}): ${context}`, 'PERMISSION_DENIED', statusCode);
    this.name = 'PermissionError';
    Object.setPrototypeOf(this, PermissionError.prototype);
  }
}

/**
 * Thrown when transient failures persist past the retry ceiling.
 */
export class RetriesExhaustedError extends IntegrationError {
  constructor(
    context: string,
    public readonly attempts: number,
    lastStatus?: number,
  ) {
    super(
      `Gave up after ${attempts} attempt(s): ${context}` +
      (lastStatus !== undefined ? ` (last status ${lastStatus})` : ''),
      'RETRIES_EXHAUSTED',
      lastStatus,
    );
    this.name = 'RetriesExhaustedError';
    Object.setPrototypeOf(this, RetriesExhaustedError.prototype);
  }
}

/**
 * Thrown for any non-success status that has no more specific meaning.
 */
export class RemoteAPIError extends IntegrationError {
  constructor(context: string, statusCode: number) {
    super(`Unexpected response (${statusCode}): ${context}`, 'REMOTE_API_ERROR', statusCode);
    this.name = 'RemoteAPIError';
    Object.setPrototypeOf(this, RemoteAPIError.prototype);
  }
}

export class ExportTriggerError extends IntegrationError {
  constructor(reason: string, statusCode?: number) {
    super(`Export could not be started: ${reason}`, 'EXPORT_TRIGGER_FAILED', statusCode);
    this.name = 'ExportTriggerError';
    Object.setPrototypeOf(this, ExportTriggerError.prototype);
  }
}

/**
 * Thrown when a status check cannot reach the remote service.
 */
export class ExportPollError extends IntegrationError {
  constructor(
    public readonly progressId: string,
    reason: string,
  ) {
    super(`Export ${progressId} status could not be read: ${reason}`, 'EXPORT_POLL_FAILED');
    this.name = 'ExportPollError';
    Object.setPrototypeOf(this, ExportPollError.prototype);
  }
}

export class ExportTimeoutError extends IntegrationError {
  constructor(
    public readonly progressId: string,
    public readonly attempts: number,
  ) {
    super(
      `Export ${progressId} was not complete after ${attempts} status check(s)`,
      'EXPORT_TIMEOUT',
    );
    this.name = 'ExportTimeoutError';
    Object.setPrototypeOf(this, ExportTimeoutError.prototype);
  }
}

/**
 * Thrown when the remote service reports the export job as failed.
 */
export class ExportFailedError extends IntegrationError {
  constructor(public readonly progressId: string) {
    super(`Export ${progressId} failed on the remote service`, 'EXPORT_FAILED');
    this.name = 'ExportFailedError';
    Object.setPrototypeOf(this, ExportFailedError.prototype);
  }
}

export class ExportDownloadError extends IntegrationError {
  constructor(reason: string, statusCode?: number) {
    super(`Export file could not be downloaded: ${reason}`, 'EXPORT_DOWNLOAD_FAILED', statusCode);
    this.name = 'ExportDownloadError';
    Object.setPrototypeOf(this, ExportDownloadError.prototype);
  }
}

export class InvalidConfigError extends IntegrationError {
  constructor(
    public readonly source: string,
    public readonly violations: string[],
  ) {
    super(`Invalid configuration in ${source}: ${violations.join('; ')}`, 'INVALID_CONFIG');
    this.name = 'InvalidConfigError';
    Object.setPrototypeOf(this, InvalidConfigError.prototype);
  }
}

export class InvalidSurveyIdError extends IntegrationError {
  constructor(public readonly surveyId: string) {
    super(`Invalid survey ID: "${surveyId}"`, 'INVALID_SURVEY_ID');
    this.name = 'InvalidSurveyIdError';
    Object.setPrototypeOf(this, InvalidSurveyIdError.prototype);
  }
}

export class InvalidCommunityError extends IntegrationError {
  constructor(
    public readonly community: string,
    public readonly allowed: readonly string[],
  ) {
    super(`Invalid community "${community}"; expected one of: ${allowed.join(', ')}`, 'INVALID_COMMUNITY');
    this.name = 'InvalidCommunityError';
    Object.setPrototypeOf(this, InvalidCommunityError.prototype);
  }
}

/**
 * Thrown when a question update names fields the current definition lacks.
 */
export class InvalidQuestionUpdateError extends IntegrationError {
  constructor(
    public readonly questionId: string,
    public readonly unknownFields: string[],
  ) {
    super(
      `Question ${questionId} has no field(s) ${unknownFields.join(', ')} for its type`,
      'INVALID_QUESTION_UPDATE',
    );
    this.name = 'InvalidQuestionUpdateError';
    Object.setPrototypeOf(this, InvalidQuestionUpdateError.prototype);
  }
}

// ==================== Type guards ====================

export function isIntegrationError(error: unknown): error is IntegrationError {
  return error instanceof IntegrationError;
}

export function isPermissionError(error: unknown): error is PermissionError {
  return error instanceof PermissionError;
}

export function isRetriesExhaustedError(error: unknown): error is RetriesExhaustedError {
  return error instanceof RetriesExhaustedError;
}

export function isRemoteAPIError(error: unknown): error is RemoteAPIError {
  return error instanceof RemoteAPIError;
}

export function isInvalidDestinationError(error: unknown): error is InvalidDestinationError {
  return error instanceof InvalidDestinationError;
}

export function isInvalidSourceError(error: unknown): error is InvalidSourceError {
  return error instanceof InvalidSourceError;
}
