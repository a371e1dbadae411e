export {
  IntegrationError,
  InvalidSourceError,
  InvalidDestinationError,
  CollectionNotLoadedError,
  RemoteListingError,
  PermissionError,
  RetriesExhaustedError,
  RemoteAPIError,
  ExportTriggerError,
  ExportPollError,
  ExportTimeoutError,
  ExportFailedError,
  ExportDownloadError,
  InvalidConfigError,
  InvalidSurveyIdError,
  InvalidCommunityError,
  InvalidQuestionUpdateError,
  isIntegrationError,
  isPermissionError,
  isRetriesExhaustedError,
  isRemoteAPIError,
  isInvalidDestinationError,
  isInvalidSourceError,
} from './errors';
export type { IntegrationErrorCode } from './errors';
