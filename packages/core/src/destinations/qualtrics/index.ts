export { MailingListDestination } from './mailing_list_destination';
export type { MailingListDestinationDependencies } from './mailing_list_destination';
export { QualtricsDirectory, qualtricsBaseUrl } from './qualtrics_directory';
export type { QualtricsDirectoryDependencies } from './qualtrics_directory';
