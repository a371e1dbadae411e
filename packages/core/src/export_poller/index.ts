export { ExportPoller } from './export_poller';
export type { ExportFile, ExportJob, ExportPollerDependencies, ExportStatus } from './export_poller.types';
