export { collectPages, extractQualtricsPage } from './paginated_collector';
export type { CollectPagesOptions, Page, PageExtractor } from './paginated_collector.types';
