export { DuplicateResolver, findDuplicateRecords } from './duplicate_resolver';
export type { DuplicateResolution } from './duplicate_resolver';
