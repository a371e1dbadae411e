export { diff, planCopy, planRemoval } from './reconciler';
export type { DiffResult } from './reconciler';
