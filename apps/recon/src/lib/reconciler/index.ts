export { Reconciler } from './reconciler';
export type { AggregatedRow, ReconcileResult, ReconcilerOptions, UnmappedPolicy } from './reconciler';
