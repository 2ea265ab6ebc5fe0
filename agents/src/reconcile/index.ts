export { PatchBuilder } from './merge.js';
export {
  Reconciler,
  orderForApply,
  type ApplyOptions,
  type ApplySummary,
  type AssociationArgs,
  type AssociationOutcome,
  type UpsertOutcome,
} from './reconciler.js';
