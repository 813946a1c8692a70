import { z } from 'zod';

export const targetStatusEnum = z.enum(['PENDING', 'ACTIVE', 'BROKEN']);
export type TargetStatus = z.infer<typeof targetStatusEnum>;

export const workflowStageEnum = z.enum([
  'QUEUED',
  'SEARCHING',
  'ANALYZING',
  'VALIDATING',
  'GENERATING',
  'STORING',
  'COMPLETE',
]);
export type WorkflowStage = z.infer<typeof workflowStageEnum>;

export const workflowStatusEnum = z.enum(['running', 'success', 'error']);
export type WorkflowStatus = z.infer<typeof workflowStatusEnum>;

export const failureKindEnum = z.enum([
  'NavigationExhausted',
  'SynthesisRejected',
  'ExtractionFailure',
  'RuntimeFailure',
  'PersistenceConflict',
  'OracleUnavailable',
  'WorkflowTimeout',
]);
export type FailureKind = z.infer<typeof failureKindEnum>;

export const terminationReasonEnum = z.enum([
  'NO_NEXT_CONTROL',
  'NEXT_CONTROL_DISABLED',
  'EMPTY_PAGE',
  'DUPLICATE_RATIO',
  'PAGE_LIMIT',
  'TIME_BUDGET',
  'PAGE_TIMEOUT',
]);
export type TerminationReason = z.infer<typeof terminationReasonEnum>;

export const terminationCategoryEnum = z.enum([
  'NO_MORE_JOBS',
  'SELECTOR_DRIFT',
  'BUDGET',
  'TIMEOUT',
]);
export type TerminationCategory = z.infer<typeof terminationCategoryEnum>;
