import { z } from 'zod';
import { failureKindEnum, workflowStageEnum, workflowStatusEnum } from './enums';

export const progressEventSchema = z.object({
  workflowId: z.string(),
  seq: z.number().int().nonnegative(),
  stage: workflowStageEnum,
  status: workflowStatusEnum,
  message: z.string(),
  /** base64 PNG capture of the page the event refers to */
  image: z.string().optional(),
  kind: failureKindEnum.optional(),
  data: z.record(z.unknown()).optional(),
  timestamp: z.string(),
});

export type ProgressEvent = z.infer<typeof progressEventSchema>;

/** Oracle credentials scoped to one workflow. Never stored. */
export const oracleCredentialsSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1).optional(),
});

export type OracleCredentials = z.infer<typeof oracleCredentialsSchema>;

export const createWorkflowInputSchema = z.object({
  targetName: z.string().trim().min(1).max(200),
  oracle: oracleCredentialsSchema.default({}),
});

export type CreateWorkflowInput = z.infer<typeof createWorkflowInputSchema>;

export const workflowSnapshotSchema = z.object({
  id: z.string(),
  targetName: z.string(),
  stage: workflowStageEnum,
  status: workflowStatusEnum,
  events: z.array(progressEventSchema),
  boardUrl: z.string().optional(),
  artifactPath: z.string().optional(),
  attempts: z.number().int().nonnegative(),
  jobsFound: z.number().int().nonnegative().optional(),
  failureKind: failureKindEnum.optional(),
  error: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
  finishedAt: z.string().optional(),
});

export type WorkflowSnapshot = z.infer<typeof workflowSnapshotSchema>;
