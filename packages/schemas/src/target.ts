import { z } from 'zod';
import { targetStatusEnum } from './enums';
import { scrapingConfigurationSchema } from './configuration';

export const targetSchema = z.object({
  id: z.string(),
  name: z.string().min(1),
  boardUrl: z.string().url().nullable(),
  configuration: scrapingConfigurationSchema.nullable(),
  status: targetStatusEnum,
  lastRunAt: z.coerce.date().nullable(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type Target = z.infer<typeof targetSchema>;

export const upsertTargetInputSchema = z.object({
  name: z.string().trim().min(1),
  boardUrl: z.string().url(),
  configuration: scrapingConfigurationSchema,
});

export type UpsertTargetInput = z.infer<typeof upsertTargetInputSchema>;

export const runLogInputSchema = z.object({
  targetId: z.string(),
  jobsFound: z.number().int().nonnegative(),
  success: z.boolean(),
  errorMessage: z.string().optional(),
  attempts: z.number().int().positive().optional(),
});

export type RunLogInput = z.infer<typeof runLogInputSchema>;
