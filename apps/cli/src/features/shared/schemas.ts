import { isIsoDate } from '@fxlake/core';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const DateOptionSchema = z.object({
  date: z
    .string()
    .refine(isIsoDate, { message: '--date must be a calendar date in YYYY-MM-DD form' })
    .optional(),
});

export const CurrencyOptionSchema = z.object({
  currency: z
    .string()
    .regex(/^[A-Za-z]{3}$/, { message: '--currency must be a 3-letter currency code (e.g. USD)' })
    .transform((code) => code.toUpperCase())
    .default('USD'),
});

export const DaysBackOptionSchema = z.object({
  daysBack: z.coerce
    .number({ invalid_type_error: '--days-back must be a number' })
    .int({ message: '--days-back must be a whole number of days' })
    .positive({ message: '--days-back must be at least 1' })
    .default(7),
});

export const PIPELINE_STAGES = ['ingest', 'validate', 'aggregate'] as const;

export const StageOptionSchema = z.object({
  stage: z
    .enum(['all', 'ingest', 'validate', 'aggregate'], {
      errorMap: () => ({ message: '--stage must be one of: all, ingest, validate, aggregate' }),
    })
    .default('all'),
});

/**
 * ingest command options
 */
export const IngestCommandOptionsSchema = CurrencyOptionSchema.extend(JsonFlagSchema.shape);

/**
 * validate command options
 */
export const ValidateCommandOptionsSchema = DateOptionSchema.extend(JsonFlagSchema.shape);

/**
 * aggregate command options
 */
export const AggregateCommandOptionsSchema = DateOptionSchema.extend(DaysBackOptionSchema.shape).extend(
  JsonFlagSchema.shape
);

/**
 * run command options (combines every stage's options)
 */
export const RunCommandOptionsSchema = StageOptionSchema.extend(DateOptionSchema.shape)
  .extend(CurrencyOptionSchema.shape)
  .extend(DaysBackOptionSchema.shape)
  .extend(JsonFlagSchema.shape);

export type IngestCommandOptions = z.infer<typeof IngestCommandOptionsSchema>;
export type ValidateCommandOptions = z.infer<typeof ValidateCommandOptionsSchema>;
export type AggregateCommandOptions = z.infer<typeof AggregateCommandOptionsSchema>;
export type RunCommandOptions = z.infer<typeof RunCommandOptionsSchema>;
export type PipelineStage = (typeof PIPELINE_STAGES)[number];
