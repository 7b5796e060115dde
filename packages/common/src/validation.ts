/**
 * Zod validation schemas for configuration input
 */

import { z } from 'zod';
import { ALL_REGIONS } from './types.js';

// ============================================================================
// Targeting Schemas
// ============================================================================

export const accountIdSchema = z.string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9_-]+$/, 'Account ID must contain only alphanumeric, underscore, or hyphen');

export const regionSchema = z.string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9-]+$/, 'Region must contain only alphanumeric or hyphen');

export const workerNameSchema = z.string()
  .min(1)
  .max(64)
  .regex(/^[a-zA-Z][a-zA-Z0-9_-]*$/, 'Worker name must start with a letter and contain only alphanumeric, underscore, or hyphen');

export const tagFilterSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
}).strict();

export const accountFilterSchema = z.object({
  allAccounts: z.boolean().optional(),
  byIds: z.array(accountIdSchema).optional(),
  byNames: z.array(z.string().min(1)).optional(),
  byTags: z.array(tagFilterSchema).optional(),
  byOrgUnits: z.array(z.string().min(1)).optional(),
  byAccountTypes: z.array(z.string().min(1)).optional(),
}).strict();

export const excludeFilterSchema = accountFilterSchema.omit({ allAccounts: true });

function selectsSomething(filter: z.infer<typeof accountFilterSchema>): boolean {
  return Boolean(
    filter.allAccounts ||
    filter.byIds?.length ||
    filter.byNames?.length ||
    filter.byTags?.length ||
    filter.byOrgUnits?.length ||
    filter.byAccountTypes?.length
  );
}

export const targetingRuleSchema = z.object({
  include: accountFilterSchema,
  exclude: excludeFilterSchema.optional().default({}),
  includeRegions: z.array(regionSchema).min(1),
  excludeRegions: z.array(regionSchema).optional().default([]),
  operateInOrgRoot: z.boolean().optional().default(false),
}).strict().superRefine((rule, ctx) => {
  if (!selectsSomething(rule.include)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['include'],
      message: 'Include filter must select at least one account',
    });
  }
  if (rule.includeRegions.includes(ALL_REGIONS) && rule.includeRegions.length > 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['includeRegions'],
      message: `Can't specify any other regions when \`${ALL_REGIONS}\` is specified in the list`,
    });
  }
  if (rule.excludeRegions.includes(ALL_REGIONS)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['excludeRegions'],
      message: `\`${ALL_REGIONS}\` is not allowed in excludeRegions`,
    });
  }
});

// ============================================================================
// Worker Schemas
// ============================================================================

export const invocationModeSchema = z.enum(['synchronous', 'queued']);

/** Largest delay setTimeout honours; longer ones fire immediately */
export const MAX_TIMER_MS = 2_147_483_647;

const timerMsSchema = z.number().int().max(MAX_TIMER_MS);

export const retryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).max(20).optional().default(3),
  baseDelayMs: timerMsSchema.min(0).optional().default(1000),
  maxDelayMs: timerMsSchema.min(0).optional().default(30000),
  backoff: z.enum(['exponential', 'fixed']).optional().default('exponential'),
  jitter: z.enum(['full', 'none']).optional().default('full'),
}).strict();

export const retryOverrideSchema = z.object({
  maxAttempts: z.number().int().min(1).max(20),
  baseDelayMs: timerMsSchema.min(0),
  maxDelayMs: timerMsSchema.min(0),
  backoff: z.enum(['exponential', 'fixed']),
  jitter: z.enum(['full', 'none']),
}).partial().strict();

export const workerConfigSchema = z.object({
  description: z.string().max(500).optional(),
  enabled: z.boolean().optional().default(true),
  invocationMode: invocationModeSchema.optional(),
  concurrency: z.number().int().min(1).max(1000).optional(),
  timeoutMs: timerMsSchema.min(1).optional(),
  retry: retryOverrideSchema.optional(),
  targeting: targetingRuleSchema,
  configuration: z.unknown().optional(),
}).strict();

// ============================================================================
// Starfleet Configuration Schema
// ============================================================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const starfleetConfigSchema = z.object({
  logLevel: logLevelSchema.optional().default('info'),
  accountIndex: z.object({
    path: z.string().min(1),
  }).strict(),
  history: z.object({
    enabled: z.boolean().optional().default(true),
    path: z.string().min(1).optional().default('./.starfleet/history.db'),
  }).strict().optional().default({}),
  defaults: z.object({
    invocationMode: invocationModeSchema.optional().default('synchronous'),
    concurrency: z.number().int().min(1).max(1000).optional().default(10),
    timeoutMs: timerMsSchema.min(1).optional().default(60000),
    retry: retryPolicySchema.optional().default({}),
    queueConsumers: z.number().int().min(1).max(1000).optional().default(4),
  }).strict().optional().default({}),
  workers: z.record(workerNameSchema, workerConfigSchema).optional().default({}),
}).strict();

export type StarfleetConfig = z.infer<typeof starfleetConfigSchema>;
export type StarfleetConfigInput = z.input<typeof starfleetConfigSchema>;
export type WorkerConfig = z.infer<typeof workerConfigSchema>;

// ============================================================================
// Utility Functions
// ============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/**
 * Flatten zod issues into a single `path: message` list
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ');
}

export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}
