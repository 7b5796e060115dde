/**
 * Core type definitions shared across all packages
 */

// ============================================================================
// JSON Types
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
  | JsonPrimitive
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

// ============================================================================
// Account Types
// ============================================================================

export interface OrgUnit {
  id: string;
  name: string;
}

export interface Account {
  readonly id: string;
  readonly name: string;
  /** Tag name -> values. Matching is case-insensitive on both sides. */
  readonly tags: Readonly<Record<string, readonly string[]>>;
  /** Organizational-unit path, root first */
  readonly orgUnits: readonly OrgUnit[];
  readonly accountType: string;
  /** Regions the account is active in */
  readonly regions: readonly string[];
  readonly arn?: string;
}

export type AccountPredicate = (account: Account) => boolean;

// ============================================================================
// Targeting Types
// ============================================================================

/** Region marker that expands to every region an account participates in */
export const ALL_REGIONS = 'ALL';

export interface TagFilter {
  name: string;
  value: string;
}

export interface AccountFilter {
  allAccounts?: boolean;
  byIds?: string[];
  byNames?: string[];
  byTags?: TagFilter[];
  byOrgUnits?: string[];
  byAccountTypes?: string[];
}

export interface TargetingRule {
  include: AccountFilter;
  exclude?: AccountFilter;
  includeRegions: string[];
  excludeRegions?: string[];
  operateInOrgRoot?: boolean;
}

export interface Target {
  readonly account: Account;
  readonly region: string;
}

/** Serializable identity of a target */
export interface TargetRef {
  readonly accountId: string;
  readonly accountName: string;
  readonly region: string;
}

// ============================================================================
// Worker Types
// ============================================================================

export type InvocationMode = 'synchronous' | 'queued';

export type BackoffShape = 'exponential' | 'fixed';

export type JitterMode = 'full' | 'none';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoff: BackoffShape;
  jitter: JitterMode;
}

export interface WorkerDefinition {
  name: string;
  description?: string;
  targeting: TargetingRule;
  /** Opaque to the engine; snapshotted into every payload */
  configuration: unknown;
  invocationMode: InvocationMode;
  concurrency: number;
  retry: RetryPolicy;
  timeoutMs: number;
}

export interface InvocationPayload {
  readonly payloadId: string;
  readonly runId: string;
  readonly worker: string;
  readonly account: { readonly id: string; readonly name: string };
  readonly region: string;
  readonly configuration: JsonValue;
  readonly attempt: number;
}

export type ExecutionResult =
  | { kind: 'success'; detail?: string }
  | { kind: 'retryable'; cause: string }
  | { kind: 'fatal'; cause: string };

// ============================================================================
// Outcome Types
// ============================================================================

export type TargetStatus =
  | 'succeeded'
  | 'failed-retryable-exhausted'
  | 'failed-fatal'
  | 'skipped';

export interface TargetOutcome {
  readonly target: TargetRef;
  readonly status: TargetStatus;
  readonly attempts: number;
  readonly lastError?: string;
  readonly detail?: string;
}

export type RunStatus = 'success' | 'partial-failure' | 'failure';

export interface RunReport {
  status: RunStatus;
  totalTargets: number;
  succeeded: number;
  failed: number;
  skipped: number;
  failures: TargetOutcome[];
}

export interface RunRecord {
  runId: string;
  worker: string;
  startedAt: number;
  finishedAt: number;
  cancelled: boolean;
  dryRun: boolean;
  report: RunReport;
  outcomes: TargetOutcome[];
}
