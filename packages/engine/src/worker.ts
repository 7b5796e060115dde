/**
 * Worker contract
 *
 * A worker is the pluggable business logic Starfleet fans out. The engine
 * only ever talks to this interface; concrete workers are looked up by name
 * in the WorkerRegistry.
 */

import {
  FatalWorkerError,
  TimeoutError,
  errorMessage,
  isPlainObject,
  type ExecutionResult,
  type InvocationPayload,
  type Logger,
} from '@starfleet/common';

export interface ExecutionContext {
  /** Aborted when the target times out; long-running workers should honor it */
  signal: AbortSignal;
  log: Logger;
}

export interface StarfleetWorker {
  readonly name: string;
  readonly description?: string;
  /** Must be safe to call concurrently for different payloads */
  execute(payload: InvocationPayload, context: ExecutionContext): Promise<ExecutionResult>;
}

export const TIMEOUT_CAUSE = 'Timeout';

export function succeeded(detail?: string): ExecutionResult {
  return detail === undefined ? { kind: 'success' } : { kind: 'success', detail };
}

export function retryableFailure(cause: string): ExecutionResult {
  return { kind: 'retryable', cause };
}

export function fatalFailure(cause: string): ExecutionResult {
  return { kind: 'fatal', cause };
}

export function isExecutionResult(value: unknown): value is ExecutionResult {
  if (!isPlainObject(value)) return false;
  switch (value.kind) {
    case 'success':
      return value.detail === undefined || typeof value.detail === 'string';
    case 'retryable':
    case 'fatal':
      return typeof value.cause === 'string';
    default:
      return false;
  }
}

/**
 * Map anything a worker threw into a result: FatalWorkerError is terminal,
 * everything else may be retried. A TimeoutError reports the same cause as a
 * dispatcher timeout.
 */
export function resultFromError(error: unknown): ExecutionResult {
  if (error instanceof FatalWorkerError) {
    return fatalFailure(error.message);
  }
  if (error instanceof TimeoutError) {
    return retryableFailure(TIMEOUT_CAUSE);
  }
  return retryableFailure(errorMessage(error));
}

/**
 * Invoke a worker and always come back with a valid ExecutionResult
 */
export async function runWorker(
  worker: StarfleetWorker,
  payload: InvocationPayload,
  context: ExecutionContext
): Promise<ExecutionResult> {
  try {
    const result: unknown = await worker.execute(payload, context);
    if (!isExecutionResult(result)) {
      return fatalFailure(`Worker '${worker.name}' returned an invalid execution result`);
    }
    return result;
  } catch (error) {
    return resultFromError(error);
  }
}
