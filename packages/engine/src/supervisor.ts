/**
 * Execution Supervisor
 *
 * Owns every target's lifecycle and is the only place outcomes are created
 * and retries decided. The lifecycle is a pure transition function:
 *
 *   pending -> running -> succeeded | failed-fatal | retry-pending
 *   retry-pending -> running                 (attempt + 1, after backoff)
 *   running -> failed-retryable-exhausted    (attempts == maxAttempts)
 *   pending | retry-pending -> skipped       (cancel)
 *
 * ExecutionSupervisor drives it from a single event queue fed by dispatcher
 * completions, retry timers and the cancellation signal.
 */

import { EventEmitter } from 'node:events';
import {
  MAX_TIMER_MS,
  StarfleetError,
  createLogger,
  type ExecutionResult,
  type InvocationPayload,
  type Logger,
  type RetryPolicy,
  type Target,
  type TargetOutcome,
  type TargetRef,
  type TargetStatus,
  type WorkerDefinition,
} from '@starfleet/common';
import { AsyncQueue } from './async-queue.js';
import type { Dispatcher, DispatchResult } from './dispatcher.js';
import { targetKey, toTargetRef } from './targeting.js';

// ============================================================================
// TYPES
// ============================================================================

export type TargetPhase = 'pending' | 'running' | 'retry-pending' | TargetStatus;

export interface TargetState {
  readonly target: TargetRef;
  readonly phase: TargetPhase;
  readonly attempts: number;
  readonly lastError?: string;
  readonly detail?: string;
  /** Cancel arrived while an attempt was running */
  readonly cancelRequested?: boolean;
}

export type SupervisorEvent =
  | { type: 'start' }
  | { type: 'result'; result: ExecutionResult }
  | { type: 'retry-due' }
  | { type: 'cancel' };

export type SupervisorEffect =
  | { type: 'dispatch'; attempt: number }
  | { type: 'schedule-retry'; attempt: number; delayMs: number; cause: string }
  | { type: 'complete'; outcome: TargetOutcome };

export interface Transition {
  state: TargetState;
  effect: SupervisorEffect | null;
}

export type RandomSource = () => number;

export const CANCELLED_CAUSE = 'Cancelled';

// ============================================================================
// TRANSITIONS
// ============================================================================

const TERMINAL: ReadonlySet<TargetPhase> = new Set<TargetPhase>([
  'succeeded',
  'failed-fatal',
  'failed-retryable-exhausted',
  'skipped',
]);

export function isTerminal(phase: TargetPhase): phase is TargetStatus {
  return TERMINAL.has(phase);
}

export function initialState(target: TargetRef): TargetState {
  return { target, phase: 'pending', attempts: 0 };
}

/**
 * Delay before attempt `attempt + 1`, given that `attempt` just failed
 */
export function computeBackoff(attempt: number, policy: RetryPolicy, random: RandomSource = Math.random): number {
  const raw =
    policy.backoff === 'exponential'
      ? policy.baseDelayMs * 2 ** Math.max(0, attempt - 1)
      : policy.baseDelayMs;
  const capped = Math.min(raw, policy.maxDelayMs, MAX_TIMER_MS);
  return policy.jitter === 'full' ? Math.floor(random() * capped) : capped;
}

function toOutcome(state: TargetState, status: TargetStatus): TargetOutcome {
  return Object.freeze({
    target: state.target,
    status,
    attempts: state.attempts,
    ...(state.lastError !== undefined ? { lastError: state.lastError } : {}),
    ...(state.detail !== undefined ? { detail: state.detail } : {}),
  });
}

function finish(
  state: TargetState,
  status: TargetStatus,
  fields: { lastError?: string; detail?: string } = {}
): Transition {
  const next: TargetState = {
    target: state.target,
    phase: status,
    attempts: state.attempts,
    ...(fields.lastError !== undefined ? { lastError: fields.lastError } : {}),
    ...(fields.detail !== undefined ? { detail: fields.detail } : {}),
  };
  return { state: next, effect: { type: 'complete', outcome: toOutcome(next, status) } };
}

function illegal(state: TargetState, event: SupervisorEvent): never {
  throw new StarfleetError(
    `Illegal transition: '${event.type}' in state '${state.phase}' for ${targetKey(state.target)}`,
    'ILLEGAL_TRANSITION',
    { phase: state.phase, event: event.type }
  );
}

function onResult(state: TargetState, result: ExecutionResult, policy: RetryPolicy, random: RandomSource): Transition {
  switch (result.kind) {
    case 'success':
      return finish(state, 'succeeded', { detail: result.detail });
    case 'fatal':
      return finish(state, 'failed-fatal', { lastError: result.cause });
    case 'retryable':
      if (state.cancelRequested) {
        return finish(state, 'skipped', { lastError: result.cause });
      }
      if (state.attempts >= policy.maxAttempts) {
        return finish(state, 'failed-retryable-exhausted', { lastError: result.cause });
      }
      return {
        state: { target: state.target, phase: 'retry-pending', attempts: state.attempts, lastError: result.cause },
        effect: {
          type: 'schedule-retry',
          attempt: state.attempts + 1,
          delayMs: computeBackoff(state.attempts, policy, random),
          cause: result.cause,
        },
      };
  }
}

/**
 * Pure lifecycle step. Throws ILLEGAL_TRANSITION for events that cannot
 * occur in the current phase; cancel on a terminal target is a no-op.
 */
export function transition(
  state: TargetState,
  event: SupervisorEvent,
  policy: RetryPolicy,
  random: RandomSource = Math.random
): Transition {
  if (event.type === 'cancel') {
    if (isTerminal(state.phase)) return { state, effect: null };
    if (state.phase === 'running') {
      return { state: { ...state, cancelRequested: true }, effect: null };
    }
    return finish(state, 'skipped', { lastError: CANCELLED_CAUSE });
  }

  switch (state.phase) {
    case 'pending':
      if (event.type !== 'start') return illegal(state, event);
      return {
        state: { target: state.target, phase: 'running', attempts: 1 },
        effect: { type: 'dispatch', attempt: 1 },
      };
    case 'running':
      if (event.type !== 'result') return illegal(state, event);
      return onResult(state, event.result, policy, random);
    case 'retry-pending':
      if (event.type !== 'retry-due') return illegal(state, event);
      return {
        state: { ...state, phase: 'running', attempts: state.attempts + 1 },
        effect: { type: 'dispatch', attempt: state.attempts + 1 },
      };
    default:
      return illegal(state, event);
  }
}

// ============================================================================
// DRIVER
// ============================================================================

type LoopEvent =
  | { type: 'completed'; dispatch: DispatchResult }
  | { type: 'retry-due'; key: string }
  | { type: 'cancel' }
  | { type: 'drained' };

export interface TargetRetryEvent {
  target: TargetRef;
  attempt: number;
  delayMs: number;
  cause: string;
}

export interface SupervisorOptions {
  signal?: AbortSignal;
  random?: RandomSource;
  log?: Logger;
}

export type PayloadFactory = (target: Target, attempt: number) => InvocationPayload;

/**
 * Emits `retry` (TargetRetryEvent) and `outcome` (TargetOutcome)
 */
export class ExecutionSupervisor extends EventEmitter {
  private readonly policy: RetryPolicy;
  private readonly random: RandomSource;
  private readonly log: Logger;
  private readonly signal?: AbortSignal;

  constructor(
    definition: WorkerDefinition,
    private readonly dispatcher: Dispatcher,
    private readonly payloadFor: PayloadFactory,
    options: SupervisorOptions = {}
  ) {
    super();
    this.policy = definition.retry;
    this.random = options.random ?? Math.random;
    this.log = options.log ?? createLogger('Supervisor', { worker: definition.name });
    this.signal = options.signal;
  }

  /**
   * Drive every target to a terminal state. Outcomes come back in target order.
   */
  async supervise(targets: readonly Target[]): Promise<TargetOutcome[]> {
    const byKey = new Map<string, Target>();
    const states = new Map<string, TargetState>();
    for (const target of targets) {
      const key = targetKey(target);
      if (byKey.has(key)) {
        throw new StarfleetError(`Duplicate target ${key}`, 'DUPLICATE_TARGET', { target: key });
      }
      byKey.set(key, target);
      states.set(key, initialState(toTargetRef(target)));
    }

    const events = new AsyncQueue<LoopEvent>();
    const timers = new Map<string, NodeJS.Timeout>();
    let remaining = targets.length;

    const complete = (outcome: TargetOutcome): void => {
      remaining--;
      this.emit('outcome', outcome);
      if (remaining === 0) {
        this.dispatcher.close();
      }
    };

    // An attempt that was never started does not count
    const abandon = (key: string, state: TargetState): void => {
      const done = finish({ ...state, attempts: Math.max(0, state.attempts - 1) }, 'skipped', {
        lastError: CANCELLED_CAUSE,
      });
      states.set(key, done.state);
      if (done.effect?.type === 'complete') complete(done.effect.outcome);
    };

    const apply = (key: string, event: SupervisorEvent): void => {
      const current = states.get(key);
      const target = byKey.get(key);
      if (!current || !target) return;

      const { state, effect } = transition(current, event, this.policy, this.random);
      states.set(key, state);
      if (!effect) return;

      switch (effect.type) {
        case 'dispatch':
          if (!this.dispatcher.submit(this.payloadFor(target, effect.attempt))) {
            abandon(key, state);
          }
          break;
        case 'schedule-retry': {
          const retry: TargetRetryEvent = {
            target: state.target,
            attempt: effect.attempt,
            delayMs: effect.delayMs,
            cause: effect.cause,
          };
          this.log.debug(`Retrying ${key} in ${effect.delayMs}ms`, { attempt: effect.attempt, cause: effect.cause });
          this.emit('retry', retry);
          timers.set(
            key,
            setTimeout(() => {
              timers.delete(key);
              events.push({ type: 'retry-due', key });
            }, effect.delayMs)
          );
          break;
        }
        case 'complete':
          complete(effect.outcome);
          break;
      }
    };

    const cancelAll = (): void => {
      for (const timer of timers.values()) clearTimeout(timer);
      timers.clear();
      for (const key of states.keys()) {
        apply(key, { type: 'cancel' });
      }
    };

    const onAbort = (): void => {
      events.push({ type: 'cancel' });
    };
    if (this.signal?.aborted) {
      onAbort();
    } else {
      this.signal?.addEventListener('abort', onAbort, { once: true });
    }

    const forwarding = this.forward(events);

    if (remaining === 0) {
      this.dispatcher.close();
    }
    for (const key of byKey.keys()) {
      if (this.signal?.aborted) break;
      apply(key, { type: 'start' });
    }

    try {
      for await (const event of events) {
        if (event.type === 'completed') {
          const { payload, result } = event.dispatch;
          apply(targetKey({ accountId: payload.account.id, accountName: payload.account.name, region: payload.region }), {
            type: 'result',
            result,
          });
        } else if (event.type === 'retry-due') {
          apply(event.key, { type: 'retry-due' });
        } else if (event.type === 'cancel') {
          this.log.info('Run cancelled; no further payloads will be submitted');
          cancelAll();
        } else {
          break;
        }
      }

      // Results have ended, so anything still running was dropped before it started
      for (const [key, state] of states) {
        if (!isTerminal(state.phase)) {
          abandon(key, state);
        }
      }
    } finally {
      for (const timer of timers.values()) clearTimeout(timer);
      timers.clear();
      this.signal?.removeEventListener('abort', onAbort);
      this.dispatcher.close();
      events.end();
      await forwarding;
    }

    if (this.dispatcher.droppedCount > 0) {
      this.log.warn(`${this.dispatcher.droppedCount} payloads were dropped by cancellation`);
    }

    return Array.from(byKey.keys()).map(key => {
      const state = states.get(key);
      if (!state || !isTerminal(state.phase)) {
        throw new StarfleetError(`No terminal outcome for ${key}`, 'MISSING_OUTCOME', { target: key });
      }
      return toOutcome(state, state.phase);
    });
  }

  private async forward(events: AsyncQueue<LoopEvent>): Promise<void> {
    for await (const dispatch of this.dispatcher.results()) {
      events.push({ type: 'completed', dispatch });
    }
    events.push({ type: 'drained' });
  }
}
