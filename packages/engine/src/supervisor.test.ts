/**
 * Execution Supervisor Tests
 *
 * The transition function is tested on its own; the driver is tested against
 * a real Dispatcher with scripted workers.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { AccountIndex } from '@starfleet/account-index';
import {
  MAX_TIMER_MS,
  createLogger,
  setLogHandler,
  sleep,
  type RetryPolicy,
  type Target,
  type TargetRef,
  type WorkerDefinition,
} from '@starfleet/common';
import { Dispatcher, LocalInvoker } from './dispatcher.js';
import { buildPayload } from './payload.js';
import {
  ExecutionSupervisor,
  computeBackoff,
  initialState,
  transition,
  type TargetRetryEvent,
  type TargetState,
} from './supervisor.js';
import { loadTestIndex, scriptedWorker, testDefinition, testTarget } from './test-helpers.js';
import { fatalFailure, retryableFailure, succeeded, type StarfleetWorker } from './worker.js';

const policy: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 1000,
  backoff: 'exponential',
  jitter: 'none',
};

const ref: TargetRef = { accountId: '111111111111', accountName: 'prod-a', region: 'us-east-1' };

function running(attempts: number, extra: Partial<TargetState> = {}): TargetState {
  return { target: ref, phase: 'running', attempts, ...extra };
}

describe('computeBackoff', () => {
  it('doubles per attempt up to the cap', () => {
    expect([1, 2, 3, 4, 5].map(attempt => computeBackoff(attempt, policy))).toEqual([100, 200, 400, 800, 1000]);
  });

  it('keeps a fixed delay', () => {
    expect(computeBackoff(4, { ...policy, backoff: 'fixed' })).toBe(100);
  });

  it('applies full jitter within the capped delay', () => {
    const jittered = { ...policy, jitter: 'full' as const };
    expect(computeBackoff(2, jittered, () => 0.5)).toBe(100);
    expect(computeBackoff(2, jittered, () => 0)).toBe(0);
    expect(computeBackoff(6, jittered, () => 0.999)).toBe(999);
  });

  it('never exceeds the timer limit', () => {
    expect(computeBackoff(40, { ...policy, maxDelayMs: 5_000_000_000 })).toBe(MAX_TIMER_MS);
  });
});

describe('transition', () => {
  it('starts the first attempt', () => {
    expect(transition(initialState(ref), { type: 'start' }, policy)).toEqual({
      state: { target: ref, phase: 'running', attempts: 1 },
      effect: { type: 'dispatch', attempt: 1 },
    });
  });

  it('completes on success', () => {
    const { state, effect } = transition(running(1), { type: 'result', result: succeeded('ok') }, policy);

    expect(state.phase).toBe('succeeded');
    expect(effect).toEqual({
      type: 'complete',
      outcome: { target: ref, status: 'succeeded', attempts: 1, detail: 'ok' },
    });
  });

  it('fails immediately on a fatal result', () => {
    const { effect } = transition(running(1), { type: 'result', result: fatalFailure('AccessDenied') }, policy);

    expect(effect).toEqual({
      type: 'complete',
      outcome: { target: ref, status: 'failed-fatal', attempts: 1, lastError: 'AccessDenied' },
    });
  });

  it('schedules a retry with backoff for a retryable result', () => {
    const { state, effect } = transition(running(2), { type: 'result', result: retryableFailure('Throttling') }, policy);

    expect(state).toEqual({ target: ref, phase: 'retry-pending', attempts: 2, lastError: 'Throttling' });
    expect(effect).toEqual({ type: 'schedule-retry', attempt: 3, delayMs: 200, cause: 'Throttling' });
  });

  it('runs the next attempt when the retry is due', () => {
    const pending: TargetState = { target: ref, phase: 'retry-pending', attempts: 2, lastError: 'Throttling' };

    expect(transition(pending, { type: 'retry-due' }, policy)).toEqual({
      state: { target: ref, phase: 'running', attempts: 3, lastError: 'Throttling' },
      effect: { type: 'dispatch', attempt: 3 },
    });
  });

  it('stops retrying once maxAttempts is reached', () => {
    const { effect } = transition(running(3), { type: 'result', result: retryableFailure('Timeout') }, policy);

    expect(effect).toEqual({
      type: 'complete',
      outcome: { target: ref, status: 'failed-retryable-exhausted', attempts: 3, lastError: 'Timeout' },
    });
  });

  it('skips pending and retry-pending targets on cancel', () => {
    expect(transition(initialState(ref), { type: 'cancel' }, policy).effect).toEqual({
      type: 'complete',
      outcome: { target: ref, status: 'skipped', attempts: 0, lastError: 'Cancelled' },
    });

    const waiting: TargetState = { target: ref, phase: 'retry-pending', attempts: 1, lastError: 'Throttling' };
    expect(transition(waiting, { type: 'cancel' }, policy).effect).toEqual({
      type: 'complete',
      outcome: { target: ref, status: 'skipped', attempts: 1, lastError: 'Cancelled' },
    });
  });

  it('lets a running attempt finish after cancel but does not retry it', () => {
    const cancelled = transition(running(1), { type: 'cancel' }, policy);
    expect(cancelled).toEqual({ state: running(1, { cancelRequested: true }), effect: null });

    expect(transition(cancelled.state, { type: 'result', result: retryableFailure('Throttling') }, policy).effect).toEqual({
      type: 'complete',
      outcome: { target: ref, status: 'skipped', attempts: 1, lastError: 'Throttling' },
    });
    expect(transition(cancelled.state, { type: 'result', result: succeeded() }, policy).state.phase).toBe('succeeded');
  });

  it('ignores cancel on a terminal target', () => {
    const done: TargetState = { target: ref, phase: 'succeeded', attempts: 1 };
    expect(transition(done, { type: 'cancel' }, policy)).toEqual({ state: done, effect: null });
  });

  it('rejects events that cannot happen in the current phase', () => {
    expect(() => transition(initialState(ref), { type: 'result', result: succeeded() }, policy)).toThrow(
      "Illegal transition: 'result' in state 'pending' for 111111111111/us-east-1"
    );

    let caught: unknown;
    try {
      transition({ target: ref, phase: 'failed-fatal', attempts: 1 }, { type: 'start' }, policy);
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ code: 'ILLEGAL_TRANSITION' });
  });
});

describe('ExecutionSupervisor', () => {
  let index: AccountIndex;
  const log = createLogger('Test');

  beforeEach(async () => {
    setLogHandler(() => {});
    index = await loadTestIndex();
  });

  afterEach(() => {
    setLogHandler(null);
  });

  function supervisorFor(worker: StarfleetWorker, definition: WorkerDefinition, signal?: AbortSignal) {
    const dispatcher = new Dispatcher(definition, new LocalInvoker(worker, log), { signal, log });
    return new ExecutionSupervisor(
      definition,
      dispatcher,
      (target, attempt) => buildPayload(definition, target, attempt, 'run-1'),
      { signal, log }
    );
  }

  function targets(...keys: Array<[string, string]>): Target[] {
    return keys.map(([id, region]) => testTarget(index, id, region));
  }

  it('exhausts retries on an always-retryable target', async () => {
    const worker = scriptedWorker('scanner', async () => retryableFailure('Throttling'));
    const supervisor = supervisorFor(worker, testDefinition());
    const retries: TargetRetryEvent[] = [];
    supervisor.on('retry', (retry: TargetRetryEvent) => retries.push(retry));

    const outcomes = await supervisor.supervise(targets(['111111111111', 'us-east-1']));

    expect(outcomes).toEqual([
      { target: ref, status: 'failed-retryable-exhausted', attempts: 3, lastError: 'Throttling' },
    ]);
    expect(retries.map(r => r.attempt)).toEqual([2, 3]);
  });

  it('produces exactly one outcome per target, in target order', async () => {
    const worker = scriptedWorker('scanner', async (payload) => {
      if (payload.account.id === '111111111111' && payload.region === 'us-east-1' && payload.attempt === 1) {
        return retryableFailure('Throttling');
      }
      if (payload.region === 'eu-west-1') {
        return fatalFailure('AccessDenied');
      }
      return succeeded();
    });
    const supervisor = supervisorFor(worker, testDefinition({ concurrency: 2 }));
    const onOutcome = vi.fn();
    supervisor.on('outcome', onOutcome);

    const outcomes = await supervisor.supervise(
      targets(
        ['111111111111', 'us-east-1'],
        ['111111111111', 'us-west-2'],
        ['333333333333', 'eu-west-1'],
        ['333333333333', 'us-east-1']
      )
    );

    expect(outcomes.map(o => [o.target.accountId, o.target.region, o.status, o.attempts])).toEqual([
      ['111111111111', 'us-east-1', 'succeeded', 2],
      ['111111111111', 'us-west-2', 'succeeded', 1],
      ['333333333333', 'eu-west-1', 'failed-fatal', 1],
      ['333333333333', 'us-east-1', 'succeeded', 1],
    ]);
    expect(onOutcome).toHaveBeenCalledTimes(4);
  });

  it('waits out the backoff without holding a pool slot', async () => {
    const started: string[] = [];
    const worker = scriptedWorker('scanner', async (payload) => {
      started.push(`${payload.region}#${payload.attempt}`);
      return payload.region === 'us-east-1' && payload.attempt === 1 ? retryableFailure('Throttling') : succeeded();
    });
    const definition = testDefinition({
      concurrency: 1,
      retry: { maxAttempts: 2, baseDelayMs: 40, maxDelayMs: 40, backoff: 'fixed', jitter: 'none' },
    });

    const outcomes = await supervisorFor(worker, definition).supervise(
      targets(['111111111111', 'us-east-1'], ['111111111111', 'us-west-2'])
    );

    expect(started).toEqual(['us-east-1#1', 'us-west-2#1', 'us-east-1#2']);
    expect(outcomes.map(o => o.status)).toEqual(['succeeded', 'succeeded']);
  });

  it('returns no outcomes for no targets', async () => {
    const worker = scriptedWorker('scanner', async () => succeeded());
    await expect(supervisorFor(worker, testDefinition()).supervise([])).resolves.toEqual([]);
  });

  it('reports every target on cancellation and keeps finished work', async () => {
    const controller = new AbortController();
    const worker = scriptedWorker('scanner', async () => {
      await sleep(30);
      return retryableFailure('Throttling');
    });
    const supervisor = supervisorFor(worker, testDefinition({ concurrency: 1 }), controller.signal);

    setTimeout(() => controller.abort(), 5);
    const outcomes = await supervisor.supervise(
      targets(['111111111111', 'us-east-1'], ['111111111111', 'us-west-2'], ['444444444444', 'us-east-1'])
    );

    expect(outcomes.map(o => [o.target.region, o.status, o.attempts, o.lastError])).toEqual([
      ['us-east-1', 'skipped', 1, 'Throttling'],
      ['us-west-2', 'skipped', 0, 'Cancelled'],
      ['us-east-1', 'skipped', 0, 'Cancelled'],
    ]);
  });

  it('skips everything when cancelled before it starts', async () => {
    const controller = new AbortController();
    controller.abort();
    const worker = scriptedWorker('scanner', async () => succeeded());

    const outcomes = await supervisorFor(worker, testDefinition(), controller.signal).supervise(
      targets(['111111111111', 'us-east-1'])
    );

    expect(outcomes).toEqual([{ target: ref, status: 'skipped', attempts: 0, lastError: 'Cancelled' }]);
  });

  it('rejects duplicate targets', async () => {
    const worker = scriptedWorker('scanner', async () => succeeded());
    const target = testTarget(index, '111111111111', 'us-east-1');

    await expect(supervisorFor(worker, testDefinition()).supervise([target, target])).rejects.toMatchObject({
      code: 'DUPLICATE_TARGET',
    });
  });
});
