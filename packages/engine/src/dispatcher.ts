/**
 * Dispatcher
 *
 * Bounded fanout of invocation payloads. At most `concurrency` executions are
 * outstanding at any time, whatever the number of targets; payloads start in
 * submission order and complete in any order. Each execution yields exactly
 * one DispatchResult. The dispatcher never retries.
 *
 * A target that exceeds `timeoutMs` is reported as a retryable `Timeout`,
 * its AbortSignal is aborted, and the slot is released; whatever it
 * returns later is ignored. A queued ticket that times out is also withdrawn
 * from the queue.
 *
 * The run-level signal stops admission immediately. Payloads still waiting
 * for a slot are dropped; in-flight executions finish or time out.
 */

import {
  ConfigurationError,
  createLogger,
  errorMessage,
  MAX_TIMER_MS,
  type ExecutionResult,
  type InvocationPayload,
  type Logger,
  type WorkerDefinition,
} from '@starfleet/common';
import { AsyncQueue } from './async-queue.js';
import type { InvocationQueue, QueueCompletion } from './queue.js';
import type { WorkerRegistry } from './registry.js';
import {
  TIMEOUT_CAUSE,
  isExecutionResult,
  resultFromError,
  retryableFailure,
  runWorker,
  type StarfleetWorker,
} from './worker.js';

export interface DispatchResult {
  payload: InvocationPayload;
  result: ExecutionResult;
  durationMs: number;
}

/**
 * How a payload reaches a worker: in process, or through a queue
 */
export interface Invoker {
  invoke(payload: InvocationPayload, signal: AbortSignal): Promise<ExecutionResult>;
}

/**
 * Synchronous mode: call the worker in process
 */
export class LocalInvoker implements Invoker {
  constructor(private readonly worker: StarfleetWorker, private readonly log: Logger) {}

  invoke(payload: InvocationPayload, signal: AbortSignal): Promise<ExecutionResult> {
    return runWorker(this.worker, payload, {
      signal,
      log: this.log.child({ account: payload.account.id, region: payload.region }),
    });
  }
}

/**
 * Queued mode: send to the queue and wait for the matching completion
 */
export class QueuedInvoker implements Invoker {
  private waiting = new Map<string, (result: ExecutionResult) => void>();
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly queue: InvocationQueue) {}

  private ensureSubscribed(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.queue.onCompletion((completion: QueueCompletion) => {
      const resolve = this.waiting.get(completion.payloadId);
      if (!resolve) return;
      this.waiting.delete(completion.payloadId);
      resolve(completion.result);
    });
  }

  async invoke(payload: InvocationPayload, signal: AbortSignal): Promise<ExecutionResult> {
    this.ensureSubscribed();
    const completion = new Promise<ExecutionResult>((resolve) => {
      this.waiting.set(payload.payloadId, resolve);
      signal.addEventListener('abort', () => {
        this.waiting.delete(payload.payloadId);
        this.queue.cancel(payload.payloadId);
      }, { once: true });
    });
    try {
      await this.queue.send(payload);
    } catch (error) {
      this.waiting.delete(payload.payloadId);
      throw error;
    }
    return completion;
  }

  get outstanding(): number {
    return this.waiting.size;
  }

  close(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.waiting.clear();
  }
}

export interface DispatcherOptions {
  /** Run-level cancellation */
  signal?: AbortSignal;
  log?: Logger;
}

export class Dispatcher {
  private readonly limit: number;
  private readonly timeoutMs: number;
  private readonly queue: InvocationPayload[] = [];
  private readonly output = new AsyncQueue<DispatchResult>();
  private readonly log: Logger;
  private active = 0;
  private peak = 0;
  private closed = false;
  private cancelled = false;
  private dropped = 0;

  constructor(
    definition: WorkerDefinition,
    private readonly invoker: Invoker,
    options: DispatcherOptions = {}
  ) {
    this.limit = Math.max(1, definition.concurrency);
    this.timeoutMs = Math.min(definition.timeoutMs, MAX_TIMER_MS);
    this.log = options.log ?? createLogger('Dispatcher', { worker: definition.name });

    const { signal } = options;
    if (signal?.aborted) {
      this.cancel();
    } else {
      signal?.addEventListener('abort', () => this.cancel(), { once: true });
    }
  }

  /** Executions currently holding a slot */
  get inFlight(): number {
    return this.active;
  }

  /** Highest number of simultaneous executions seen */
  get peakInFlight(): number {
    return this.peak;
  }

  /** Payloads waiting for a slot */
  get pending(): number {
    return this.queue.length;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Payloads dropped without being started because of cancellation */
  get droppedCount(): number {
    return this.dropped;
  }

  /**
   * Queue a payload. Returns false when the dispatcher no longer admits work.
   */
  submit(payload: InvocationPayload): boolean {
    if (this.cancelled || this.closed) {
      return false;
    }
    this.queue.push(payload);
    this.pump();
    return true;
  }

  /**
   * No more submissions; results() ends once in-flight work drains
   */
  close(): void {
    this.closed = true;
    this.finishIfIdle();
  }

  results(): AsyncIterable<DispatchResult> {
    return this.output;
  }

  /**
   * Submit a fixed sequence and stream its results
   */
  async *run(payloads: Iterable<InvocationPayload>): AsyncGenerator<DispatchResult> {
    for (const payload of payloads) {
      this.submit(payload);
    }
    this.close();
    yield* this.output;
  }

  private cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.dropped += this.queue.length;
    if (this.queue.length > 0) {
      this.log.warn(`Cancelled: dropping ${this.queue.length} payloads not yet started`, {
        inFlight: this.active,
      });
    }
    this.queue.length = 0;
    this.finishIfIdle();
  }

  private pump(): void {
    while (!this.cancelled && this.active < this.limit) {
      const payload = this.queue.shift();
      if (!payload) break;
      this.start(payload);
    }
    this.finishIfIdle();
  }

  private finishIfIdle(): void {
    if ((this.closed || this.cancelled) && this.active === 0 && this.queue.length === 0) {
      this.output.end();
    }
  }

  private start(payload: InvocationPayload): void {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    const startedAt = Date.now();

    this.execute(payload).then(
      (result) => this.finish(payload, result, startedAt),
      (error: unknown) => this.finish(payload, resultFromError(error), startedAt)
    );
  }

  private finish(payload: InvocationPayload, result: ExecutionResult, startedAt: number): void {
    this.active--;
    this.output.push({ payload, result, durationMs: Date.now() - startedAt });
    this.pump();
  }

  private async execute(payload: InvocationPayload): Promise<ExecutionResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<ExecutionResult>((resolve) => {
      timer = setTimeout(() => {
        this.log.warn('Target timed out', {
          account: payload.account.id,
          region: payload.region,
          attempt: payload.attempt,
          timeoutMs: this.timeoutMs,
        });
        controller.abort();
        resolve(retryableFailure(TIMEOUT_CAUSE));
      }, this.timeoutMs);
    });

    const invocation = this.invoker.invoke(payload, controller.signal).then(
      (result) => (isExecutionResult(result) ? result : retryableFailure('Invalid execution result')),
      (error: unknown) => {
        this.log.debug('Invocation failed', { error: errorMessage(error) });
        return resultFromError(error);
      }
    );

    try {
      return await Promise.race([invocation, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Pick the invoker for a worker definition's invocation mode
 */
export function createInvoker(
  definition: WorkerDefinition,
  registry: WorkerRegistry,
  queue: InvocationQueue | undefined,
  log: Logger
): Invoker {
  if (definition.invocationMode === 'queued') {
    if (!queue) {
      throw new ConfigurationError(`Worker '${definition.name}' is queued but no invocation queue is configured`);
    }
    return new QueuedInvoker(queue);
  }
  return new LocalInvoker(registry.get(definition.name), log);
}
