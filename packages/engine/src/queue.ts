/**
 * Queued invocation substrate
 *
 * In queued mode the dispatcher does not call workers itself: it sends the
 * payload to an InvocationQueue and waits for a completion carrying the same
 * payloadId. Anything that can deliver messages and report completions
 * (SQS + Lambda, a job table, a broker) can sit behind this interface.
 *
 * MemoryInvocationQueue is the in-process implementation used by the CLI and
 * the tests: a FIFO of payloads drained by a fixed pool of consumers.
 *
 * A ticket the dispatcher gives up on is withdrawn with cancel(): an
 * undelivered message is dropped, a running one is aborted and its consumer
 * moves on without waiting for the worker to notice.
 */

import { EventEmitter } from 'node:events';
import {
  StarfleetError,
  createLogger,
  type ExecutionResult,
  type InvocationPayload,
  type Logger,
} from '@starfleet/common';
import type { WorkerRegistry } from './registry.js';
import { fatalFailure, retryableFailure, runWorker } from './worker.js';

export interface QueueCompletion {
  payloadId: string;
  result: ExecutionResult;
}

export type CompletionListener = (completion: QueueCompletion) => void;

export interface InvocationQueue {
  send(payload: InvocationPayload): Promise<void>;
  /** Returns an unsubscribe function */
  onCompletion(listener: CompletionListener): () => void;
  /** Withdraw a payload nobody is waiting for any more; no completion follows */
  cancel(payloadId: string): void;
}

export const QUEUE_STOPPED_CAUSE = 'Queue stopped';

export class MemoryInvocationQueue extends EventEmitter implements InvocationQueue {
  private messages: InvocationPayload[] = [];
  private receivers: Array<(payload: InvocationPayload | null) => void> = [];
  private consumers: Promise<void>[] = [];
  private running = new Map<string, AbortController>();
  private stopped = false;
  private readonly shutdown = new AbortController();
  private log: Logger;

  constructor(log: Logger = createLogger('Queue')) {
    super();
    this.log = log;
  }

  async send(payload: InvocationPayload): Promise<void> {
    if (this.stopped) {
      throw new StarfleetError('Queue is stopped', 'QUEUE_STOPPED', { payloadId: payload.payloadId });
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(payload);
    } else {
      this.messages.push(payload);
    }
    this.emit('sent', payload);
  }

  onCompletion(listener: CompletionListener): () => void {
    this.on('completion', listener);
    return () => {
      this.off('completion', listener);
    };
  }

  /** Publish a completion (used by consumers, or by an external callback) */
  complete(payloadId: string, result: ExecutionResult): void {
    const completion: QueueCompletion = { payloadId, result };
    this.emit('completion', completion);
  }

  cancel(payloadId: string): void {
    const index = this.messages.findIndex(message => message.payloadId === payloadId);
    if (index !== -1) {
      this.messages.splice(index, 1);
      this.log.debug('Dropped cancelled message', { payloadId });
      return;
    }
    const controller = this.running.get(payloadId);
    if (controller) {
      this.running.delete(payloadId);
      controller.abort();
      this.log.debug('Aborted cancelled payload', { payloadId });
    }
  }

  /** Messages waiting for a consumer */
  get depth(): number {
    return this.messages.length;
  }

  get consumerCount(): number {
    return this.consumers.length;
  }

  /** Payloads a consumer is executing */
  get runningCount(): number {
    return this.running.size;
  }

  /**
   * Wait for the next message. Resolves null once the queue is stopped.
   */
  receive(): Promise<InvocationPayload | null> {
    const next = this.messages.shift();
    if (next) return Promise.resolve(next);
    if (this.stopped) return Promise.resolve(null);
    return new Promise(resolve => this.receivers.push(resolve));
  }

  /**
   * Start consumers that execute queued payloads against the registry
   */
  startConsumers(registry: WorkerRegistry, count: number): void {
    for (let i = 0; i < count; i++) {
      this.consumers.push(this.consume(registry, i + 1));
    }
    this.log.debug(`Started ${count} queue consumers`);
  }

  private async consume(registry: WorkerRegistry, id: number): Promise<void> {
    const log = this.log.child({ consumer: id });
    for (;;) {
      const payload = await this.receive();
      if (!payload) return;

      if (!registry.has(payload.worker)) {
        this.complete(
          payload.payloadId,
          fatalFailure(`Worker '${payload.worker}' is not registered with the queue consumer`)
        );
        continue;
      }

      const controller = new AbortController();
      const onShutdown = () => controller.abort();
      if (this.shutdown.signal.aborted) controller.abort();
      this.shutdown.signal.addEventListener('abort', onShutdown, { once: true });
      this.running.set(payload.payloadId, controller);

      try {
        const result = await Promise.race([
          runWorker(registry.get(payload.worker), payload, { signal: controller.signal, log }),
          abandoned(controller.signal),
        ]);
        // Cancelled tickets have already been reported by the dispatcher
        if (this.running.get(payload.payloadId) === controller) {
          this.complete(payload.payloadId, result);
        }
      } finally {
        this.shutdown.signal.removeEventListener('abort', onShutdown);
        if (this.running.get(payload.payloadId) === controller) {
          this.running.delete(payload.payloadId);
        }
      }
    }
  }

  /**
   * Stop accepting messages, drop undelivered ones, abort running payloads
   * and wait for consumers to return
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.shutdown.abort();
    if (this.messages.length > 0) {
      this.log.warn(`Dropping ${this.messages.length} undelivered messages`);
      this.messages = [];
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver(null);
    }
    await Promise.all(this.consumers.splice(0));
  }
}

/**
 * Settles once the signal aborts, so a worker that ignores its signal does
 * not hold the consumer
 */
function abandoned(signal: AbortSignal): Promise<ExecutionResult> {
  return new Promise((resolve) => {
    const settle = () => resolve(retryableFailure(QUEUE_STOPPED_CAUSE));
    if (signal.aborted) settle();
    else signal.addEventListener('abort', settle, { once: true });
  });
}
