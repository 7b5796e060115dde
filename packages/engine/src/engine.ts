/**
 * Starfleet Engine
 *
 * Wires the run pipeline together:
 *
 *   Account Index -> Target Resolver -> Payload Builder -> Dispatcher
 *     -> Execution Supervisor (retries) -> Result Aggregator -> RunRecord
 *
 * Everything up to and including payload building is the resolution phase;
 * a failure there (index unavailable, unserializable configuration, unknown
 * worker) aborts the run before anything is dispatched. Per-target failures
 * never abort a run.
 *
 * Events:
 *   run:start        { runId, worker, targets, dryRun }
 *   target:retry     { runId, target, attempt, delayMs, cause }
 *   target:complete  { runId, outcome }
 *   run:complete     RunRecord
 */

import { EventEmitter } from 'node:events';
import type { AccountIndex } from '@starfleet/account-index';
import {
  WorkerNotFoundError,
  createLogger,
  formatDuration,
  generateRunId,
  type InvocationPayload,
  type JsonValue,
  type Logger,
  type RunRecord,
  type Target,
  type TargetOutcome,
  type WorkerDefinition,
} from '@starfleet/common';
import { aggregate, describeFailure, summarize } from './aggregator.js';
import { Dispatcher, QueuedInvoker, createInvoker } from './dispatcher.js';
import { buildPayload, snapshotConfiguration } from './payload.js';
import { MemoryInvocationQueue, type InvocationQueue } from './queue.js';
import type { WorkerRegistry } from './registry.js';
import { ExecutionSupervisor, type RandomSource, type TargetRetryEvent } from './supervisor.js';
import { narrowTargets, resolveTargets, toTargetRef, type TargetOverrides } from './targeting.js';

// ============================================================================
// TYPES
// ============================================================================

export const DRY_RUN_CAUSE = 'dry run';

const DEFAULT_QUEUE_CONSUMERS = 4;

export interface StarfleetEngineOptions {
  index: AccountIndex;
  registry: WorkerRegistry;
  definitions: WorkerDefinition[];
  /** External queue for queued workers; an in-process one is created per run otherwise */
  queue?: InvocationQueue;
  queueConsumers?: number;
  random?: RandomSource;
  log?: Logger;
}

export interface PlanOptions extends TargetOverrides {
  /** Reload the account index before resolving */
  reloadIndex?: boolean;
  runId?: string;
}

export interface RunOptions extends PlanOptions {
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface RunPlan {
  runId: string;
  definition: WorkerDefinition;
  targets: Target[];
  /** First-attempt payloads, in target order */
  payloads: InvocationPayload[];
  configuration: JsonValue;
}

export interface RunStartEvent {
  runId: string;
  worker: string;
  targets: number;
  dryRun: boolean;
}

export interface TargetCompleteEvent {
  runId: string;
  outcome: TargetOutcome;
}

export interface TargetRetryNotice extends TargetRetryEvent {
  runId: string;
}

// ============================================================================
// ENGINE
// ============================================================================

export class StarfleetEngine extends EventEmitter {
  private readonly index: AccountIndex;
  private readonly registry: WorkerRegistry;
  private readonly definitions = new Map<string, WorkerDefinition>();
  private readonly queue?: InvocationQueue;
  private readonly queueConsumers: number;
  private readonly random?: RandomSource;
  private readonly log: Logger;
  private indexStale = false;

  constructor(options: StarfleetEngineOptions) {
    super();
    this.index = options.index;
    this.registry = options.registry;
    this.queue = options.queue;
    this.queueConsumers = options.queueConsumers ?? DEFAULT_QUEUE_CONSUMERS;
    this.random = options.random;
    this.log = options.log ?? createLogger('Engine');
    for (const definition of options.definitions) {
      this.definitions.set(definition.name, definition);
    }
  }

  listWorkers(): WorkerDefinition[] {
    return Array.from(this.definitions.values());
  }

  /**
   * Configured definition for a worker that can actually be executed here
   */
  getDefinition(name: string): WorkerDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new WorkerNotFoundError(name);
    }
    // Queued workers behind an external queue run elsewhere
    if (definition.invocationMode === 'synchronous' || !this.queue) {
      this.registry.get(name);
    }
    return definition;
  }

  /** Force the next plan to reload the account index */
  invalidateIndex(): void {
    this.indexStale = true;
  }

  /**
   * Resolution phase only: load the index, resolve targets and build the
   * first-attempt payloads. Nothing is dispatched.
   */
  async plan(workerName: string, options: PlanOptions = {}): Promise<RunPlan> {
    const definition = this.getDefinition(workerName);

    if (!this.index.isLoaded || this.indexStale || options.reloadIndex) {
      await this.index.load();
      this.indexStale = false;
    }

    const configuration = snapshotConfiguration(definition.configuration);
    const runId = options.runId ?? generateRunId();
    const targets = narrowTargets(resolveTargets(definition.targeting, this.index), options);
    const payloads = targets.map(target => buildPayload(definition, target, 1, runId, configuration));

    return { runId, definition, targets, payloads, configuration };
  }

  async run(workerName: string, options: RunOptions = {}): Promise<RunRecord> {
    const startedAt = Date.now();
    const plan = await this.plan(workerName, options);
    const { runId, definition, targets } = plan;
    const dryRun = options.dryRun ?? false;
    const log = this.log.child({ runId, worker: definition.name });

    const start: RunStartEvent = { runId, worker: definition.name, targets: targets.length, dryRun };
    log.info(`Starting run against ${targets.length} targets`, { dryRun, mode: definition.invocationMode });
    this.emit('run:start', start);

    const outcomes = dryRun ? this.dryRunOutcomes(plan) : await this.execute(plan, options.signal, log);

    const report = aggregate(outcomes);
    const finishedAt = Date.now();
    const record: RunRecord = {
      runId,
      worker: definition.name,
      startedAt,
      finishedAt,
      cancelled: options.signal?.aborted ?? false,
      dryRun,
      report,
      outcomes,
    };

    log.info(`${summarize(report)} in ${formatDuration(finishedAt - startedAt)}`);
    for (const failure of report.failures) {
      log.warn(describeFailure(failure));
    }
    this.emit('run:complete', record);
    return record;
  }

  private dryRunOutcomes(plan: RunPlan): TargetOutcome[] {
    return plan.targets.map(target => {
      const outcome: TargetOutcome = {
        target: toTargetRef(target),
        status: 'skipped',
        attempts: 0,
        lastError: DRY_RUN_CAUSE,
      };
      this.emit('target:complete', { runId: plan.runId, outcome } satisfies TargetCompleteEvent);
      return outcome;
    });
  }

  private async execute(plan: RunPlan, signal: AbortSignal | undefined, log: Logger): Promise<TargetOutcome[]> {
    const { runId, definition, configuration } = plan;

    let ownQueue: MemoryInvocationQueue | undefined;
    let queue = this.queue;
    if (definition.invocationMode === 'queued' && !queue) {
      ownQueue = new MemoryInvocationQueue(log.child({ component: 'queue' }));
      ownQueue.startConsumers(this.registry, this.queueConsumers);
      queue = ownQueue;
    }

    const invoker = createInvoker(definition, this.registry, queue, log);
    const dispatcher = new Dispatcher(definition, invoker, { signal, log });
    const supervisor = new ExecutionSupervisor(
      definition,
      dispatcher,
      (target, attempt) => buildPayload(definition, target, attempt, runId, configuration),
      { signal, random: this.random, log }
    );

    supervisor.on('retry', (retry: TargetRetryEvent) => {
      this.emit('target:retry', { runId, ...retry } satisfies TargetRetryNotice);
    });
    supervisor.on('outcome', (outcome: TargetOutcome) => {
      this.emit('target:complete', { runId, outcome } satisfies TargetCompleteEvent);
    });

    try {
      return await supervisor.supervise(plan.targets);
    } finally {
      if (invoker instanceof QueuedInvoker) {
        invoker.close();
      }
      await ownQueue?.stop();
      log.debug('Dispatch finished', { peakInFlight: dispatcher.peakInFlight, dropped: dispatcher.droppedCount });
    }
  }
}
