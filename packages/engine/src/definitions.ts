/**
 * Worker definitions from configuration
 */

import { compareStrings, type StarfleetConfig, type WorkerConfig, type WorkerDefinition } from '@starfleet/common';

export function buildWorkerDefinition(
  name: string,
  worker: WorkerConfig,
  defaults: StarfleetConfig['defaults']
): WorkerDefinition {
  return {
    name,
    description: worker.description,
    targeting: worker.targeting,
    configuration: worker.configuration,
    invocationMode: worker.invocationMode ?? defaults.invocationMode,
    concurrency: worker.concurrency ?? defaults.concurrency,
    timeoutMs: worker.timeoutMs ?? defaults.timeoutMs,
    retry: { ...defaults.retry, ...worker.retry },
  };
}

/**
 * Enabled workers, sorted by name. Per-worker values fall back to `defaults`.
 */
export function buildWorkerDefinitions(config: StarfleetConfig): WorkerDefinition[] {
  return Object.entries(config.workers)
    .filter(([, worker]) => worker.enabled)
    .sort(([a], [b]) => compareStrings(a, b))
    .map(([name, worker]) => buildWorkerDefinition(name, worker, config.defaults));
}
