/**
 * Built-in workers
 */

import type { StarfleetWorker } from '../worker.js';
import { succeeded } from '../worker.js';

/** Reports the target back; handy for checking targeting rules end to end */
export const echoWorker: StarfleetWorker = {
  name: 'echo',
  description: 'Reports the account and region it ran in',
  async execute(payload, { log }) {
    log.debug('echo', { account: payload.account.id, region: payload.region });
    return succeeded(`${payload.account.name} (${payload.account.id}) ${payload.region}`);
  },
};

export const noopWorker: StarfleetWorker = {
  name: 'noop',
  description: 'Does nothing and succeeds',
  async execute() {
    return succeeded();
  },
};

export function builtinWorkers(): StarfleetWorker[] {
  return [echoWorker, noopWorker];
}
