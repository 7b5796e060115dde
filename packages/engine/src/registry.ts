/**
 * Worker Registry
 *
 * Name -> worker implementation. Passed explicitly to the engine and to queue
 * consumers; there is no process-wide registry.
 */

import { StarfleetError, WorkerNotFoundError } from '@starfleet/common';
import type { StarfleetWorker } from './worker.js';

export class WorkerRegistry {
  private workers = new Map<string, StarfleetWorker>();

  constructor(workers: StarfleetWorker[] = []) {
    for (const worker of workers) {
      this.register(worker);
    }
  }

  register(worker: StarfleetWorker): this {
    if (this.workers.has(worker.name)) {
      throw new StarfleetError(`Worker '${worker.name}' is already registered`, 'DUPLICATE_WORKER', {
        worker: worker.name,
      });
    }
    this.workers.set(worker.name, worker);
    return this;
  }

  has(name: string): boolean {
    return this.workers.has(name);
  }

  get(name: string): StarfleetWorker {
    const worker = this.workers.get(name);
    if (!worker) {
      throw new WorkerNotFoundError(name);
    }
    return worker;
  }

  list(): StarfleetWorker[] {
    return Array.from(this.workers.values());
  }
}
