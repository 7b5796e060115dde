/**
 * @starfleet/engine - Resolve, dispatch, supervise and report worker runs
 */

export * from './worker.js';
export * from './registry.js';
export * from './targeting.js';
export * from './payload.js';
export * from './async-queue.js';
export * from './queue.js';
export * from './dispatcher.js';
export * from './supervisor.js';
export * from './aggregator.js';
export * from './definitions.js';
export * from './engine.js';
export { builtinWorkers, echoWorker, noopWorker } from './workers/builtin.js';
