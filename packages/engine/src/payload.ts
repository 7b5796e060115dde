/**
 * Payload Builder
 */

import {
  ConfigurationSerializationError,
  deepFreeze,
  isPlainObject,
  type InvocationPayload,
  type JsonValue,
  type Target,
  type WorkerDefinition,
} from '@starfleet/common';

function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'object' && value !== null) {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    if (typeof ctor === 'function' && ctor.name) return `a ${ctor.name} instance`;
    return 'an object';
  }
  return `a ${typeof value}`;
}

function copyJson(value: unknown, path: string, seen: Set<object>): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ConfigurationSerializationError(`Value at ${path} is not a finite number`, path);
    }
    return value;
  }
  if (Array.isArray(value)) {
    if (seen.has(value)) {
      throw new ConfigurationSerializationError(`Value at ${path} is a circular reference`, path);
    }
    seen.add(value);
    const items = value.map((item, i) => copyJson(item, `${path}[${i}]`, seen));
    seen.delete(value);
    return items;
  }
  if (isPlainObject(value)) {
    if (seen.has(value)) {
      throw new ConfigurationSerializationError(`Value at ${path} is a circular reference`, path);
    }
    seen.add(value);
    const copy: Record<string, JsonValue> = {};
    for (const [key, item] of Object.entries(value)) {
      copy[key] = copyJson(item, `${path}.${key}`, seen);
    }
    seen.delete(value);
    return copy;
  }
  throw new ConfigurationSerializationError(
    `Value at ${path} is ${describeValue(value)} and cannot be serialized`,
    path
  );
}

/**
 * Capture a worker configuration as a deep-frozen JSON value.
 * `undefined` at the top level means "no configuration" and becomes `{}`.
 */
export function snapshotConfiguration(configuration: unknown): JsonValue {
  if (configuration === undefined) {
    const empty: JsonValue = {};
    return deepFreeze(empty);
  }
  return deepFreeze(copyJson(configuration, '$', new Set()));
}

/**
 * Deterministic payload identity: one per (run, target, attempt)
 */
export function payloadIdFor(runId: string, target: Target, attempt: number): string {
  return `${runId}:${target.account.id}:${target.region}:${attempt}`;
}

/**
 * Build the payload for one attempt against one target. Pass a snapshot taken
 * with snapshotConfiguration() to avoid re-copying the configuration per target.
 */
export function buildPayload(
  definition: WorkerDefinition,
  target: Target,
  attempt: number,
  runId: string,
  snapshot: JsonValue = snapshotConfiguration(definition.configuration)
): InvocationPayload {
  return Object.freeze({
    payloadId: payloadIdFor(runId, target, attempt),
    runId,
    worker: definition.name,
    account: Object.freeze({ id: target.account.id, name: target.account.name }),
    region: target.region,
    configuration: snapshot,
    attempt,
  });
}
