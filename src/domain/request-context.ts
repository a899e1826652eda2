/**
 * Run Context Module
 * Propagates the run id of one forecast invocation using AsyncLocalStorage
 * No need to thread runId through function signatures
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RunContext {
  runId: string;
  postalCode?: string;
  startTime?: number;
}

const asyncLocalStorage = new AsyncLocalStorage<RunContext>();

/**
 * Run a function with run context
 * Automatically propagates context to all async operations
 */
export function runWithContext<T>(context: RunContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Get the current run context
 * Returns undefined if not running within a context
 */
export function getContext(): RunContext | undefined {
  return asyncLocalStorage.getStore();
}

export function getRunId(): string | undefined {
  return getContext()?.runId;
}

export function generateRunId(): string {
  return randomUUID();
}
