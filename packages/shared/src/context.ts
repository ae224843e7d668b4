/**
 * AsyncLocalStorage Context Management
 *
 * Carries the run's correlation ID, and the document currently in flight,
 * into every log line without threading it through each call.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RunContext {
  correlationId: string;
  documentId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RunContext>();

/**
 * Get the current run context
 */
export function getContext(): RunContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run an async function within a new context
 */
export async function runWithContextAsync<T>(
  context: RunContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function with the document ID added to the current context
 */
export async function runForDocument<T>(documentId: string, fn: () => Promise<T>): Promise<T> {
  const parent = getContext();
  return runWithContextAsync(
    { correlationId: parent?.correlationId || ulid(), documentId },
    fn
  );
}
