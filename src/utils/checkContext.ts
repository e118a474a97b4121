/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * checkContext.ts: AsyncLocalStorage-based check context for automatic log correlation.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

/* Several checks can be in flight at once, each waiting on its own FFmpeg process. When a check starts, we establish a context containing a short check ID. All code
 * executed within that async context can retrieve the ID without explicit parameter passing, so log lines from the runner, the interpreter and the cache are
 * prefixed with the same ID.
 *
 * IMPORTANT: AsyncLocalStorage context is lost when entering a new async context, such as setInterval or setTimeout callbacks. For these cases, re-establish the
 * context by calling runWithCheckContext() at the start of the callback.
 */

/**
 * Check context containing metadata for the current detection.
 */
export interface CheckContext {

  // Unique check identifier used for log correlation.
  checkId: string;
}

const checkContextStorage = new AsyncLocalStorage<CheckContext>();

/**
 * Generates a short random check identifier (8 hex characters). Collisions only blur log correlation, so 32 bits are plenty.
 * @returns A new check ID.
 */
export function generateCheckId(): string {

  return randomBytes(4).toString("hex");
}

/**
 * Runs a function within a check context. All async operations called within the function will see its ID through getCheckId().
 * @param context - The check context.
 * @param fn - The async function to run within the context.
 * @returns The result of the function.
 */
export async function runWithCheckContext<T>(context: CheckContext, fn: () => Promise<T>): Promise<T> {

  return checkContextStorage.run(context, fn);
}

/**
 * Convenience function to retrieve just the check ID from the current context.
 * @returns The check ID, or undefined if not running within a check context.
 */
export function getCheckId(): string | undefined {

  return checkContextStorage.getStore()?.checkId;
}
