/**
 * interbus - Core Utilities
 *
 * Internal helpers used throughout interbus: argument validation, guarded
 * execution of user hooks, scope-exit clean-up and the process-wide store
 * backing the bus registry.
 */

import { createValidationError } from '../errors';
import type { IBus } from '../types';

/**
 * Number of ordered teardown passes a bus runs over its hosted interfaces
 */
export const MAX_FINISH_PASSES = 3;

/**
 * Validates bus name format and constraints
 * @param name Bus name to validate
 * @returns True if valid, false otherwise
 */
export function isValidBusName(name: unknown): name is string {
  return (
    typeof name === 'string' &&
    name.length > 0 &&
    name.length <= 255 &&
    !/^\s|\s$/.test(name)
  ); // No leading/trailing whitespace
}

/**
 * Validates that a value can be used as a bus level
 */
export function isValidLevel(level: unknown): level is number {
  return typeof level === 'number' && Number.isInteger(level) && level >= 0;
}

/**
 * Validates that a value names one of the teardown passes
 */
export function isValidFinishOrder(order: unknown): order is number {
  return (
    typeof order === 'number' &&
    Number.isInteger(order) &&
    order >= 0 &&
    order < MAX_FINISH_PASSES
  );
}

/**
 * Validates the common parameters of the bus api
 * @param name Bus name (registry operations)
 * @param level Bus level
 * @param order Teardown pass
 */
export function validateParameters(name?: unknown, level?: unknown, order?: unknown): void {
  if (name !== undefined && !isValidBusName(name)) {
    throw createValidationError('name', name, 'non-empty string');
  }

  if (level !== undefined && !isValidLevel(level)) {
    throw createValidationError('level', level, 'non-negative integer');
  }

  if (order !== undefined && !isValidFinishOrder(order)) {
    throw createValidationError('order', order, `integer below ${MAX_FINISH_PASSES}`);
  }
}

/**
 * Safely executes a function with error handling
 * @param fn Function to execute
 * @param context Context description for error messages
 * @param fallbackValue Value to return on error
 * @returns Function result or fallback value
 */
export function safeExecute<T>(
  fn: () => T,
  context: string,
  fallbackValue?: T
): T | undefined {
  try {
    return fn();
  } catch (error) {
    console.warn(`Error in ${context}:`, error);
    return fallbackValue;
  }
}

/**
 * Clean-up action that runs at most once
 */
export interface ExitHandle {
  run(): void;
  /** Drops the action without running it */
  dismiss(): void;
  readonly pending: boolean;
}

/**
 * Wraps a clean-up action so that it runs at most once
 * @param fn Clean-up action
 */
export function onExit(fn: () => void): ExitHandle {
  let pending = true;

  return {
    run() {
      if (!pending) return;
      pending = false;
      fn();
    },
    dismiss() {
      pending = false;
    },
    get pending() {
      return pending;
    },
  };
}

export type Defer = (fn: () => void) => ExitHandle;

/**
 * Runs `body` and guarantees that every action registered through `defer`
 * runs exactly once, last registered first, whether `body` returns or throws.
 */
export function scoped<T>(body: (defer: Defer) => T): T {
  const handles: ExitHandle[] = [];
  const defer: Defer = fn => {
    const handle = onExit(fn);
    handles.push(handle);
    return handle;
  };

  try {
    return body(defer);
  } finally {
    for (const handle of [...handles].reverse()) {
      handle.run();
    }
  }
}

declare global {
  var __INTERBUS_BUS_REGISTRY_v1__: Map<string, IBus> | undefined;
}

/**
 * Gets the process-wide map that stores named buses
 */
export function getGlobalStore(): Map<string, IBus> {
  const store = globalThis.__INTERBUS_BUS_REGISTRY_v1__ ?? new Map<string, IBus>();
  globalThis.__INTERBUS_BUS_REGISTRY_v1__ = store;
  return store;
}
