/**
 * @fileoverview Execution surfaces
 *
 * The orchestrator has exactly one retrieval path. What differs between the
 * sequential and concurrent chat modes is only where the vector search runs:
 * awaited in line, or started from a fresh macrotask so pending input and
 * signal handlers are serviced before the network call begins.
 */

import { setImmediate as nextMacrotask } from 'node:timers/promises';
import type { ExecutionMode } from '../config/index.js';

export type ExecutionSurface = <T>(task: () => Promise<T>) => Promise<T>;

export const inlineSurface: ExecutionSurface = (task) => task();

export const deferredSurface: ExecutionSurface = async (task) => {
  await nextMacrotask();
  return task();
};

export function surfaceFor(mode: ExecutionMode): ExecutionSurface {
  return mode === 'concurrent' ? deferredSurface : inlineSurface;
}
