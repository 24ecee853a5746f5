/**
 * Release Resolver
 *
 * Decides where a released back gesture settles and how long it takes.
 * Values follow the route transition convention: 1 = page fully shown,
 * 0 = page fully dismissed. "Reverse" returns to 1 and cancels the pop.
 */

import { MIN_SETTLE_SCALE } from '../../shared/constants.js';

export interface ReleaseInput {
  /** Logical velocity in screen widths per second, positive toward dismissing */
  velocity: number;
  value: number;
  isCurrent: boolean;
  isActive: boolean;
  minFlingVelocity: number;
}

export interface ReleasePlan {
  shouldReverse: boolean;
  target: 0 | 1;
  durationMs: number;
}

export function shouldReverseRelease(input: ReleaseInput): boolean {
  // Someone navigated while the finger was down: keep the page if it is still
  // in the stack, otherwise let it finish leaving
  if (!input.isCurrent) {
    return input.isActive;
  }

  if (Math.abs(input.velocity) >= input.minFlingVelocity) {
    return input.velocity <= 0;
  }

  // Exactly half way completes the pop
  return input.value > 0.5;
}

/**
 * Scales the base duration by the remaining travel into
 * [MIN_SETTLE_SCALE, 1 - MIN_SETTLE_SCALE] of `baseDurationMs`.
 */
export function settleDurationMs(shouldReverse: boolean, value: number, baseDurationMs: number): number {
  const distance = shouldReverse ? 1 - value : value;
  const scaleFactor = MIN_SETTLE_SCALE + (1 - 2 * MIN_SETTLE_SCALE) * distance;
  return Math.round(scaleFactor * baseDurationMs);
}

export function planRelease(input: ReleaseInput, baseDurationMs: number): ReleasePlan {
  const shouldReverse = shouldReverseRelease(input);
  return {
    shouldReverse,
    target: shouldReverse ? 1 : 0,
    durationMs: settleDurationMs(shouldReverse, input.value, baseDurationMs),
  };
}
