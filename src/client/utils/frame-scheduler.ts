import { FALLBACK_FRAME_INTERVAL_MS } from '../../shared/constants.js';

/**
 * Source of animation frames and of the clock they are timed against
 */
export interface FrameScheduler {
  now(): number;
  /** Schedules one callback for the next frame; returns a cancel function */
  requestFrame(callback: () => void): () => void;
}

/**
 * Uses requestAnimationFrame where the host has it, otherwise a ~60Hz timer
 */
export const defaultFrameScheduler: FrameScheduler = {
  now: () => performance.now(),
  requestFrame(callback) {
    if (typeof globalThis.requestAnimationFrame === 'function') {
      const handle = globalThis.requestAnimationFrame(() => callback());
      return () => globalThis.cancelAnimationFrame(handle);
    }
    const timer = setTimeout(callback, FALLBACK_FRAME_INTERVAL_MS);
    return () => clearTimeout(timer);
  },
};
