/**
 * Directional Drag Gate
 *
 * Decides per pointer sample whether a back drag should be tracked. Nothing
 * is cached between samples: enablement and config may change mid-gesture,
 * but a drag that already started is never dropped.
 */

import type { DetectionArea, ReadingDirection } from './types.js';

export interface PointerSample {
  phase: 'down' | 'move';
  /** Horizontal movement since the previous sample, in px */
  dx: number;
  /** Horizontal position relative to the surface's left edge, in px */
  x: number;
}

export interface GateContext {
  isTracking: boolean;
  isEnabled: boolean;
  direction: ReadingDirection;
  detectionArea: DetectionArea | null;
  surfaceWidth: number;
}

/** Distance from the edge the reading direction starts at */
export function toLeadingOffset(x: number, surfaceWidth: number, direction: ReadingDirection): number {
  return direction === 'ltr' ? x : surfaceWidth - x;
}

/** A zero delta is neutral and counts as correct for both directions */
export function isBackDirection(dx: number, direction: ReadingDirection): boolean {
  if (dx === 0) return true;
  return direction === 'ltr' ? dx > 0 : dx < 0;
}

export function shouldHandlePointer(sample: PointerSample, context: GateContext): boolean {
  if (context.isTracking) return true;
  if (!context.isEnabled) return false;
  if (!isBackDirection(sample.dx, context.direction)) return false;

  const area = context.detectionArea;
  if (area && sample.phase === 'down') {
    const offset = toLeadingOffset(sample.x, context.surfaceWidth, context.direction);
    if (offset < area.startOffset || offset > area.startOffset + area.width) {
      return false;
    }
  }

  return true;
}
