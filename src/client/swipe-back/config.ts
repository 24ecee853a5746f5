import { z } from 'zod';
import {
  DEFAULT_DETECTION_START_OFFSET,
  DEFAULT_TRANSITION_DURATION_MS,
  DROPPED_SWIPE_DURATION_MS,
  MIN_FLING_VELOCITY,
  MIN_INTERACTIVE_DIMENSION,
} from '../../shared/constants.js';
import { SwipeBackConfigError } from './errors.js';
import type { DetectionArea, GestureConfig, SafeAreaInsets } from './types.js';

// Zod schema for option validation
export const SwipeBackOptionsSchema = z
  .object({
    canSwipe: z.boolean().default(true),
    canOnlySwipeFromEdge: z.boolean().default(false),
    backGestureDetectionWidth: z.number().finite().nonnegative().default(MIN_INTERACTIVE_DIMENSION),
    backGestureDetectionStartOffset: z
      .number()
      .finite()
      .nonnegative()
      .default(DEFAULT_DETECTION_START_OFFSET),
    minFlingVelocity: z.number().finite().positive().default(MIN_FLING_VELOCITY),
    droppedSwipeDurationMs: z.number().int().nonnegative().default(DROPPED_SWIPE_DURATION_MS),
    transitionDurationMs: z.number().int().nonnegative().optional(),
    reverseTransitionDurationMs: z.number().int().nonnegative().optional(),
    direction: z.enum(['ltr', 'rtl']).default('ltr'),
  })
  .strict();

export type SwipeBackOptions = z.infer<typeof SwipeBackOptionsSchema>;
export type SwipeBackOptionsInput = z.input<typeof SwipeBackOptionsSchema>;

export interface TransitionDurations {
  forwardMs: number;
  reverseMs: number;
}

export const NO_SAFE_AREA: SafeAreaInsets = { left: 0, right: 0 };

/**
 * Validate options and fill in defaults
 * @throws SwipeBackConfigError listing every failed field
 */
export function resolveSwipeBackOptions(input: unknown = {}): SwipeBackOptions {
  const result = SwipeBackOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new SwipeBackConfigError(`Invalid swipe-back options: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function mergeSwipeBackOptions(
  current: SwipeBackOptions,
  update: SwipeBackOptionsInput
): SwipeBackOptions {
  return resolveSwipeBackOptions({ ...current, ...update });
}

export function toGestureConfig(options: SwipeBackOptions): GestureConfig {
  return {
    canSwipe: options.canSwipe,
    canOnlySwipeFromEdge: options.canOnlySwipeFromEdge,
    detectionWidth: options.backGestureDetectionWidth,
    detectionStartOffset: options.backGestureDetectionStartOffset,
    minFlingVelocity: options.minFlingVelocity,
    droppedSwipeDurationMs: options.droppedSwipeDurationMs,
    direction: options.direction,
  };
}

/** Explicit overrides win over the default push/pop durations */
export function resolveTransitionDurations(options: SwipeBackOptions): TransitionDurations {
  return {
    forwardMs: options.transitionDurationMs ?? DEFAULT_TRANSITION_DURATION_MS,
    reverseMs: options.reverseTransitionDurationMs ?? DEFAULT_TRANSITION_DURATION_MS,
  };
}

/**
 * The band an edge-only gesture has to start in, or null when the whole
 * surface is valid. Notched devices widen the band to the leading inset.
 */
export function resolveDetectionArea(
  config: GestureConfig,
  insets: SafeAreaInsets = NO_SAFE_AREA
): DetectionArea | null {
  if (!config.canOnlySwipeFromEdge) return null;

  const leadingInset = config.direction === 'ltr' ? insets.left : insets.right;
  return {
    startOffset: config.detectionStartOffset,
    width: Math.max(leadingInset, config.detectionWidth),
  };
}
