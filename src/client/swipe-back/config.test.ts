// @vitest-environment node
import { describe, expect, it } from 'vitest';
import {
  mergeSwipeBackOptions,
  resolveDetectionArea,
  resolveSwipeBackOptions,
  resolveTransitionDurations,
  toGestureConfig,
} from './config.js';
import { SwipeBackConfigError } from './errors.js';

describe('swipe-back config', () => {
  describe('resolveSwipeBackOptions', () => {
    it('should fill in defaults', () => {
      expect(resolveSwipeBackOptions()).toEqual({
        canSwipe: true,
        canOnlySwipeFromEdge: false,
        backGestureDetectionWidth: 48,
        backGestureDetectionStartOffset: 0,
        minFlingVelocity: 1,
        droppedSwipeDurationMs: 500,
        direction: 'ltr',
      });
    });

    it('should keep explicit values', () => {
      const options = resolveSwipeBackOptions({
        canOnlySwipeFromEdge: true,
        backGestureDetectionWidth: 20,
        direction: 'rtl',
        transitionDurationMs: 300,
      });

      expect(options.canOnlySwipeFromEdge).toBe(true);
      expect(options.backGestureDetectionWidth).toBe(20);
      expect(options.direction).toBe('rtl');
      expect(options.transitionDurationMs).toBe(300);
    });

    it('should reject invalid values with a field-level issue list', () => {
      let caught: unknown;
      try {
        resolveSwipeBackOptions({ backGestureDetectionWidth: -1, minFlingVelocity: 0 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SwipeBackConfigError);
      const issues = caught instanceof SwipeBackConfigError ? caught.issues : [];
      expect(issues).toHaveLength(2);
      expect(issues[0]).toMatch(/^backGestureDetectionWidth: /);
      expect(issues[1]).toMatch(/^minFlingVelocity: /);
    });

    it('should reject unknown keys', () => {
      expect(() => resolveSwipeBackOptions({ swipeSpeed: 3 })).toThrow(SwipeBackConfigError);
    });

    it('should reject fractional durations', () => {
      expect(() => resolveSwipeBackOptions({ droppedSwipeDurationMs: 12.5 })).toThrow(
        /droppedSwipeDurationMs/
      );
    });
  });

  describe('mergeSwipeBackOptions', () => {
    it('should apply a partial update on top of resolved options', () => {
      const base = resolveSwipeBackOptions({ backGestureDetectionWidth: 30 });
      const merged = mergeSwipeBackOptions(base, { canSwipe: false });

      expect(merged.canSwipe).toBe(false);
      expect(merged.backGestureDetectionWidth).toBe(30);
    });

    it('should validate the merged result', () => {
      const base = resolveSwipeBackOptions();
      expect(() => mergeSwipeBackOptions(base, { minFlingVelocity: -2 })).toThrow(
        SwipeBackConfigError
      );
    });
  });

  describe('toGestureConfig', () => {
    it('should map option names onto the gesture config', () => {
      const options = resolveSwipeBackOptions({
        backGestureDetectionWidth: 24,
        backGestureDetectionStartOffset: 8,
      });

      expect(toGestureConfig(options)).toEqual({
        canSwipe: true,
        canOnlySwipeFromEdge: false,
        detectionWidth: 24,
        detectionStartOffset: 8,
        minFlingVelocity: 1,
        droppedSwipeDurationMs: 500,
        direction: 'ltr',
      });
    });
  });

  describe('resolveTransitionDurations', () => {
    it('should default both directions', () => {
      expect(resolveTransitionDurations(resolveSwipeBackOptions())).toEqual({
        forwardMs: 500,
        reverseMs: 500,
      });
    });

    it('should honor explicit overrides', () => {
      const options = resolveSwipeBackOptions({
        transitionDurationMs: 250,
        reverseTransitionDurationMs: 400,
      });
      expect(resolveTransitionDurations(options)).toEqual({ forwardMs: 250, reverseMs: 400 });
    });
  });

  describe('resolveDetectionArea', () => {
    it('should return null when gestures may start anywhere', () => {
      const config = toGestureConfig(resolveSwipeBackOptions());
      expect(resolveDetectionArea(config, { left: 30, right: 0 })).toBeNull();
    });

    it('should use the configured width when it exceeds the inset', () => {
      const config = toGestureConfig(
        resolveSwipeBackOptions({ canOnlySwipeFromEdge: true, backGestureDetectionStartOffset: 4 })
      );
      expect(resolveDetectionArea(config, { left: 20, right: 0 })).toEqual({
        startOffset: 4,
        width: 48,
      });
    });

    it('should widen the band to the leading inset', () => {
      const ltr = toGestureConfig(resolveSwipeBackOptions({ canOnlySwipeFromEdge: true }));
      const rtl = { ...ltr, direction: 'rtl' as const };
      const insets = { left: 60, right: 70 };

      expect(resolveDetectionArea(ltr, insets)?.width).toBe(60);
      expect(resolveDetectionArea(rtl, insets)?.width).toBe(70);
    });
  });
});
