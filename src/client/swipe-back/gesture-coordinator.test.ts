import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeFrameScheduler } from '../../test/utils/fake-frame-scheduler.js';
import { createRouteOnStack, type FakeNavigator, type FakeRoute } from '../../test/utils/fake-navigation.js';
import { resolveSwipeBackOptions, toGestureConfig } from './config.js';
import { GestureContractError } from './errors.js';
import { BackGestureCoordinator, toLogical } from './gesture-coordinator.js';
import type { GestureConfig } from './types.js';

describe('BackGestureCoordinator', () => {
  let scheduler: FakeFrameScheduler;
  let navigator: FakeNavigator;
  let route: FakeRoute;
  let config: GestureConfig;
  let coordinator: BackGestureCoordinator;

  beforeEach(() => {
    scheduler = new FakeFrameScheduler();
    ({ navigator, route } = createRouteOnStack(scheduler));
    config = toGestureConfig(resolveSwipeBackOptions());
    coordinator = new BackGestureCoordinator({ route, config: () => config });
  });

  it('should convert raw values to logical values by reading direction', () => {
    expect(toLogical(0.5, 'ltr')).toBe(0.5);
    expect(toLogical(0.5, 'rtl')).toBe(-0.5);
  });

  describe('eligibility', () => {
    it('should allow starting on a settled route', () => {
      expect(coordinator.canStartGesture()).toBe(true);
    });

    it('should follow the swipe flag as it changes', () => {
      config = { ...config, canSwipe: false };
      expect(coordinator.canStartGesture()).toBe(false);

      config = { ...config, canSwipe: true };
      expect(coordinator.canStartGesture()).toBe(true);
    });

    it('should refuse a new gesture while one holds the navigator', () => {
      coordinator.onDragStart();
      expect(coordinator.canStartGesture()).toBe(false);
    });
  });

  describe('lifecycle', () => {
    it('should move through dragging and resolving back to idle', async () => {
      const phases: string[] = [];
      coordinator.addStateListener(() => phases.push(coordinator.phase));

      coordinator.onDragStart();
      expect(coordinator.isTracking).toBe(true);
      coordinator.onDragUpdate(0.75);
      coordinator.onDragEnd({ dx: 0, dy: 0 });

      expect(coordinator.state).toMatchObject({ kind: 'resolving', target: 0, durationMs: 175 });
      expect(coordinator.isTracking).toBe(false);

      scheduler.advance(175);
      await coordinator.whenSettled();

      expect(phases).toEqual(['dragging', 'resolving', 'idle']);
      expect(navigator.pop).toHaveBeenCalledTimes(1);
      expect(navigator.userGestureInProgress).toBe(false);
    });

    it('should use horizontal release velocity for flings', async () => {
      coordinator.onDragStart();
      coordinator.onDragUpdate(0.25);
      coordinator.onDragEnd({ dx: 2, dy: 0.5 });

      expect(coordinator.state).toMatchObject({ kind: 'resolving', target: 0, durationMs: 325 });
      scheduler.advance(325);
      await coordinator.whenSettled();
      expect(navigator.pop).toHaveBeenCalledTimes(1);
    });

    it('should ignore release velocity that is mostly vertical', () => {
      coordinator.onDragStart();
      coordinator.onDragUpdate(0.25);
      coordinator.onDragEnd({ dx: 3, dy: -4 });

      expect(coordinator.state).toMatchObject({ kind: 'resolving', target: 1, durationMs: 175 });
    });

    it('should mirror deltas and velocities for right-to-left pages', async () => {
      config = { ...config, direction: 'rtl' };

      coordinator.onDragStart();
      coordinator.onDragUpdate(-0.25);
      expect(route.animation.value).toBe(0.75);

      coordinator.onDragEnd({ dx: -2, dy: 0 });
      expect(coordinator.state).toMatchObject({ kind: 'resolving', target: 0 });

      scheduler.advance(500);
      await coordinator.whenSettled();
      expect(navigator.pop).toHaveBeenCalledTimes(1);
    });

    it('should settle a cancelled drag as a zero-velocity release', async () => {
      coordinator.onDragStart();
      coordinator.onDragUpdate(0.75);
      coordinator.onDragCancel();

      expect(coordinator.state).toMatchObject({ kind: 'resolving', target: 0, durationMs: 175 });
      scheduler.advance(175);
      await coordinator.whenSettled();
      expect(coordinator.phase).toBe('idle');
      expect(navigator.pop).toHaveBeenCalledTimes(1);
    });

    it('should treat a cancel without a gesture as a no-op', async () => {
      const listener = vi.fn();
      coordinator.addStateListener(listener);

      coordinator.onDragCancel();
      await coordinator.whenSettled();

      expect(coordinator.phase).toBe('idle');
      expect(listener).not.toHaveBeenCalled();
      expect(navigator.startCalls).toBe(0);
      expect(navigator.pop).not.toHaveBeenCalled();
    });

    it('should cancel an active drag on dispose', () => {
      coordinator.onDragStart();
      coordinator.onDragUpdate(0.25);

      coordinator.dispose();

      expect(coordinator.state).toMatchObject({ kind: 'resolving', target: 1 });
    });

    it('should stop notifying removed listeners', () => {
      const listener = vi.fn();
      const unsubscribe = coordinator.addStateListener(listener);
      unsubscribe();

      coordinator.onDragStart();

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('contract', () => {
    it('should reject a second start while dragging', () => {
      coordinator.onDragStart();
      expect(() => coordinator.onDragStart()).toThrow(GestureContractError);
      expect(navigator.startCalls).toBe(1);
    });

    it('should reject a start while the previous gesture is resolving', () => {
      coordinator.onDragStart();
      coordinator.onDragUpdate(0.75);
      coordinator.onDragEnd({ dx: 0, dy: 0 });

      expect(() => coordinator.onDragStart()).toThrow(GestureContractError);
    });

    it('should reject updates and releases without a gesture', () => {
      expect(() => coordinator.onDragUpdate(0.1)).toThrow(GestureContractError);
      expect(() => coordinator.onDragEnd({ dx: 1, dy: 0 })).toThrow(GestureContractError);
    });
  });
});
