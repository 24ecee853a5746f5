import type { Curve } from '../utils/curves.js';
import { BackGestureController } from './back-gesture-controller.js';
import { checkContract } from './errors.js';
import type { GestureConfig, SwipeableRoute } from './types.js';

export type ReleaseSettings = Pick<GestureConfig, 'minFlingVelocity' | 'droppedSwipeDurationMs'> & {
  settleCurve?: Curve;
};

/**
 * Whether a back swipe may start on `route` right now
 */
export function isPopGestureEnabled(route: SwipeableRoute, canSwipe: boolean): boolean {
  // Nothing to go back to
  if (route.isFirst) return false;
  // Popping would only unwind the route's own history entries
  if (route.willHandlePopInternally) return false;
  // Pages that may refuse to close (forms etc.) are not swipeable
  if (route.hasPopVeto) return false;
  if (route.fullscreenDialog) return false;
  // Still entering or leaving
  if (route.animation.status !== 'completed') return false;
  // A route above is still popping into this one
  if (route.secondaryStatus !== 'dismissed') return false;
  if (route.navigator.userGestureInProgress) return false;

  return canSwipe;
}

/**
 * Begin a back gesture on `route`. The caller must have checked
 * {@link isPopGestureEnabled}.
 */
export function startPopGesture(
  route: SwipeableRoute,
  settings: ReleaseSettings
): BackGestureController | null {
  if (!checkContract(isPopGestureEnabled(route, true), 'back gesture started on an ineligible route')) {
    return null;
  }

  return new BackGestureController({
    navigator: route.navigator,
    animation: route.animation,
    getIsCurrent: () => route.isCurrent,
    getIsActive: () => route.isActive,
    minFlingVelocity: settings.minFlingVelocity,
    droppedSwipeDurationMs: settings.droppedSwipeDurationMs,
    curve: settings.settleCurve,
  });
}
