import type { AnimationStatus, ProgressAnimation } from '../utils/progress-animation.js';

export type ReadingDirection = 'ltr' | 'rtl';

/** Band near the leading edge where an edge-restricted gesture may start */
export interface DetectionArea {
  startOffset: number;
  width: number;
}

export interface SafeAreaInsets {
  left: number;
  right: number;
}

/**
 * Per-gesture settings, re-read on every pointer event
 */
export interface GestureConfig {
  canSwipe: boolean;
  canOnlySwipeFromEdge: boolean;
  detectionWidth: number;
  detectionStartOffset: number;
  /** Screen widths per second */
  minFlingVelocity: number;
  droppedSwipeDurationMs: number;
  direction: ReadingDirection;
}

/**
 * The navigator capabilities a back gesture needs
 */
export interface NavigatorHost {
  readonly userGestureInProgress: boolean;
  didStartUserGesture(): void;
  didStopUserGesture(): void;
  pop(): void;
}

/**
 * Read-only view of a route in a navigation stack. Implementations should
 * answer from live state: the gesture re-reads `isCurrent` and `isActive`
 * when it settles.
 */
export interface SwipeableRoute {
  readonly isFirst: boolean;
  readonly isCurrent: boolean;
  readonly isActive: boolean;
  readonly willHandlePopInternally: boolean;
  /** True when something on the page may veto a pop (unsaved form etc.) */
  readonly hasPopVeto: boolean;
  readonly fullscreenDialog: boolean;
  /** The route's own transition; 1 = fully shown, 0 = fully dismissed */
  readonly animation: ProgressAnimation;
  /** Status of the transition of the route pushed on top of this one */
  readonly secondaryStatus: AnimationStatus;
  readonly navigator: NavigatorHost;
}

export type GesturePhase = 'idle' | 'dragging' | 'resolving';
