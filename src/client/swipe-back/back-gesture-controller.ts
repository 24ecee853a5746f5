/**
 * Back Gesture Controller
 *
 * Couples one drag to the route's transition value and settles it on
 * release. Lives from drag start until the settle animation ends, and is the
 * only thing holding the navigator's "user gesture in progress" flag.
 */

import { type Curve, decelerate } from '../utils/curves.js';
import { createLogger } from '../utils/logger.js';
import type { AnimationOutcome, ProgressAnimation } from '../utils/progress-animation.js';
import { checkContract } from './errors.js';
import { planRelease, type ReleasePlan } from './release-resolver.js';
import type { NavigatorHost } from './types.js';

const logger = createLogger('back-gesture');

export interface BackGestureControllerOptions {
  navigator: NavigatorHost;
  animation: ProgressAnimation;
  getIsCurrent: () => boolean;
  getIsActive: () => boolean;
  minFlingVelocity: number;
  droppedSwipeDurationMs: number;
  /** Settle curve; decelerate avoids a long, input-blocking tail */
  curve?: Curve;
}

export interface ReleaseOutcome extends ReleasePlan {
  outcome: AnimationOutcome;
  popped: boolean;
}

export class BackGestureController {
  private released = false;
  private readonly settled: Promise<ReleaseOutcome>;
  private resolveSettled: (result: ReleaseOutcome) => void = () => {};

  constructor(private readonly options: BackGestureControllerOptions) {
    this.settled = new Promise<ReleaseOutcome>((resolve) => {
      this.resolveSettled = resolve;
    });
    options.navigator.didStartUserGesture();
    logger.debug(`Back gesture started at ${options.animation.value}`);
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * The drag moved by `delta` logical screen widths; positive moves toward
   * dismissing the page.
   */
  dragUpdate(delta: number): void {
    if (!checkContract(!this.released, 'dragUpdate called after the gesture was released')) return;
    this.options.animation.value -= delta;
  }

  /**
   * The drag ended with `velocity` logical screen widths per second.
   * @returns the settle plan, or null when the call was rejected as a contract violation
   */
  dragEnd(velocity: number): ReleasePlan | null {
    if (!checkContract(!this.released, 'dragEnd called twice for one gesture')) return null;
    this.released = true;

    const { animation, navigator } = this.options;
    const isCurrent = this.options.getIsCurrent();
    const plan = planRelease(
      {
        velocity,
        value: animation.value,
        isCurrent,
        isActive: this.options.getIsActive(),
        minFlingVelocity: this.options.minFlingVelocity,
      },
      this.options.droppedSwipeDurationMs
    );
    logger.debug(
      `Released at ${animation.value} with velocity ${velocity}: ` +
        `${plan.shouldReverse ? 'restoring' : 'dismissing'} over ${plan.durationMs}ms`
    );

    const settling = animation.animateTo(plan.target, {
      durationMs: plan.durationMs,
      curve: this.options.curve ?? decelerate,
    });

    // Keep the gesture flag up while animating so visuals stay linear mid-flight
    const stopAfterSettle = animation.isAnimating;
    if (!stopAfterSettle) {
      navigator.didStopUserGesture();
    }

    void settling
      .then((outcome) => this.finishRelease(plan, outcome, isCurrent, stopAfterSettle))
      .catch((error: unknown): ReleaseOutcome => {
        logger.error('Failed to settle back gesture:', error);
        return { ...plan, outcome: 'completed', popped: false };
      })
      .then(this.resolveSettled);

    return plan;
  }

  /** Resolves once the settle animation reached a terminal status */
  whenSettled(): Promise<ReleaseOutcome> {
    return this.settled;
  }

  private finishRelease(
    plan: ReleasePlan,
    outcome: AnimationOutcome,
    wasCurrent: boolean,
    stopAfterSettle: boolean
  ): ReleaseOutcome {
    const { navigator } = this.options;
    if (stopAfterSettle) {
      navigator.didStopUserGesture();
    }

    // Pop only for a finished dismissal of a page nobody navigated away from
    let popped = false;
    if (!plan.shouldReverse && outcome === 'completed' && wasCurrent && this.options.getIsCurrent()) {
      navigator.pop();
      popped = true;
    }

    logger.debug(`Back gesture settled (${outcome}), popped: ${popped}`);
    return { ...plan, outcome, popped };
  }
}
