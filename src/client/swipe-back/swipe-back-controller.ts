/**
 * Swipe Back Controller
 *
 * Lit reactive controller that makes a page element swipeable: it owns the
 * gesture coordinator for the page's route, listens to pointer events on the
 * host and re-renders the host as the transition value or gesture phase
 * changes. Rendering the transition itself is left to the host.
 */

import type { ReactiveController, ReactiveControllerHost } from 'lit';
import { type Curve, fastLinearToSlowEaseIn } from '../utils/curves.js';
import { createLogger } from '../utils/logger.js';
import type { AnimationOutcome } from '../utils/progress-animation.js';
import {
  mergeSwipeBackOptions,
  resolveSwipeBackOptions,
  resolveTransitionDurations,
  type SwipeBackOptions,
  type SwipeBackOptionsInput,
  toGestureConfig,
} from './config.js';
import { checkContract } from './errors.js';
import { BackGestureCoordinator } from './gesture-coordinator.js';
import { SwipeBackRecognizer } from './swipe-back-recognizer.js';
import type { GestureConfig, GesturePhase, SafeAreaInsets, SwipeableRoute } from './types.js';

const logger = createLogger('swipe-back-controller');

export type SwipeBackHost = ReactiveControllerHost & HTMLElement;

export interface SwipeBackControllerInit {
  route: SwipeableRoute;
  options?: SwipeBackOptionsInput;
  /** Curve for programmatic push/pop transitions */
  transitionCurve?: Curve;
  /** Curve for settling a released swipe */
  settleCurve?: Curve;
  safeAreaInsets?: () => SafeAreaInsets;
  /** Defaults to the host's rendered width */
  surfaceWidth?: () => number;
}

export class SwipeBackController implements ReactiveController {
  readonly coordinator: BackGestureCoordinator;
  private readonly recognizer: SwipeBackRecognizer;
  private readonly route: SwipeableRoute;
  private readonly transitionCurve: Curve;
  private currentOptions: SwipeBackOptions;
  private config: GestureConfig;
  private unsubscribers: Array<() => void> = [];

  constructor(
    private readonly host: SwipeBackHost,
    init: SwipeBackControllerInit
  ) {
    this.route = init.route;
    this.transitionCurve = init.transitionCurve ?? fastLinearToSlowEaseIn;
    this.currentOptions = resolveSwipeBackOptions(init.options ?? {});
    this.config = toGestureConfig(this.currentOptions);

    this.coordinator = new BackGestureCoordinator({
      route: init.route,
      config: () => this.config,
      settleCurve: init.settleCurve,
    });
    this.recognizer = new SwipeBackRecognizer({
      coordinator: this.coordinator,
      config: () => this.config,
      surfaceWidth: init.surfaceWidth ?? (() => host.getBoundingClientRect().width),
      safeAreaInsets: init.safeAreaInsets,
    });

    host.addController(this);
  }

  hostConnected(): void {
    this.recognizer.attach(this.host);
    // Vertical scrolling stays with the browser
    this.host.style.setProperty('touch-action', 'pan-y');
    this.unsubscribers.push(
      this.route.animation.addListener(() => this.host.requestUpdate()),
      this.coordinator.addStateListener(() => this.host.requestUpdate())
    );
  }

  hostDisconnected(): void {
    this.recognizer.detach();
    this.coordinator.onDragCancel();
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
  }

  get options(): SwipeBackOptions {
    return this.currentOptions;
  }

  /** The route's transition value; 1 = fully shown */
  get progress(): number {
    return this.route.animation.value;
  }

  get phase(): GesturePhase {
    return this.coordinator.phase;
  }

  /** True while a user gesture drives the transition; hosts should interpolate linearly */
  get isSwipeGesture(): boolean {
    return this.route.navigator.userGestureInProgress;
  }

  canStartGesture(): boolean {
    return this.coordinator.canStartGesture();
  }

  /**
   * Merge option changes; they apply from the next pointer event.
   * @throws SwipeBackConfigError and keeps the previous options
   */
  updateOptions(update: SwipeBackOptionsInput): void {
    this.currentOptions = mergeSwipeBackOptions(this.currentOptions, update);
    this.config = toGestureConfig(this.currentOptions);
    logger.debug('Options updated', update);
    this.host.requestUpdate();
  }

  playEnterTransition(): Promise<AnimationOutcome> {
    return this.playTransition(1, resolveTransitionDurations(this.currentOptions).forwardMs);
  }

  playExitTransition(): Promise<AnimationOutcome> {
    return this.playTransition(0, resolveTransitionDurations(this.currentOptions).reverseMs);
  }

  private playTransition(target: 0 | 1, durationMs: number): Promise<AnimationOutcome> {
    if (!checkContract(this.coordinator.phase === 'idle', 'transition played during a back gesture')) {
      return Promise.resolve('interrupted');
    }
    return this.route.animation.animateTo(target, { durationMs, curve: this.transitionCurve });
  }
}
