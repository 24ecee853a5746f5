/**
 * Gesture Lifecycle Coordinator
 *
 * Bridges drag recognizer callbacks to a per-gesture BackGestureController:
 *
 *   idle --start--> active --update--> active
 *   active --end/cancel--> resolving --settled--> idle
 *
 * Raw deltas and velocities arrive as fractions of the surface width and are
 * converted to logical values (positive = toward dismissing) here.
 */

import type { Curve } from '../utils/curves.js';
import { createLogger } from '../utils/logger.js';
import type { BackGestureController } from './back-gesture-controller.js';
import { checkContract } from './errors.js';
import { isPopGestureEnabled, startPopGesture } from './pop-gesture.js';
import type { GestureConfig, GesturePhase, ReadingDirection, SwipeableRoute } from './types.js';

const logger = createLogger('gesture-coordinator');

export type GestureState =
  | { kind: 'idle' }
  | { kind: 'active'; controller: BackGestureController }
  | { kind: 'resolving'; controller: BackGestureController; target: 0 | 1; durationMs: number };

/** Release velocity in surface widths per second */
export interface ReleaseVelocity {
  dx: number;
  dy: number;
}

export type GestureStateListener = (state: GestureState) => void;

export interface BackGestureCoordinatorOptions {
  route: SwipeableRoute;
  /** Read again on every call so config changes apply between events */
  config: () => GestureConfig;
  settleCurve?: Curve;
}

const IDLE: GestureState = { kind: 'idle' };

export function toLogical(value: number, direction: ReadingDirection): number {
  return direction === 'rtl' ? -value : value;
}

export class BackGestureCoordinator {
  private current: GestureState = IDLE;
  private settling: Promise<void> = Promise.resolve();
  private listeners = new Set<GestureStateListener>();

  constructor(private readonly options: BackGestureCoordinatorOptions) {}

  get state(): GestureState {
    return this.current;
  }

  get phase(): GesturePhase {
    switch (this.current.kind) {
      case 'idle':
        return 'idle';
      case 'active':
        return 'dragging';
      case 'resolving':
        return 'resolving';
    }
  }

  /** True while a drag is being followed; such drags bypass the gate */
  get isTracking(): boolean {
    return this.current.kind === 'active';
  }

  canStartGesture(): boolean {
    return isPopGestureEnabled(this.options.route, this.options.config().canSwipe);
  }

  onDragStart(): void {
    if (!checkContract(this.current.kind === 'idle', 'drag started while a back gesture is in flight')) {
      return;
    }

    const config = this.options.config();
    const controller = startPopGesture(this.options.route, {
      minFlingVelocity: config.minFlingVelocity,
      droppedSwipeDurationMs: config.droppedSwipeDurationMs,
      settleCurve: this.options.settleCurve,
    });
    if (!controller) return;

    this.setState({ kind: 'active', controller });
  }

  onDragUpdate(rawDeltaFraction: number): void {
    const state = this.current;
    if (state.kind !== 'active') {
      checkContract(false, 'drag update without an active back gesture');
      return;
    }

    state.controller.dragUpdate(toLogical(rawDeltaFraction, this.options.config().direction));
  }

  onDragEnd(velocity: ReleaseVelocity): void {
    const state = this.current;
    if (state.kind !== 'active') {
      checkContract(false, 'drag end without an active back gesture');
      return;
    }

    // Mostly vertical releases settle by position only
    const isHorizontalEnough = Math.abs(velocity.dx) > Math.abs(velocity.dy);
    const logicalVelocity = isHorizontalEnough
      ? toLogical(velocity.dx, this.options.config().direction)
      : 0;
    this.release(state.controller, logicalVelocity);
  }

  /**
   * Pointer lost or gesture preempted. May arrive without a preceding start,
   * in which case there is nothing to do.
   */
  onDragCancel(): void {
    const state = this.current;
    if (state.kind !== 'active') return;

    logger.debug('Back gesture cancelled, settling by position');
    this.release(state.controller, 0);
  }

  /** Resolves when the most recent release has settled */
  whenSettled(): Promise<void> {
    return this.settling;
  }

  addStateListener(listener: GestureStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.onDragCancel();
    this.listeners.clear();
  }

  private release(controller: BackGestureController, velocity: number): void {
    const plan = controller.dragEnd(velocity);
    if (!plan) {
      this.setState(IDLE);
      return;
    }

    this.setState({
      kind: 'resolving',
      controller,
      target: plan.target,
      durationMs: plan.durationMs,
    });
    this.settling = controller.whenSettled().then((result) => {
      logger.debug(`Gesture resolved: ${result.popped ? 'popped' : 'stayed'} (${result.outcome})`);
      if (this.current.kind === 'resolving' && this.current.controller === controller) {
        this.setState(IDLE);
      }
    });
  }

  private setState(next: GestureState): void {
    this.current = next;
    for (const listener of this.listeners) {
      try {
        listener(next);
      } catch (error) {
        logger.error('Error in gesture state listener:', error);
      }
    }
  }
}
