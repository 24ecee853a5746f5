/**
 * Swipe Back Recognizer
 *
 * Turns pointer events on a surface into drag callbacks on a
 * BackGestureCoordinator. One pointer lineage is followed at a time; every
 * sample goes through the drag gate, and a pending pointer becomes a drag
 * once it travels past the pan slop horizontally.
 *
 * A started drag captures its pointer, and the owning document is watched for
 * the release, so a pointer lifted outside the surface still ends the drag.
 */

import { PRECISE_POINTER_PAN_SLOP, TOUCH_PAN_SLOP } from '../../shared/constants.js';
import { createLogger } from '../utils/logger.js';
import { VelocityTracker } from '../utils/velocity-tracker.js';
import { NO_SAFE_AREA, resolveDetectionArea } from './config.js';
import { type GateContext, type PointerSample, shouldHandlePointer } from './drag-gate.js';
import type { BackGestureCoordinator } from './gesture-coordinator.js';
import type { GestureConfig, SafeAreaInsets } from './types.js';

const logger = createLogger('swipe-back-recognizer');

export interface PointerInput {
  pointerId: number;
  pointerType: string;
  /** Position relative to the surface's top-left corner, in px */
  x: number;
  y: number;
  /** Event time in ms */
  time: number;
}

export interface SwipeBackRecognizerOptions {
  coordinator: BackGestureCoordinator;
  config: () => GestureConfig;
  surfaceWidth: () => number;
  safeAreaInsets?: () => SafeAreaInsets;
  panSlop?: (pointerType: string) => number;
}

interface TrackedPointer {
  pointerId: number;
  pointerType: string;
  lastX: number;
  lastY: number;
  pendingDx: number;
  accepted: boolean;
  velocity: VelocityTracker;
}

export function defaultPanSlop(pointerType: string): number {
  return pointerType === 'mouse' || pointerType === 'pen' ? PRECISE_POINTER_PAN_SLOP : TOUCH_PAN_SLOP;
}

export class SwipeBackRecognizer {
  private tracked: TrackedPointer | null = null;
  private element: HTMLElement | null = null;
  private releaseTarget: Document | null = null;

  // Bound once so detach removes the same references
  private boundHandlePointerDown: (event: PointerEvent) => void;
  private boundHandlePointerMove: (event: PointerEvent) => void;
  private boundHandlePointerUp: (event: PointerEvent) => void;
  private boundHandlePointerCancel: (event: PointerEvent) => void;

  constructor(private readonly options: SwipeBackRecognizerOptions) {
    this.boundHandlePointerDown = this.handlePointerDown.bind(this);
    this.boundHandlePointerMove = this.handlePointerMove.bind(this);
    this.boundHandlePointerUp = this.handlePointerUp.bind(this);
    this.boundHandlePointerCancel = this.handlePointerCancel.bind(this);
  }

  get isTrackingPointer(): boolean {
    return this.tracked !== null;
  }

  /**
   * @returns whether the pointer is now being followed
   */
  addPointer(input: PointerInput): boolean {
    if (this.tracked) return false;

    if (!shouldHandlePointer({ phase: 'down', dx: 0, x: input.x }, this.gateContext())) {
      return false;
    }

    const velocity = new VelocityTracker();
    velocity.addPosition(input.time, input.x, input.y);
    this.tracked = {
      pointerId: input.pointerId,
      pointerType: input.pointerType,
      lastX: input.x,
      lastY: input.y,
      pendingDx: 0,
      accepted: false,
      velocity,
    };
    this.watchRelease();
    return true;
  }

  movePointer(input: PointerInput): void {
    const tracked = this.tracked;
    if (!tracked || tracked.pointerId !== input.pointerId) return;

    const dx = input.x - tracked.lastX;
    const sample: PointerSample = { phase: 'move', dx, x: input.x };
    if (!shouldHandlePointer(sample, this.gateContext())) {
      this.stopTracking();
      return;
    }

    tracked.lastX = input.x;
    tracked.lastY = input.y;
    tracked.velocity.addPosition(input.time, input.x, input.y);

    if (tracked.accepted) {
      this.options.coordinator.onDragUpdate(this.toFraction(dx));
      return;
    }

    tracked.pendingDx += dx;
    const slop = (this.options.panSlop ?? defaultPanSlop)(tracked.pointerType);
    if (Math.abs(tracked.pendingDx) > slop) {
      this.acceptDrag(tracked, slop);
    }
  }

  releasePointer(input: Pick<PointerInput, 'pointerId' | 'time'>): void {
    const tracked = this.tracked;
    if (!tracked || tracked.pointerId !== input.pointerId) return;

    this.endTracking();
    const { coordinator } = this.options;
    if (tracked.accepted && coordinator.isTracking) {
      const velocity = tracked.velocity.estimate(input.time);
      coordinator.onDragEnd({
        dx: this.toFraction(velocity.dx),
        dy: this.toFraction(velocity.dy),
      });
    } else {
      coordinator.onDragCancel();
    }
  }

  cancelPointer(input: Pick<PointerInput, 'pointerId'>): void {
    const tracked = this.tracked;
    if (!tracked || tracked.pointerId !== input.pointerId) return;

    this.stopTracking();
  }

  attach(element: HTMLElement): void {
    this.detach();
    this.element = element;
    element.addEventListener('pointerdown', this.boundHandlePointerDown, { passive: true });
    element.addEventListener('pointermove', this.boundHandlePointerMove, { passive: true });
    element.addEventListener('pointerup', this.boundHandlePointerUp, { passive: true });
    element.addEventListener('pointercancel', this.boundHandlePointerCancel, { passive: true });
    element.addEventListener('lostpointercapture', this.boundHandlePointerCancel, {
      passive: true,
    });
  }

  detach(): void {
    const element = this.element;
    if (!element) return;

    this.stopTracking();
    element.removeEventListener('pointerdown', this.boundHandlePointerDown);
    element.removeEventListener('pointermove', this.boundHandlePointerMove);
    element.removeEventListener('pointerup', this.boundHandlePointerUp);
    element.removeEventListener('pointercancel', this.boundHandlePointerCancel);
    element.removeEventListener('lostpointercapture', this.boundHandlePointerCancel);
    this.element = null;
  }

  private acceptDrag(tracked: TrackedPointer, slop: number): void {
    const { coordinator } = this.options;
    if (!coordinator.canStartGesture()) {
      this.stopTracking();
      return;
    }

    tracked.accepted = true;
    coordinator.onDragStart();
    if (!coordinator.isTracking) {
      this.stopTracking();
      return;
    }
    this.capturePointer(tracked.pointerId);

    // Only the travel beyond the slop moves the page
    const excess = Math.sign(tracked.pendingDx) * (Math.abs(tracked.pendingDx) - slop);
    if (excess !== 0) {
      coordinator.onDragUpdate(this.toFraction(excess));
    }
  }

  private stopTracking(): void {
    if (!this.endTracking()) return;
    this.options.coordinator.onDragCancel();
  }

  private endTracking(): TrackedPointer | null {
    const tracked = this.tracked;
    if (!tracked) return null;

    // Cleared first so the lostpointercapture this triggers is ignored
    this.tracked = null;
    this.unwatchRelease();
    if (tracked.accepted) {
      this.releaseCapture(tracked.pointerId);
    }
    return tracked;
  }

  private watchRelease(): void {
    const doc = this.element?.ownerDocument;
    if (!doc) return;

    this.releaseTarget = doc;
    doc.addEventListener('pointerup', this.boundHandlePointerUp, { passive: true });
    doc.addEventListener('pointercancel', this.boundHandlePointerCancel, { passive: true });
  }

  private unwatchRelease(): void {
    const doc = this.releaseTarget;
    if (!doc) return;

    doc.removeEventListener('pointerup', this.boundHandlePointerUp);
    doc.removeEventListener('pointercancel', this.boundHandlePointerCancel);
    this.releaseTarget = null;
  }

  private capturePointer(pointerId: number): void {
    const element = this.element;
    if (!element) return;

    try {
      element.setPointerCapture(pointerId);
    } catch (error) {
      // Synthetic or already-lifted pointers cannot be captured
      logger.debug('Pointer capture unavailable:', error);
    }
  }

  private releaseCapture(pointerId: number): void {
    const element = this.element;
    if (!element) return;

    try {
      if (element.hasPointerCapture(pointerId)) {
        element.releasePointerCapture(pointerId);
      }
    } catch (error) {
      logger.debug('Pointer capture release failed:', error);
    }
  }

  private gateContext(): GateContext {
    const config = this.options.config();
    const { coordinator } = this.options;
    return {
      isTracking: coordinator.isTracking,
      isEnabled: coordinator.canStartGesture(),
      direction: config.direction,
      detectionArea: resolveDetectionArea(config, this.options.safeAreaInsets?.() ?? NO_SAFE_AREA),
      surfaceWidth: this.options.surfaceWidth(),
    };
  }

  private toFraction(px: number): number {
    const width = this.options.surfaceWidth();
    return width > 0 ? px / width : 0;
  }

  private toInput(event: PointerEvent): PointerInput {
    const rect = this.element?.getBoundingClientRect();
    return {
      pointerId: event.pointerId,
      pointerType: event.pointerType,
      x: event.clientX - (rect?.left ?? 0),
      y: event.clientY - (rect?.top ?? 0),
      time: event.timeStamp,
    };
  }

  private handlePointerDown(event: PointerEvent): void {
    try {
      this.addPointer(this.toInput(event));
    } catch (error) {
      logger.warn('Error in handlePointerDown:', error);
      this.stopTracking();
    }
  }

  private handlePointerMove(event: PointerEvent): void {
    try {
      this.movePointer(this.toInput(event));
    } catch (error) {
      logger.warn('Error in handlePointerMove:', error);
      this.stopTracking();
    }
  }

  private handlePointerUp(event: PointerEvent): void {
    try {
      this.releasePointer({ pointerId: event.pointerId, time: event.timeStamp });
    } catch (error) {
      logger.warn('Error in handlePointerUp:', error);
      this.stopTracking();
    }
  }

  private handlePointerCancel(event: PointerEvent): void {
    try {
      this.cancelPointer(event);
    } catch (error) {
      logger.warn('Error in handlePointerCancel:', error);
      this.endTracking();
    }
  }
}
