/**
 * Progress Animation
 *
 * An owned scalar in [0, 1] that can be set directly (while the user drags)
 * or driven toward a target over time. `animateTo` returns a promise that
 * settles with the terminal outcome instead of exposing status listeners.
 */

import { type Curve, linear } from './curves.js';
import { defaultFrameScheduler, type FrameScheduler } from './frame-scheduler.js';
import { createLogger } from './logger.js';

const logger = createLogger('progress-animation');

export type AnimationStatus = 'dismissed' | 'forward' | 'reverse' | 'completed';

/** `interrupted` when stopped, re-targeted or overwritten before reaching its target */
export type AnimationOutcome = 'completed' | 'interrupted';

export interface AnimateOptions {
  durationMs: number;
  curve?: Curve;
}

export type ProgressListener = (value: number) => void;

export interface ProgressAnimationOptions {
  value?: number;
  scheduler?: FrameScheduler;
}

type Direction = 'forward' | 'reverse';

interface RunningAnimation {
  begin: number;
  target: number;
  startTime: number;
  durationMs: number;
  curve: Curve;
  cancelFrame: () => void;
  resolve: (outcome: AnimationOutcome) => void;
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export class ProgressAnimation {
  private currentValue: number;
  private currentStatus: AnimationStatus;
  private direction: Direction = 'forward';
  private running: RunningAnimation | null = null;
  private listeners = new Set<ProgressListener>();
  private readonly scheduler: FrameScheduler;

  constructor(options: ProgressAnimationOptions = {}) {
    this.scheduler = options.scheduler ?? defaultFrameScheduler;
    this.currentValue = clampUnit(options.value ?? 0);
    this.currentStatus = this.statusForValue();
  }

  get value(): number {
    return this.currentValue;
  }

  /** Jumps to `next` (clamped), interrupting any running animation */
  set value(next: number) {
    this.stop();
    this.setValueInternal(next);
  }

  get status(): AnimationStatus {
    return this.currentStatus;
  }

  get isAnimating(): boolean {
    return this.running !== null;
  }

  animateTo(target: number, options: AnimateOptions): Promise<AnimationOutcome> {
    this.stop();

    const to = clampUnit(target);
    if (to > this.currentValue) {
      this.direction = 'forward';
    } else if (to < this.currentValue) {
      this.direction = 'reverse';
    } else if (to >= 1) {
      this.direction = 'forward';
    } else if (to <= 0) {
      this.direction = 'reverse';
    }

    if (options.durationMs <= 0 || to === this.currentValue) {
      this.setValueInternal(to);
      this.currentStatus = this.settledStatus();
      return Promise.resolve('completed');
    }

    this.currentStatus = this.direction;
    return new Promise<AnimationOutcome>((resolve) => {
      const run: RunningAnimation = {
        begin: this.currentValue,
        target: to,
        startTime: this.scheduler.now(),
        durationMs: options.durationMs,
        curve: options.curve ?? linear,
        cancelFrame: () => {},
        resolve,
      };
      this.running = run;
      this.scheduleFrame(run);
    });
  }

  stop(): void {
    const run = this.running;
    if (!run) return;

    this.running = null;
    run.cancelFrame();
    run.resolve('interrupted');
  }

  addListener(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.stop();
    this.listeners.clear();
  }

  private scheduleFrame(run: RunningAnimation): void {
    run.cancelFrame = this.scheduler.requestFrame(() => this.tick(run));
  }

  private tick(run: RunningAnimation): void {
    if (this.running !== run) return;

    const elapsed = this.scheduler.now() - run.startTime;
    const t = Math.min(1, elapsed / run.durationMs);

    if (t >= 1) {
      this.running = null;
      this.setValueInternal(run.target);
      this.currentStatus = this.settledStatus();
      run.resolve('completed');
      return;
    }

    this.setValueInternal(run.begin + (run.target - run.begin) * run.curve(t));
    // A listener may have stopped or replaced this run
    if (this.running === run) {
      this.scheduleFrame(run);
    }
  }

  private setValueInternal(next: number): void {
    const clamped = clampUnit(next);
    const changed = clamped !== this.currentValue;
    this.currentValue = clamped;
    if (!this.running) {
      this.currentStatus = this.statusForValue();
    }
    if (changed) {
      this.notifyListeners();
    }
  }

  private statusForValue(): AnimationStatus {
    if (this.currentValue <= 0) return 'dismissed';
    if (this.currentValue >= 1) return 'completed';
    return this.direction;
  }

  private settledStatus(): AnimationStatus {
    return this.direction === 'forward' ? 'completed' : 'dismissed';
  }

  private notifyListeners(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.currentValue);
      } catch (error) {
        logger.error('Error in progress listener:', error);
      }
    }
  }
}
