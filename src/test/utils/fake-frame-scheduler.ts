import type { FrameScheduler } from '../../client/utils/frame-scheduler.js';

/**
 * Manually pumped frame scheduler with its own clock
 */
export class FakeFrameScheduler implements FrameScheduler {
  private time = 0;
  private nextId = 1;
  private callbacks = new Map<number, () => void>();

  now(): number {
    return this.time;
  }

  requestFrame(callback: () => void): () => void {
    const id = this.nextId++;
    this.callbacks.set(id, callback);
    return () => {
      this.callbacks.delete(id);
    };
  }

  get pendingFrames(): number {
    return this.callbacks.size;
  }

  /** Moves the clock forward in frame-sized steps, running due frames after each step */
  advance(ms: number, frameMs = 16): void {
    let remaining = ms;
    while (remaining > 0) {
      const step = Math.min(frameMs, remaining);
      this.time += step;
      remaining -= step;
      this.flush();
    }
  }

  flush(): void {
    const due = [...this.callbacks.values()];
    this.callbacks.clear();
    for (const callback of due) {
      callback();
    }
  }
}

/** Lets promise continuations queued by settled animations run */
export function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
