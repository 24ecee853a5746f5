import { POINTER_STOPPED_MS, VELOCITY_SAMPLE_WINDOW_MS } from '../../shared/constants.js';

export interface Velocity {
  dx: number;
  dy: number;
}

interface PositionSample {
  x: number;
  y: number;
  time: number;
}

const ZERO_VELOCITY: Velocity = { dx: 0, dy: 0 };

/**
 * Estimates pointer velocity in px/s from recent positions.
 * Segment velocities inside the sample window are averaged with later
 * segments weighted higher.
 */
export class VelocityTracker {
  private samples: PositionSample[] = [];

  constructor(
    private readonly windowMs = VELOCITY_SAMPLE_WINDOW_MS,
    private readonly stoppedMs = POINTER_STOPPED_MS
  ) {}

  addPosition(time: number, x: number, y: number): void {
    this.samples.push({ x, y, time });
    this.dropSamplesBefore(time - this.windowMs);
  }

  /**
   * @param now - time of the query (usually the pointer-up event); defaults to
   *   the newest sample. A pointer that rested longer than the stop threshold
   *   before `now` has zero velocity.
   */
  estimate(now?: number): Velocity {
    if (this.samples.length === 0) return ZERO_VELOCITY;

    if (now !== undefined) {
      const newest = this.samples[this.samples.length - 1];
      if (now - newest.time > this.stoppedMs) return ZERO_VELOCITY;
      this.dropSamplesBefore(now - this.windowMs);
    }
    if (this.samples.length < 2) return ZERO_VELOCITY;

    let totalWeight = 0;
    let sumDx = 0;
    let sumDy = 0;
    for (let i = 1; i < this.samples.length; i++) {
      const previous = this.samples[i - 1];
      const current = this.samples[i];
      const dt = current.time - previous.time;
      if (dt <= 0) continue;

      const weight = i;
      sumDx += ((current.x - previous.x) / dt) * 1000 * weight;
      sumDy += ((current.y - previous.y) / dt) * 1000 * weight;
      totalWeight += weight;
    }

    if (totalWeight === 0) return ZERO_VELOCITY;
    return { dx: sumDx / totalWeight, dy: sumDy / totalWeight };
  }

  private dropSamplesBefore(cutoff: number): void {
    while (this.samples.length > 0 && this.samples[0].time < cutoff) {
      this.samples.shift();
    }
  }
}
