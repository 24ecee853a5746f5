/**
 * Easing curves
 *
 * A curve maps linear animation time t in [0, 1] to eased progress. Every
 * curve returns its endpoints exactly so settled values land on target.
 */

export type Curve = (t: number) => number;

const CUBIC_ERROR_BOUND = 0.001;

function withExactEndpoints(transform: Curve): Curve {
  return (t: number) => {
    if (t <= 0) return 0;
    if (t >= 1) return 1;
    return transform(t);
  };
}

export const linear: Curve = withExactEndpoints((t) => t);

/** Fast start, slowing toward the end without a long tail */
export const decelerate: Curve = withExactEndpoints((t) => 1 - (1 - t) * (1 - t));

function evaluateCubic(a: number, b: number, m: number): number {
  return 3 * a * (1 - m) * (1 - m) * m + 3 * b * (1 - m) * m * m + m * m * m;
}

/**
 * CSS-style cubic bezier through (0, 0), (a, b), (c, d), (1, 1).
 * The x coordinate is solved by bisection.
 */
export function cubicBezier(a: number, b: number, c: number, d: number): Curve {
  return withExactEndpoints((t) => {
    let start = 0;
    let end = 1;
    for (;;) {
      const midpoint = (start + end) / 2;
      const estimate = evaluateCubic(a, c, midpoint);
      if (Math.abs(t - estimate) < CUBIC_ERROR_BOUND) {
        return evaluateCubic(b, d, midpoint);
      }
      if (estimate < t) {
        start = midpoint;
      } else {
        end = midpoint;
      }
    }
  });
}

export const easeInOut: Curve = cubicBezier(0.42, 0, 0.58, 1);

// Default for programmatic push/pop transitions
export const fastLinearToSlowEaseIn: Curve = cubicBezier(0.18, 1, 0.04, 1);
