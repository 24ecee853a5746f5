/**
 * Shared defaults for swipe-back gesture handling
 */

// Smallest comfortable touch target, also the default edge band width (px)
export const MIN_INTERACTIVE_DIMENSION = 48;
export const DEFAULT_DETECTION_START_OFFSET = 0;

// Release handling
export const MIN_FLING_VELOCITY = 1; // Screen widths per second
export const DROPPED_SWIPE_DURATION_MS = 500;
export const MIN_SETTLE_SCALE = 0.2;

// Programmatic push/pop transitions
export const DEFAULT_TRANSITION_DURATION_MS = 500;

// Pointer tracking
export const TOUCH_PAN_SLOP = 36;
export const PRECISE_POINTER_PAN_SLOP = 2;
export const VELOCITY_SAMPLE_WINDOW_MS = 100;
// A pointer still for longer than this is treated as stopped
export const POINTER_STOPPED_MS = 40;
export const FALLBACK_FRAME_INTERVAL_MS = 16;
