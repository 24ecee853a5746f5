export type { ReleaseOutcome } from './back-gesture-controller.js';
export { BackGestureController } from './back-gesture-controller.js';
export type { SwipeBackOptions, SwipeBackOptionsInput, TransitionDurations } from './config.js';
export {
  mergeSwipeBackOptions,
  NO_SAFE_AREA,
  resolveDetectionArea,
  resolveSwipeBackOptions,
  resolveTransitionDurations,
  SwipeBackOptionsSchema,
  toGestureConfig,
} from './config.js';
export type { GateContext, PointerSample } from './drag-gate.js';
export { isBackDirection, shouldHandlePointer, toLeadingOffset } from './drag-gate.js';
export {
  checkContract,
  GestureContractError,
  SwipeBackConfigError,
  setContractChecks,
} from './errors.js';
export type { GestureState, GestureStateListener, ReleaseVelocity } from './gesture-coordinator.js';
export { BackGestureCoordinator, toLogical } from './gesture-coordinator.js';
export type { ReleaseSettings } from './pop-gesture.js';
export { isPopGestureEnabled, startPopGesture } from './pop-gesture.js';
export type { ReleaseInput, ReleasePlan } from './release-resolver.js';
export { planRelease, settleDurationMs, shouldReverseRelease } from './release-resolver.js';
export type { SwipeBackControllerInit, SwipeBackHost } from './swipe-back-controller.js';
export { SwipeBackController } from './swipe-back-controller.js';
export type { PointerInput, SwipeBackRecognizerOptions } from './swipe-back-recognizer.js';
export { defaultPanSlop, SwipeBackRecognizer } from './swipe-back-recognizer.js';
export type {
  DetectionArea,
  GestureConfig,
  GesturePhase,
  NavigatorHost,
  ReadingDirection,
  SafeAreaInsets,
  SwipeableRoute,
} from './types.js';
export type { Curve } from '../utils/curves.js';
export { cubicBezier, decelerate, easeInOut, fastLinearToSlowEaseIn, linear } from '../utils/curves.js';
export type { FrameScheduler } from '../utils/frame-scheduler.js';
export { defaultFrameScheduler } from '../utils/frame-scheduler.js';
export type { LogRecord, LogTransport } from '../utils/logger.js';
export { setDebugMode, setLogTransport } from '../utils/logger.js';
export type {
  AnimateOptions,
  AnimationOutcome,
  AnimationStatus,
  ProgressAnimationOptions,
} from '../utils/progress-animation.js';
export { ProgressAnimation } from '../utils/progress-animation.js';
