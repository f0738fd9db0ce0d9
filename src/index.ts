import { DebounceController } from "./debounce/debounce";
import { ThrottleController } from "./throttle/throttle";

export { ThrottleController } from "./throttle/throttle";
export type { AsyncThrottleRunOptions } from "./throttle/throttle";
export type { ThrottleConfig } from "./throttle/config";
export { createThrottleMiddleware } from "./throttle/middleware";
export {
  createThrottleMiddlewareFromController,
  type ThrottleMiddlewareOptions,
} from "./middleware/throttle-middleware-factory";

export { DebounceController } from "./debounce/debounce";
export type { DebounceConfig } from "./debounce/config";

export {
  classify,
  isEmptyCollection,
  type AsyncCallbackSet,
  type AsyncThrottleCallbackSet,
  type CallbackSet,
  type Outcome,
  type ThrottleCallbackSet,
  type WaitingCallbackSet,
  type ThrottleResult,
} from "./outcome/outcome";
export {
  dispatchAsync,
  dispatchSync,
  type AsyncOperation,
  type SyncOperation,
} from "./outcome/dispatcher";

export { TimerHandle, TimerTable } from "./timer/timer-table";
export { systemScheduler, type Scheduler } from "./timer/scheduler";
export type { RunOptions, TimedOperationConfig } from "./timed-operation";
export { ConfigurationError, SchedulerError, TimedOperationError } from "./errors";

// 프로세스 전역 인스턴스. key 충돌은 호출 측이 책임진다.
export const Throttle = new ThrottleController();
export const Debounce = new DebounceController();
