import { createLogger, Logger } from "../logger";
import { RunOptions, TimedOperation } from "../timed-operation";
import { parseConfig, parseDuration } from "../config/duration-config";
import {
  AsyncOperation,
  dispatchAsync,
  dispatchSync,
  SyncOperation,
} from "../outcome/dispatcher";
import {
  AsyncThrottleCallbackSet,
  ThrottleCallbackSet,
  ThrottleResult,
} from "../outcome/outcome";
import { Scheduler, systemScheduler } from "../timer/scheduler";
import { TimerTable } from "../timer/timer-table";
import { ThrottleConfig, ThrottleConfigSchema } from "./config";

export interface AsyncThrottleRunOptions extends RunOptions {
  timeoutMs?: number;
}

/**
 * leading-edge throttle. 허용된 호출은 즉시 실행되고 호출 시점부터 window가 시작된다.
 * window 안에서 같은 callId로 들어온 호출은 큐잉하지 않고 onThrottle로 거절한다.
 */
export class ThrottleController implements TimedOperation {
  private readonly table: TimerTable;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly durationMs: number;
  private readonly timeoutMs: number;

  constructor(config: ThrottleConfig = {}) {
    const { durationMs, timeoutMs } = parseConfig(ThrottleConfigSchema, {
      durationMs: config.durationMs,
      timeoutMs: config.timeoutMs,
    });
    this.durationMs = durationMs;
    this.timeoutMs = timeoutMs;
    this.scheduler = config.scheduler ?? systemScheduler;
    this.logger = config.logger ?? createLogger("throttle");
    // window 타이머가 프로세스 종료를 막지 않도록 unref
    this.table = new TimerTable(this.scheduler, { unref: true });
  }

  run<T>(
    callId: string,
    operation: SyncOperation<T>,
    callbacks: ThrottleCallbackSet<T>,
    options: RunOptions = {}
  ): ThrottleResult<T> {
    if (!this.tryAcquire(callId, options.durationMs, callbacks)) {
      return { kind: "throttled" };
    }
    return dispatchSync(operation, callbacks, { logger: this.logger });
  }

  // window는 호출 시점에 시작되며 operation 소요 시간과 무관하다
  async runAsync<T>(
    callId: string,
    operation: AsyncOperation<T>,
    callbacks: AsyncThrottleCallbackSet<T>,
    options: AsyncThrottleRunOptions = {}
  ): Promise<ThrottleResult<T>> {
    const timeoutMs =
      options.timeoutMs === undefined
        ? this.timeoutMs
        : parseDuration("timeoutMs", options.timeoutMs);

    if (!this.tryAcquire(callId, options.durationMs, callbacks)) {
      return { kind: "throttled" };
    }
    return dispatchAsync(operation, callbacks, {
      timeoutMs,
      scheduler: this.scheduler,
      logger: this.logger,
    });
  }

  isThrottled(callId: string): boolean {
    return this.table.isActive(callId);
  }

  remainingMs(callId: string): number {
    return this.table.remainingMs(callId);
  }

  reset(callId: string): boolean {
    return this.table.cancel(callId);
  }

  dispose(): void {
    this.table.clear();
  }

  get size(): number {
    return this.table.size;
  }

  private tryAcquire<T>(
    callId: string,
    durationMs: number | undefined,
    callbacks: ThrottleCallbackSet<T>
  ): boolean {
    const windowMs =
      durationMs === undefined
        ? this.durationMs
        : parseDuration("durationMs", durationMs);

    if (this.table.isActive(callId)) {
      this.logger.debug(
        { callId, remainingMs: this.table.remainingMs(callId) },
        "call throttled"
      );
      callbacks.onThrottle?.();
      return false;
    }

    // window가 끝나면 key를 테이블에서 제거해 다시 허용한다
    try {
      this.table.schedule(callId, windowMs, (handle) => {
        this.table.release(handle);
      });
    } catch (error) {
      this.logger.warn({ err: error, callId }, "failed to schedule timer");
      throw error;
    }
    return true;
  }
}
