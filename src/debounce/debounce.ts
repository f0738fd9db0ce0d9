import { createLogger, Logger } from "../logger";
import { RunOptions, TimedOperation } from "../timed-operation";
import { parseConfig, parseDuration } from "../config/duration-config";
import {
  AsyncOperation,
  dispatchAsync,
  dispatchSync,
  SyncOperation,
} from "../outcome/dispatcher";
import { CallbackSet, WaitingCallbackSet } from "../outcome/outcome";
import { Scheduler, systemScheduler } from "../timer/scheduler";
import { TimerHandle, TimerTable } from "../timer/timer-table";
import { DebounceConfig, DebounceConfigSchema } from "./config";

type Job = (handle: TimerHandle) => void | Promise<void>;

/**
 * trailing debounce. 같은 callId로 새 호출이 오면 대기 중인 호출을 취소하고
 * durationMs를 다시 센다. 마지막 호출의 operation만 실행되며
 * 밀려난 호출은 operation도 콜백도 실행되지 않는다.
 */
export class DebounceController implements TimedOperation {
  private readonly table: TimerTable;
  private readonly jobs: WeakMap<TimerHandle, Job> = new WeakMap();
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly durationMs: number;

  constructor(config: DebounceConfig = {}) {
    const { durationMs } = parseConfig(DebounceConfigSchema, {
      durationMs: config.durationMs,
    });
    this.durationMs = durationMs;
    this.scheduler = config.scheduler ?? systemScheduler;
    this.logger = config.logger ?? createLogger("debounce");
    this.table = new TimerTable(this.scheduler);
  }

  run<T>(
    callId: string,
    operation: SyncOperation<T>,
    callbacks: CallbackSet<T>,
    options: RunOptions = {}
  ): void {
    this.enqueue(callId, options.durationMs, () => {
      dispatchSync(operation, callbacks, { logger: this.logger });
    });
  }

  runAsync<T>(
    callId: string,
    operation: AsyncOperation<T>,
    callbacks: WaitingCallbackSet<T>,
    options: RunOptions = {}
  ): void {
    this.enqueue(callId, options.durationMs, async (handle) => {
      // 이미 발화한 호출은 새 호출이 와도 끝까지 콜백을 호출한다. dispose되면 abort된다
      await dispatchAsync(operation, callbacks, {
        scheduler: this.scheduler,
        logger: this.logger,
        signal: handle.signal,
      });
    });
  }

  isPending(callId: string): boolean {
    return this.table.isPending(callId);
  }

  // 이미 실행 중인 호출은 취소 대상이 아니다
  cancel(callId: string): boolean {
    if (!this.table.isPending(callId)) {
      return false;
    }
    return this.table.cancel(callId);
  }

  /**
   * 대기 중인 호출을 즉시 실행한다. 대기 중인 호출이 없으면 undefined.
   * 콜백에서 발생한 에러는 반환된 promise로 전달된다.
   */
  flush(callId: string): Promise<void> | undefined {
    const handle = this.table.disarm(callId);
    const job = handle && this.jobs.get(handle);
    if (!handle || !job) {
      return undefined;
    }
    return this.execute(handle, job);
  }

  dispose(): void {
    this.table.clear();
  }

  get size(): number {
    return this.table.size;
  }

  private enqueue(
    callId: string,
    durationMs: number | undefined,
    job: Job
  ): void {
    const delayMs =
      durationMs === undefined
        ? this.durationMs
        : parseDuration("durationMs", durationMs);

    const superseded = this.table.isPending(callId);

    let handle: TimerHandle;
    try {
      handle = this.table.schedule(callId, delayMs, (fired) => {
        this.execute(fired, job).catch((error: unknown) =>
          this.reportUnhandled(callId, error)
        );
      });
    } catch (error) {
      this.logger.warn({ err: error, callId }, "failed to schedule timer");
      throw error;
    }

    if (superseded) {
      this.logger.debug({ callId }, "pending call superseded");
    }
    this.jobs.set(handle, job);
  }

  // 동기 job은 발화한 틱 안에서 테이블에서 제거된다
  private execute(handle: TimerHandle, job: Job): Promise<void> {
    this.jobs.delete(handle);
    const release = () => {
      this.table.release(handle);
    };

    let task: void | Promise<void>;
    try {
      task = job(handle);
    } catch (error) {
      release();
      return Promise.reject(error);
    }

    if (task instanceof Promise) {
      return task.finally(release);
    }
    release();
    return Promise.resolve();
  }

  // 타이머에서 실행된 콜백의 에러는 삼키지 않고 프로세스 전역 핸들러로 넘긴다
  private reportUnhandled(callId: string, error: unknown): void {
    this.logger.error({ err: error, callId }, "debounced callback threw");
    this.scheduler.setTimeout(() => {
      throw error;
    }, 0);
  }
}
