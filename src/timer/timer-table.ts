import { SchedulerError } from "../errors";
import { Scheduler, systemScheduler, TimerRef } from "./scheduler";

export class TimerHandle {
  private readonly abortController = new AbortController();
  private fired = false;

  constructor(
    readonly key: string,
    readonly firesAt: number,
    private readonly scheduler: Scheduler
  ) {}

  /** 타이머 콜백이 아직 실행되지 않았고 취소되지도 않은 상태 */
  get pending(): boolean {
    return !this.fired && !this.cancelled;
  }

  /** pending이면서 firesAt이 아직 지나지 않은 상태 */
  get active(): boolean {
    return this.pending && this.scheduler.now() < this.firesAt;
  }

  get cancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  // 발화 전 취소나 clear()로 abort된다. 발화한 handle은 교체되어도 abort되지 않는다
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  markFired(): void {
    this.fired = true;
  }

  cancel(): void {
    this.abortController.abort();
  }
}

export interface TimerTableOptions {
  // true면 대기 중인 타이머가 프로세스 종료를 막지 않는다
  unref?: boolean;
}

type TimerEntry = {
  handle: TimerHandle;
  timer: TimerRef;
};

/**
 * key별 타이머 테이블. key당 최대 하나의 handle만 유지하며,
 * 만료된 handle은 표시만 하지 않고 테이블에서 제거한다.
 */
export class TimerTable {
  private entries: Map<string, TimerEntry> = new Map();

  constructor(
    private readonly scheduler: Scheduler = systemScheduler,
    private readonly options: TimerTableOptions = {}
  ) {}

  get(key: string): TimerHandle | undefined {
    return this.entries.get(key)?.handle;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  isPending(key: string): boolean {
    return this.get(key)?.pending ?? false;
  }

  isActive(key: string): boolean {
    return this.get(key)?.active ?? false;
  }

  remainingMs(key: string): number {
    const handle = this.get(key);
    if (!handle?.active) {
      return 0;
    }
    return handle.firesAt - this.scheduler.now();
  }

  /**
   * key에 새 handle을 등록한다. 기존 handle이 있으면 교체하고,
   * 아직 발화하지 않은 handle이면 취소한다.
   * 스케줄링에 실패하면 SchedulerError를 던지고 테이블은 변경하지 않는다.
   */
  schedule(
    key: string,
    durationMs: number,
    onFire: (handle: TimerHandle) => void
  ): TimerHandle {
    const handle = new TimerHandle(
      key,
      this.scheduler.now() + durationMs,
      this.scheduler
    );

    let timer: TimerRef;
    try {
      timer = this.scheduler.setTimeout(() => {
        handle.markFired();
        onFire(handle);
      }, durationMs);
    } catch (error) {
      throw new SchedulerError(`Failed to schedule timer for key: ${key}`, {
        cause: error,
      });
    }

    if (this.options.unref) {
      timer.unref();
    }

    this.cancel(key);
    this.entries.set(key, { handle, timer });
    return handle;
  }

  cancel(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    this.scheduler.clearTimeout(entry.timer);
    if (entry.handle.pending) {
      entry.handle.cancel();
    }
    return this.entries.delete(key);
  }

  /**
   * 타이머를 해제하고 발화한 것으로 표시한다. entry는 release 전까지 남는다.
   * firesAt이 지났어도 타이머 콜백이 아직 실행되지 않았다면 대상이 된다.
   * pending handle이 없으면 undefined.
   */
  disarm(key: string): TimerHandle | undefined {
    const entry = this.entries.get(key);
    if (!entry?.handle.pending) {
      return undefined;
    }
    this.scheduler.clearTimeout(entry.timer);
    entry.handle.markFired();
    return entry.handle;
  }

  // 다른 호출이 이미 교체한 handle이면 건드리지 않는다
  release(handle: TimerHandle): boolean {
    if (this.entries.get(handle.key)?.handle !== handle) {
      return false;
    }
    return this.entries.delete(handle.key);
  }

  // 진행 중인 작업까지 모두 abort한다
  clear(): void {
    for (const { handle, timer } of this.entries.values()) {
      this.scheduler.clearTimeout(timer);
      handle.cancel();
    }
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
