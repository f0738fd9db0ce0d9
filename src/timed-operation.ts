import { Logger } from "./logger";
import { Scheduler } from "./timer/scheduler";

export interface TimedOperationConfig {
  durationMs?: number; // 호출별 durationMs가 없을 때 사용할 기본값
  scheduler?: Scheduler;
  logger?: Logger;
}

export interface RunOptions {
  durationMs?: number;
}

export interface TimedOperation {
  readonly size: number; // 테이블에 남아 있는 key 수
  dispose(): void;
}
