export type TimerRef = ReturnType<typeof setTimeout>;

/**
 * 타이머 facility 추상화. 테스트에서 실패하는 스케줄러 등을 주입할 수 있다.
 */
export interface Scheduler {
  setTimeout(callback: () => void, ms: number): TimerRef;
  clearTimeout(timer: TimerRef): void;
  now(): number;
}

// jest fake timer가 전역을 교체하므로 호출 시점에 전역을 참조한다
export const systemScheduler: Scheduler = {
  setTimeout: (callback, ms) => setTimeout(callback, ms),
  clearTimeout: (timer) => clearTimeout(timer),
  now: () => Date.now(),
};
