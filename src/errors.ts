export class TimedOperationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// 음수/비정상 duration, timeout 등 호출 측 설정 오류
export class ConfigurationError extends TimedOperationError {}

// 타이머 등록 실패. 해당 호출에만 영향을 준다.
export class SchedulerError extends TimedOperationError {}
