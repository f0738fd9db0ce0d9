import { TimedOperationConfig } from "../timed-operation";
import {
  DurationConfigSchema,
  TimeoutConfigSchema,
} from "../config/duration-config";

export interface ThrottleConfig extends TimedOperationConfig {
  timeoutMs?: number; // runAsync 기본 타임아웃. 0이면 타임아웃 없음
}

export const ThrottleConfigSchema =
  DurationConfigSchema.merge(TimeoutConfigSchema);
