import { TimedOperationConfig } from "../timed-operation";
import { DurationConfigSchema } from "../config/duration-config";

export type DebounceConfig = TimedOperationConfig;

export const DebounceConfigSchema = DurationConfigSchema;
