import { z } from "zod";
import { ConfigurationError } from "../errors";

export const DEFAULT_DURATION_MS = 1000;
export const NO_TIMEOUT = 0;

export const DurationSchema = z
  .number({ invalid_type_error: "must be a number of milliseconds" })
  .finite()
  .nonnegative();

export const DurationConfigSchema = z.object({
  durationMs: DurationSchema.default(DEFAULT_DURATION_MS),
});

export const TimeoutConfigSchema = z.object({
  timeoutMs: DurationSchema.default(NO_TIMEOUT),
});

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")} ${issue.message}`
        : issue.message
    )
    .join(", ");

export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseDuration(name: string, value: unknown): number {
  const result = DurationSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${name}: ${formatIssues(result.error)}`);
  }
  return result.data;
}
