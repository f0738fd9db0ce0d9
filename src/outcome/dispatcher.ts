import { Logger } from "../logger";
import { NO_TIMEOUT } from "../config/duration-config";
import { Scheduler, systemScheduler, TimerRef } from "../timer/scheduler";
import { AsyncCallbackSet, CallbackSet, classify, Outcome } from "./outcome";

export type SyncOperation<T> = () => T;
export type AsyncOperation<T> = () => T | PromiseLike<T>;

export interface DispatchOptions {
  logger?: Logger;
}

export interface AsyncDispatchOptions extends DispatchOptions {
  timeoutMs?: number;
  scheduler?: Scheduler;
  // abort되면 결과는 반환하되 콜백은 호출하지 않는다 (dispose 등)
  signal?: AbortSignal;
}

/**
 * operation을 한 번 실행하고 결과를 분류한 뒤 해당하는 콜백 하나를 호출한다.
 * operation의 에러는 onError로만 전달되고, 콜백 내부 에러는 호출자에게 그대로 전파된다.
 */
export function dispatchSync<T>(
  operation: SyncOperation<T>,
  callbacks: CallbackSet<T>,
  options: DispatchOptions = {}
): Outcome<T> {
  let outcome: Outcome<T>;
  try {
    outcome = classify(operation());
  } catch (error) {
    outcome = { kind: "error", error };
  }
  notify(outcome, callbacks, options.logger);
  return outcome;
}

export async function dispatchAsync<T>(
  operation: AsyncOperation<T>,
  callbacks: AsyncCallbackSet<T>,
  options: AsyncDispatchOptions = {}
): Promise<Outcome<T>> {
  const {
    timeoutMs = NO_TIMEOUT,
    scheduler = systemScheduler,
    signal,
    logger,
  } = options;

  callbacks.onWaiting?.();
  const outcome = await settle(operation, timeoutMs, scheduler);

  if (signal?.aborted) {
    logger?.debug({ kind: outcome.kind }, "outcome discarded, call was aborted");
    return outcome;
  }
  notify(outcome, callbacks, logger);
  return outcome;
}

async function settle<T>(
  operation: AsyncOperation<T>,
  timeoutMs: number,
  scheduler: Scheduler
): Promise<Outcome<T>> {
  const completion = new Promise<T>((resolve) => resolve(operation())).then(
    (value) => classify(value),
    (error: unknown): Outcome<T> => ({ kind: "error", error })
  );

  if (timeoutMs <= NO_TIMEOUT) {
    return completion;
  }

  let timer: TimerRef | undefined;
  const expiry = new Promise<Outcome<T>>((resolve) => {
    timer = scheduler.setTimeout(() => resolve({ kind: "timeout" }), timeoutMs);
  });

  try {
    return await Promise.race([completion, expiry]);
  } finally {
    if (timer !== undefined) {
      scheduler.clearTimeout(timer);
    }
  }
}

function notify<T>(
  outcome: Outcome<T>,
  callbacks: AsyncCallbackSet<T>,
  logger?: Logger
): void {
  switch (outcome.kind) {
    case "error":
      if (callbacks.onError) {
        callbacks.onError(outcome.error);
      } else {
        logger?.debug({ err: outcome.error }, "operation failed, no onError handler");
      }
      return;
    case "null":
      callbacks.onNull?.();
      return;
    case "empty":
      callbacks.onEmpty?.();
      return;
    case "timeout":
      callbacks.onTimeout?.();
      return;
    case "success":
      callbacks.onSuccess(outcome.value);
      return;
  }
}
