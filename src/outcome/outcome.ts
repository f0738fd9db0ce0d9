export type Outcome<T> =
  | { kind: "null" }
  | { kind: "empty" }
  | { kind: "success"; value: T }
  | { kind: "error"; error: unknown }
  | { kind: "timeout" };

export interface CallbackSet<T> {
  onSuccess: (data: T) => void;
  onError?: (error: unknown) => void;
  onNull?: () => void;
  onEmpty?: () => void;
}

// async 경로에서만 의미가 있는 콜백
export interface WaitingCallbackSet<T> extends CallbackSet<T> {
  onWaiting?: () => void;
}

export interface AsyncCallbackSet<T> extends WaitingCallbackSet<T> {
  onTimeout?: () => void;
}

export interface ThrottleCallbackSet<T> extends CallbackSet<T> {
  onThrottle?: () => void;
}

export interface AsyncThrottleCallbackSet<T>
  extends ThrottleCallbackSet<T>,
    AsyncCallbackSet<T> {}

export type ThrottleResult<T> = Outcome<T> | { kind: "throttled" };

const isPlainObject = (value: object): boolean => {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * 빈 컬렉션 여부. 배열, TypedArray, Map, Set, 키가 없는 plain object만 해당한다.
 * 문자열은 컬렉션으로 보지 않는다.
 */
export function isEmptyCollection(value: unknown): boolean {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  if (ArrayBuffer.isView(value)) {
    return value.byteLength === 0;
  }
  if (value instanceof Map || value instanceof Set) {
    return value.size === 0;
  }
  return isPlainObject(value) && Object.keys(value).length === 0;
}

export function classify<T>(value: T): Outcome<T> {
  if (value === null || value === undefined) {
    return { kind: "null" };
  }
  if (isEmptyCollection(value)) {
    return { kind: "empty" };
  }
  return { kind: "success", value };
}
