import { IntegerOverflowError } from './errors';

export const INT32_MAX = 2 ** 31 - 1;
export const INT32_MIN = -(2 ** 31);

/**
 * @description Clone original error properties, except for 'message' and 'stack', to the target error.
 * */
export function cloneErrorProperties<T extends Error>(
  original: unknown,
  target: T,
): T {
  if (typeof original !== 'object' || original === null) return target;
  const exclude = ['message', 'stack'];
  Object.entries(original).forEach(([key, value]) => {
    if (exclude.includes(key)) return;
    Reflect.set(target, key, value);
  });
  return target;
}

/**
 * @description Wrap a transport error with the connection prefix, keeping `code`, `errno` and the like.
 * */
export function prefixError(prefix: string, err: unknown): Error {
  const message = err instanceof Error ? err.message : String(err);
  return cloneErrorProperties(err, new Error(`${prefix} ${message}`, { cause: err }));
}

/**
 * @description Check that a value fits in a signed 32-bit integer.
 * @throws {IntegerOverflowError}
 * */
export function safeInt32(value: number): number {
  if (!Number.isInteger(value) || value > INT32_MAX || value < INT32_MIN) {
    throw new IntegerOverflowError(value);
  }
  return value;
}
