/**
 * Result<T, E> type for the non-throwing entry points
 * (tryParseAttributePath, tryRestoreGroup)
 */

export type Result<T, E> = Ok<T> | Err<E>;

export class Ok<T> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T> {
    return true;
  }

  isErr(): this is never {
    return false;
  }

  map<U>(fn: (value: T) => U): Result<U, never> {
    return new Ok(fn(this.value));
  }

  /**
   * Get the value or throw
   * Prefer narrowing with isOk/isErr
   */
  unwrap(): T {
    return this.value;
  }

  unwrapOr(_defaultValue: T): T {
    return this.value;
  }
}

export class Err<E> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  isOk(): this is never {
    return false;
  }

  isErr(): this is Err<E> {
    return true;
  }

  map<U>(_fn: (_value: never) => U): Result<U, E> {
    return this;
  }

  unwrap(): never {
    if (this.error instanceof Error) {
      throw this.error;
    }
    throw new Error(`Called unwrap on an Err value: ${String(this.error)}`);
  }

  unwrapOr<T>(defaultValue: T): T {
    return defaultValue;
  }
}

export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

export function err<E>(error: E): Err<E> {
  return new Err(error);
}

/**
 * Run a throwing function and capture a thrown error of the expected class
 */
export function attempt<T, E extends Error>(
  fn: () => T,
  isExpected: (error: unknown) => error is E
): Result<T, E> {
  try {
    return ok(fn());
  } catch (error) {
    if (isExpected(error)) {
      return err(error);
    }
    throw error;
  }
}
