/**
 * Result<T, E> for the encode/decode boundary. Callers get a value or a
 * structured error; nothing at this boundary throws for bad input.
 */

export type Result<T, E> = Ok<T> | Err<E>;

/** Success variant of Result<T, E>. */
export class Ok<T> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T> {
    return true;
  }

  isErr(): this is never {
    return false;
  }

  unwrap(): T {
    return this.value;
  }

  unwrapOr(_defaultValue: T): T {
    return this.value;
  }
}

/** Error variant of Result<T, E>. */
export class Err<E> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  isOk(): this is never {
    return false;
  }

  isErr(): this is Err<E> {
    return true;
  }

  /** Throws the carried error when it is an Error, or wraps it otherwise. */
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

/** Transform the success value, passing an error through untouched. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result._tag === 'Ok' ? ok(fn(result.value)) : result;
}

/** Transform the error value, passing a success through untouched. */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return result._tag === 'Err' ? err(fn(result.error)) : result;
}

/** Chain an operation that may fail. */
export function flatMap<T, U, E, F>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, F>,
): Result<U, E | F> {
  return result._tag === 'Ok' ? fn(result.value) : result;
}
