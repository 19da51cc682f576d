/**
 * Typed result for calls that can fail without throwing.
 *
 * Backends and the binding store return `Result` so a failed write can be
 * queued and retried instead of unwinding the caller.
 *
 * ```ts
 * const saved = await backend.save(message);
 * if (saved.isErr()) queue(message._id, saved.error);
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }

  unwrapOr(_fallback: T): T {
    return this.value;
  }
}

export class Err<T, E> {
  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }

  unwrapOr(fallback: T): T {
    return fallback;
  }
}

export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);
