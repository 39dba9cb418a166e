import { XmlMutationError } from "./errors.js";

/**
 * Either a successful value or a typed failure. Mutation operations return
 * this instead of throwing so every failure path is checked by the caller.
 */
export type Result<T, E = XmlMutationError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Run a throwing step and capture engine errors as an `Err`. Anything that
 * is not an `XmlMutationError` is a programming error and keeps propagating.
 */
export function attempt<T>(operation: () => T): Result<T> {
  try {
    return Ok(operation());
  } catch (error) {
    if (error instanceof XmlMutationError) {
      return Err(error);
    }
    throw error;
  }
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
