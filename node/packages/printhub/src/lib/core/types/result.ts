/**
 * Outcome of a domain operation. Expected failures (missing rows,
 * conflicts, invalid input) travel as `error`; handlers map them to a
 * status with `sendError`.
 */
export type Result<T, E = Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

export const success = <T>(data: T): Result<T, never> => ({
  success: true,
  data,
});

export const failure = <E = Error>(error: E): Result<never, E> => ({
  success: false,
  error,
});
