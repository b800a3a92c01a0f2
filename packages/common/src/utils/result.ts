export type Result<T, E = Error> = Success<T> | Failure<E>;

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure<E> {
  ok: false;
  error: E;
}

export const ok = <T>(value: T): Success<T> => ({ ok: true, value });
export const err = <E>(error: E): Failure<E> => ({ ok: false, error });

/** Settles a promise into a Result, mapping a rejection through `mapError`. */
export const fromPromise = async <T, E>(
  promise: Promise<T>,
  mapError: (reason: unknown) => E,
): Promise<Result<T, E>> => {
  try {
    return ok(await promise);
  } catch (reason) {
    return err(mapError(reason));
  }
};
