import { failure, isRecoverable, Progress, Recoverable, success } from './base'

export function map<P, T, U, E>(progress: Progress<P, T, E>, mapper: (value: T, point: P) => U): Progress<P, U, E> {
  return progress.status.ok
    ? success(progress.point, mapper(progress.status.value, progress.point))
    : failure(progress.point, progress.status.error)
}

export function mapErr<P, T, E, F>(progress: Progress<P, T, E>, mapper: (error: E, point: P) => F): Progress<P, T, F> {
  return progress.status.ok
    ? success(progress.point, progress.status.value)
    : failure(progress.point, mapper(progress.status.error, progress.point))
}

export function chain<P, T, U, E>(
  progress: Progress<P, T, E>,
  next: (value: T, point: P) => Progress<P, U, E>
): Progress<P, U, E> {
  return progress.status.ok ? next(progress.status.value, progress.point) : failure(progress.point, progress.status.error)
}

/**
 * Turn a recoverable failure into a `null` success located at `resetTo`
 * Fatal failures are kept as they are
 */
export function optional<P, T, E extends Recoverable>(progress: Progress<P, T, E>, resetTo: P): Progress<P, T | null, E> {
  if (progress.status.ok) return progress
  return isRecoverable(progress.status.error) ? success(resetTo, null) : failure(progress.point, progress.status.error)
}

export type IntoError<S, E> = {
  intoError(source: S): E
}

export function context<P, T, E, F>(progress: Progress<P, T, E>, ctx: IntoError<E, F>): Progress<P, T, F> {
  return mapErr(progress, (error) => ctx.intoError(error))
}

export type ProgressResult<P, T, E> = { ok: true; point: P; value: T } | { ok: false; point: P; error: E }

export function intoResult<P, T, E>(progress: Progress<P, T, E>): ProgressResult<P, T, E> {
  return progress.status.ok
    ? { ok: true, point: progress.point, value: progress.status.value }
    : { ok: false, point: progress.point, error: progress.status.error }
}
