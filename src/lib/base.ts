export type Status<T, E> = StatusSuccess<T> | StatusFailure<E>

export type StatusSuccess<T> = {
  ok: true
  value: T
}

export type StatusFailure<E> = {
  ok: false
  error: E
}

/**
 * Outcome of a single parsing attempt
 * On success, `point` is located after the consumed input
 * On failure, `point` is the location the attempt failed at
 */
export type Progress<P, T, E> = Succeeded<P, T> | Failed<P, E>

export type Succeeded<P, T> = { point: P; status: StatusSuccess<T> }

export type Failed<P, E> = { point: P; status: StatusFailure<E> }

/**
 * A cursor over an input
 * Cursors are immutable: stepping produces a new point, so backtracking is just reusing an older one
 */
export interface Point {
  readonly offset: number
}

/**
 * An error type the driver can classify
 * Recoverable errors let alternations try the next option and end repetitions,
 * while other errors abort the enclosing combinator
 */
export interface Recoverable {
  recoverable(): boolean
}

export type Parser<P, T, E> = (point: P) => Progress<P, T, E>

export function success<P, T>(point: P, value: T): Succeeded<P, T> {
  return { point, status: { ok: true, value } }
}

export function failure<P, E>(point: P, error: E): Failed<P, E> {
  return { point, status: { ok: false, error } }
}

export function isSuccess<P, T, E>(progress: Progress<P, T, E>): progress is Succeeded<P, T> {
  return progress.status.ok
}

export function isFailure<P, T, E>(progress: Progress<P, T, E>): progress is Failed<P, E> {
  return !progress.status.ok
}

export function comparePoints(a: Point, b: Point): number {
  return a.offset - b.offset
}

export function isRecoverable(error: Recoverable): boolean {
  return error.recoverable()
}
