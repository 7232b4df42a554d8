import { Loggers } from '../settings'
import { comparePoints, failure, Failed, isRecoverable, Point, Progress, Recoverable, success } from './base'

export type MasterParser<P extends Point, T, E extends Recoverable> = (
  point: P,
  master: ParseMaster<P, E>
) => Progress<P, T, E>

export type ParseMasterOptions = {
  loggers?: Pick<Loggers, 'debug'>
}

/**
 * Drives choice points (alternations, repetitions, optional parts) of a single parse
 *
 * Every failure the driver sees is recorded, and the one that went the furthest into the input is kept
 * so that `finish` can report it instead of the failure of whichever branch was tried last.
 * A master is meant to be created for one parse and threaded through all the parsers involved in it.
 */
export class ParseMaster<P extends Point, E extends Recoverable> {
  private furthestFailure: Failed<P, E> | null = null
  private expectedErrors: E[] = []

  constructor(private readonly options: ParseMasterOptions = {}) {}

  /** The failure that advanced the furthest so far */
  furthest(): Failed<P, E> | null {
    return this.furthestFailure
  }

  /** All errors recorded at the furthest failure's offset, in the order they were seen */
  expected(): E[] {
    return [...this.expectedErrors]
  }

  /**
   * Record a parser's outcome in the furthest failure tracking
   * Successes are ignored
   */
  record<T>(progress: Progress<P, T, E>): Progress<P, T, E> {
    if (progress.status.ok) return progress

    const { point } = progress
    const { error } = progress.status

    const order = this.furthestFailure === null ? 1 : comparePoints(point, this.furthestFailure.point)

    if (order > 0) {
      this.furthestFailure = failure(point, error)
      this.expectedErrors = [error]
      this.options.loggers?.debug(`New furthest failure at offset ${point.offset}`)
    } else if (order === 0 && !this.expectedErrors.includes(error)) {
      // Enclosing combinators record the failures of the parsers they drive once more
      this.expectedErrors.push(error)
    }

    return progress
  }

  alternate<T>(start: P): Alternate<P, T, E> {
    return new Alternate(this, start)
  }

  /**
   * Apply a parser as many times as possible
   * Stops on the first recoverable failure, a fatal one is propagated and the collected values are dropped
   */
  zeroOrMore<T>(start: P, parser: MasterParser<P, T, E>): Progress<P, T[], E> {
    const values: T[] = []
    let point = start

    for (;;) {
      const parsed = this.record(parser(point, this))

      if (!parsed.status.ok) {
        return this.endRepetition(parsed.point, parsed.status.error, point, values)
      }

      // A match that doesn't advance would be matched again forever
      if (parsed.point.offset === point.offset) {
        return success(point, values)
      }

      values.push(parsed.status.value)
      point = parsed.point
    }
  }

  /** Same as `zeroOrMore` but the first application must succeed */
  oneOrMore<T>(start: P, parser: MasterParser<P, T, E>): Progress<P, T[], E> {
    const first = this.record(parser(start, this))
    if (!first.status.ok) return failure(first.point, first.status.error)

    const rest = this.zeroOrMore(first.point, parser)
    return rest.status.ok ? success(rest.point, [first.status.value, ...rest.status.value]) : rest
  }

  /** Run a parser, turning a recoverable failure into a `null` value located at `start` */
  optional<T>(start: P, parser: MasterParser<P, T, E>): Progress<P, T | null, E> {
    const parsed = this.record(parser(start, this))
    if (parsed.status.ok) return parsed

    if (!isRecoverable(parsed.status.error)) {
      this.logFatal('Optional parser', parsed.point)
      return failure(parsed.point, parsed.status.error)
    }

    return success(start, null)
  }

  /**
   * Reconcile the top-level result of a parse with the tracked furthest failure
   * A failing result is replaced by the furthest failure when the latter advanced strictly further
   */
  finish<T>(progress: Progress<P, T, E>): Progress<P, T, E> {
    if (progress.status.ok) return progress

    return this.furthestFailure !== null && comparePoints(this.furthestFailure.point, progress.point) > 0
      ? this.furthestFailure
      : progress
  }

  private endRepetition<T>(failedAt: P, error: E, reached: P, values: T[]): Progress<P, T[], E> {
    if (isRecoverable(error)) return success(reached, values)

    this.logFatal(`Repetition (after ${values.length} match(es))`, failedAt)
    return failure(failedAt, error)
  }

  /** @internal */
  logFatal(kind: string, point: P): void {
    this.options.loggers?.debug(`${kind} aborted by a fatal failure at offset ${point.offset}`)
  }
}

/**
 * An alternation being built
 * Options are tried in registration order with the same starting point, the first success wins
 */
export class Alternate<P extends Point, T, E extends Recoverable> {
  private current: Progress<P, T, E> | null = null
  private settled = false

  constructor(private readonly master: ParseMaster<P, E>, private readonly start: P) {}

  one(parser: MasterParser<P, T, E>): this {
    if (this.settled) return this

    const parsed = this.master.record(parser(this.start, this.master))

    if (parsed.status.ok) {
      this.settled = true
      this.current = parsed
    } else if (!isRecoverable(parsed.status.error)) {
      this.settled = true
      this.current = parsed
      this.master.logFatal('Alternation', parsed.point)
    } else {
      this.current = failure(this.start, parsed.status.error)
    }

    return this
  }

  finish(): Progress<P, T, E> {
    if (this.current === null) throw new Error('Cannot finish an alternation without any option')
    return this.current
  }
}
