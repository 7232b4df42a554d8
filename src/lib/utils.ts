import { Loggers } from '../settings'
import { Point, Progress } from './base'

type AnyParser<P, T, E, A extends unknown[]> = (point: P, ...args: A) => Progress<P, T, E>

/** Build a parser that refers to itself, for recursive grammars */
export function selfRef<P, T, E, A extends unknown[]>(
  producer: (self: AnyParser<P, T, E, A>) => AnyParser<P, T, E, A>
): AnyParser<P, T, E, A> {
  const parser = producer((point, ...args) => parser(point, ...args))
  return parser
}

export function withLatelyDeclared<P, T, E, A extends unknown[]>(
  parser: () => AnyParser<P, T, E, A>
): AnyParser<P, T, E, A> {
  return (point, ...args) => parser()(point, ...args)
}

const trimStr = (str: string) => (str.length < 80 ? str : str.substring(0, 80) + '...').replace(/\n/g, '\\n')

function remainingOf(point: Point): string | null {
  return 's' in point && typeof point.s === 'string' ? point.s : null
}

/**
 * Log every call of a parser along with its outcome
 * Works with plain parsers as well as with the ones driven by a parse master
 */
export function traced<P extends Point, T, E, A extends unknown[]>(
  name: string,
  parser: AnyParser<P, T, E, A>,
  loggers: Pick<Loggers, 'debug'>
): AnyParser<P, T, E, A> {
  let call = 0

  return (point, ...args) => {
    call++
    const nameWithCall = `{${name}:${call}}`
    const remaining = remainingOf(point)

    loggers.debug(
      `${nameWithCall} Called at offset ${point.offset}` + (remaining !== null ? ` | ${trimStr(remaining)}` : '')
    )

    const result = parser(point, ...args)

    loggers.debug(
      result.status.ok
        ? `${nameWithCall} Succeeded at offset ${result.point.offset}`
        : `${nameWithCall} FAILED at offset ${result.point.offset}`
    )

    return result
  }
}
