import { failure, Parser, Progress, success } from './base'

export type InferParsed<F> = F extends Parser<infer _P, infer T, infer _E> ? T : never

export type InferError<F> = F extends Parser<infer _P, infer _T, infer E> ? E : never

export type InferParsedTuple<S extends unknown[]> = { [i in keyof S]: InferParsed<S[i]> }

/**
 * Run parsers one after the other, each starting where the previous one stopped
 * Returns the tuple of their values, or the first failure as it is
 */
export function sequence<P, S extends Parser<P, unknown, unknown>[]>(
  start: P,
  parsers: [...S]
): Progress<P, InferParsedTuple<S>, InferError<S[number]>> {
  // Values and errors come out of `runSequence` in the order and shape of `parsers`
  return runSequence(start, parsers) as Progress<P, InferParsedTuple<S>, InferError<S[number]>>
}

function runSequence<P>(start: P, parsers: Parser<P, unknown, unknown>[]): Progress<P, unknown[], unknown> {
  const values: unknown[] = []
  let point = start

  for (const parser of parsers) {
    const parsed = parser(point)
    if (!parsed.status.ok) return failure(parsed.point, parsed.status.error)

    values.push(parsed.status.value)
    point = parsed.point
  }

  return success(point, values)
}
