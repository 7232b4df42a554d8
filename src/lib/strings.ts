import { failure, Failed, Parser, Point, Progress, success } from './base'

/** A literal and the value it stands for, usually an enum member */
export type Identifier<T> = [literal: string, value: T]

/**
 * Cursor over a string, the most common case
 * Offsets are counted in UTF-16 code units
 */
export class StringPoint implements Point {
  constructor(public readonly input: string, public readonly offset = 0) {
    if (offset < 0 || offset > input.length) {
      throw new Error(`String point offset ${offset} is out of the input's bounds (length ${input.length})`)
    }
  }

  static zero(): StringPoint {
    return new StringPoint('')
  }

  /** Remaining unconsumed input */
  get s(): string {
    return this.input.substring(this.offset)
  }

  get remaining(): number {
    return this.input.length - this.offset
  }

  isEmpty(): boolean {
    return this.remaining === 0
  }

  advanceBy(len: number): StringPoint {
    return new StringPoint(this.input, this.offset + len)
  }

  /** Text between this point and a later point of the same input */
  to(other: StringPoint): string {
    if (other.input !== this.input) throw new Error('Cannot slice between points of different inputs')
    if (other.offset < this.offset) throw new Error('Cannot slice up to a point located before the current one')

    return this.input.substring(this.offset, other.offset)
  }

  startsWith(literal: string): boolean {
    return this.input.startsWith(literal, this.offset)
  }

  /** Consume `len` code units without checking it (zero is allowed) */
  success<E>(len: number): Progress<StringPoint, string, E> {
    return success(this.advanceBy(len), this.input.substring(this.offset, this.offset + len))
  }

  fail(): Failed<StringPoint, void> {
    return failure(this, undefined)
  }

  /** Advance by `len` code units, `null` meaning nothing could be consumed */
  consumeTo(len: number | null): Progress<StringPoint, string, void> {
    return len !== null ? this.success(len) : this.fail()
  }

  /**
   * Consume exactly `len` code units
   * Fails without moving if `len` is zero or exceeds the remaining input
   */
  consume(len: number): Progress<StringPoint, string, void> {
    return len > 0 && len <= this.remaining ? this.success(len) : this.fail()
  }

  consumeLiteral(literal: string): Progress<StringPoint, string, void> {
    return this.consumeTo(this.startsWith(literal) ? literal.length : null)
  }

  /**
   * Advance past the first identifier the input starts with, yielding its value
   * Identifiers are tried in order and the first match wins, even if a later one is longer:
   * put `"<="` before `"<"` to be able to match it
   */
  consumeIdentifier<T>(identifiers: readonly Identifier<T>[]): Progress<StringPoint, T, void> {
    for (const [literal, value] of identifiers) {
      if (this.startsWith(literal)) {
        return success(this.advanceBy(literal.length), value)
      }
    }

    return this.fail()
  }

  static literal(literal: string): Parser<StringPoint, string, void> {
    return (point) => point.consumeLiteral(literal)
  }
}
