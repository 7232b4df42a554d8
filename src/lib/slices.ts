import { failure, Failed, Parser, Point, Progress, success } from './base'

/** Random-access sequence the slice cursors can walk (arrays, typed arrays...) */
export interface Slice<T> {
  readonly length: number
  readonly [index: number]: T
  slice(start?: number, end?: number): Slice<T>
}

/**
 * Cursor over a slice of arbitrary elements
 * The point keeps the whole input and an offset, the remaining input is only built when asked for
 */
export class SlicePoint<T> implements Point {
  constructor(public readonly input: Slice<T>, public readonly offset = 0) {
    if (offset < 0 || offset > input.length) {
      throw new Error(`Slice point offset ${offset} is out of the input's bounds (length ${input.length})`)
    }
  }

  static zero<T>(): SlicePoint<T> {
    return new SlicePoint<T>([])
  }

  /** Remaining unconsumed input */
  get s(): Slice<T> {
    return this.input.slice(this.offset)
  }

  get remaining(): number {
    return this.input.length - this.offset
  }

  isEmpty(): boolean {
    return this.remaining === 0
  }

  advanceBy(offset: number): SlicePoint<T> {
    return new SlicePoint(this.input, this.offset + offset)
  }

  fail(): Failed<SlicePoint<T>, void> {
    return failure(this, undefined)
  }

  /** Consume `len` elements without checking it (zero is allowed) */
  success<E>(len: number): Progress<SlicePoint<T>, Slice<T>, E> {
    return success(this.advanceBy(len), this.input.slice(this.offset, this.offset + len))
  }

  successOpt(len: number | null): Progress<SlicePoint<T>, Slice<T>, void> {
    return len !== null ? this.success(len) : this.fail()
  }

  consumeOpt(len: number | null): Progress<SlicePoint<T>, Slice<T>, void> {
    return len !== null ? this.consume(len) : this.fail()
  }

  /**
   * Consume exactly `len` elements
   * Fails without moving if `len` is zero (to avoid looping on empty matches) or exceeds the remaining input
   */
  consume(len: number): Progress<SlicePoint<T>, Slice<T>, void> {
    return len > 0 && len <= this.remaining ? this.success(len) : this.fail()
  }

  /** Elements between this point and a later point of the same input */
  to(other: SlicePoint<T>): Slice<T> {
    if (other.input !== this.input) throw new Error('Cannot slice between points of different inputs')
    if (other.offset < this.offset) throw new Error('Cannot slice up to a point located before the current one')

    return this.input.slice(this.offset, other.offset)
  }

  startsWith(tag: Slice<T>): boolean {
    if (tag.length > this.remaining) return false

    for (let i = 0; i < tag.length; i++) {
      if (this.input[this.offset + i] !== tag[i]) return false
    }

    return true
  }

  static tag<T>(tag: Slice<T>): Parser<SlicePoint<T>, Slice<T>, void> {
    return (point) => point.successOpt(point.startsWith(tag) ? tag.length : null)
  }
}
