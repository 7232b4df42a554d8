import { describe, expect, it } from 'vitest'
import { bytePoint, NUMERIC_WIDTHS, NumericKind, numbers, readNumber } from './bytes'

const KINDS: NumericKind[] = ['u8', 'u16', 'u32', 'u64', 'u128', 'i8', 'i16', 'i32', 'i64', 'i128', 'f32', 'f64']

describe('numeric decoders', () => {
  it('fails with too short inputs', () => {
    const point = bytePoint(new Uint8Array([]))

    expect(numbers.u64Le(point)).toEqual({ point, status: { ok: false, error: undefined } })
    expect(numbers.u64Be(point)).toEqual({ point, status: { ok: false, error: undefined } })
    expect(numbers.i8Le(point)).toEqual({ point, status: { ok: false, error: undefined } })
    expect(numbers.i8Be(point)).toEqual({ point, status: { ok: false, error: undefined } })
  })

  it('never moves when fewer bytes remain than the width', () => {
    for (const kind of KINDS) {
      const point = bytePoint(new Uint8Array(NUMERIC_WIDTHS[kind] - 1).fill(0x11))

      for (const order of ['le', 'be'] as const) {
        const result = readNumber(kind, order)(point)
        expect(result.point).toBe(point)
        expect(result.status.ok).toBe(false)
      }
    }
  })

  it('parses integers', () => {
    const bytes = new Uint8Array([0x01, 0x02, 0x03, 0x04, 0xd0, 0x0d, 0xf0, 0x0d])
    const point = bytePoint(bytes)

    expect(numbers.u64Le(point)).toEqual({
      point: bytePoint(bytes).advanceBy(8),
      status: { ok: true, value: 0x0df00dd004030201n },
    })
    expect(numbers.i16Le(point)).toEqual({ point: bytePoint(bytes).advanceBy(2), status: { ok: true, value: 0x0201 } })
    expect(numbers.u64Be(point)).toEqual({
      point: bytePoint(bytes).advanceBy(8),
      status: { ok: true, value: 0x01020304d00df00dn },
    })
    expect(numbers.i16Be(point)).toEqual({ point: bytePoint(bytes).advanceBy(2), status: { ok: true, value: 0x0102 } })

    expect(numbers.i16Be(point).point.s).toEqual(new Uint8Array([0x03, 0x04, 0xd0, 0x0d, 0xf0, 0x0d]))
    expect(numbers.u64Be(point).point.isEmpty()).toBe(true)
  })

  it('parses signed integers', () => {
    const ones = bytePoint(new Uint8Array(16).fill(0xff))

    expect(numbers.u8Le(ones).status).toEqual({ ok: true, value: 255 })
    expect(numbers.i8Be(ones).status).toEqual({ ok: true, value: -1 })
    expect(numbers.i32Le(ones).status).toEqual({ ok: true, value: -1 })
    expect(numbers.u32Be(ones).status).toEqual({ ok: true, value: 0xffffffff })
    expect(numbers.i64Be(ones).status).toEqual({ ok: true, value: -1n })
    expect(numbers.i128Le(ones).status).toEqual({ ok: true, value: -1n })
    expect(numbers.u128Be(ones).status).toEqual({ ok: true, value: 2n ** 128n - 1n })

    const min = bytePoint(new Uint8Array([0x80, 0x00]))
    expect(numbers.i16Be(min).status).toEqual({ ok: true, value: -32768 })
    expect(numbers.i16Le(min).status).toEqual({ ok: true, value: 0x80 })
  })

  it('parses 128-bit integers', () => {
    const bytes = new Uint8Array([0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08, 0x09, 0x0a, 0x0b, 0x0c, 0x0d, 0x0e, 0x0f, 0x10])
    const point = bytePoint(bytes)

    expect(numbers.u128Be(point).status).toEqual({ ok: true, value: 0x0102030405060708090a0b0c0d0e0f10n })
    expect(numbers.u128Le(point).status).toEqual({ ok: true, value: 0x100f0e0d0c0b0a090807060504030201n })
    expect(numbers.u128Le(point).point.offset).toBe(16)
  })

  it('parses floats', () => {
    expect(numbers.f32Be(bytePoint([0x3f, 0x80, 0x00, 0x00])).status).toEqual({ ok: true, value: 1 })
    expect(numbers.f32Le(bytePoint([0x00, 0x00, 0xc0, 0xbf])).status).toEqual({ ok: true, value: -1.5 })
    expect(numbers.f64Le(bytePoint([0, 0, 0, 0, 0, 0, 0xf0, 0x3f])).status).toEqual({ ok: true, value: 1 })
    expect(numbers.f64Be(bytePoint([0x40, 0x09, 0x21, 0xfb, 0x54, 0x44, 0x2d, 0x18])).status).toEqual({
      ok: true,
      value: 3.141592653589793,
    })
  })

  it('decodes byte-reversed inputs the same way in both orders', () => {
    const bytes = [0x12, 0x34, 0x56, 0x78, 0x9a, 0xbc, 0xde, 0xf0, 0x0f, 0xed, 0xcb, 0xa9, 0x87, 0x65, 0x43, 0x21, 0x99]

    for (const kind of KINDS) {
      const width = NUMERIC_WIDTHS[kind]
      const reversed = bytes.slice(0, width).reverse()

      const le = readNumber(kind, 'le')(bytePoint(bytes))
      const be = readNumber(kind, 'be')(bytePoint(reversed))

      expect(le.status).toEqual(be.status)
      expect(le.point.offset).toBe(width)
      expect(be.point.offset).toBe(width)
    }
  })

  it('reads from a point that already advanced', () => {
    const point = bytePoint([0xff, 0x00, 0x2a]).advanceBy(1)

    expect(numbers.u16Be(point)).toEqual({
      point: bytePoint([0xff, 0x00, 0x2a]).advanceBy(3),
      status: { ok: true, value: 0x2a },
    })
  })
})
