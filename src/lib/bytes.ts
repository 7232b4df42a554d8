import { Parser } from './base'
import { SlicePoint } from './slices'
import { map } from './transform'

export type BytePoint = SlicePoint<number>

export function bytePoint(bytes: Uint8Array | readonly number[]): BytePoint {
  return new SlicePoint(bytes)
}

export type ByteOrder = 'le' | 'be'

type NumericKinds = {
  u8: number
  u16: number
  u32: number
  u64: bigint
  u128: bigint
  i8: number
  i16: number
  i32: number
  i64: bigint
  i128: bigint
  f32: number
  f64: number
}

export type NumericKind = keyof NumericKinds

export const NUMERIC_WIDTHS: { readonly [kind in NumericKind]: number } = {
  u8: 1,
  u16: 2,
  u32: 4,
  u64: 8,
  u128: 16,
  i8: 1,
  i16: 2,
  i32: 4,
  i64: 8,
  i128: 16,
  f32: 4,
  f64: 8,
}

function decode<K extends NumericKind>(kind: K, view: DataView, le: boolean): NumericKinds[K]
function decode(kind: NumericKind, view: DataView, le: boolean): number | bigint {
  switch (kind) {
    case 'u8':
      return view.getUint8(0)
    case 'i8':
      return view.getInt8(0)
    case 'u16':
      return view.getUint16(0, le)
    case 'i16':
      return view.getInt16(0, le)
    case 'u32':
      return view.getUint32(0, le)
    case 'i32':
      return view.getInt32(0, le)
    case 'u64':
      return view.getBigUint64(0, le)
    case 'i64':
      return view.getBigInt64(0, le)
    case 'f32':
      return view.getFloat32(0, le)
    case 'f64':
      return view.getFloat64(0, le)
    case 'u128':
    case 'i128': {
      const high = view.getBigUint64(le ? 8 : 0, le)
      const low = view.getBigUint64(le ? 0 : 8, le)
      const unsigned = (high << 64n) | low
      return kind === 'i128' ? BigInt.asIntN(128, unsigned) : unsigned
    }
  }
}

/**
 * Decode a fixed-width number
 * Fails without moving when fewer bytes remain than the number's width
 */
export function readNumber<K extends NumericKind>(kind: K, order: ByteOrder): Parser<BytePoint, NumericKinds[K], void> {
  const width = NUMERIC_WIDTHS[kind]

  return (point) =>
    map(point.consume(width), (bytes) => {
      const buffer = new Uint8Array(width)

      for (let i = 0; i < width; i++) {
        buffer[i] = bytes[i]
      }

      return decode(kind, new DataView(buffer.buffer), order === 'le')
    })
}

type NumberParsers = {
  [kind in NumericKind as `${kind}${Capitalize<ByteOrder>}`]: Parser<BytePoint, NumericKinds[kind], void>
}

export const numbers: NumberParsers = {
  u8Le: readNumber('u8', 'le'),
  u8Be: readNumber('u8', 'be'),
  u16Le: readNumber('u16', 'le'),
  u16Be: readNumber('u16', 'be'),
  u32Le: readNumber('u32', 'le'),
  u32Be: readNumber('u32', 'be'),
  u64Le: readNumber('u64', 'le'),
  u64Be: readNumber('u64', 'be'),
  u128Le: readNumber('u128', 'le'),
  u128Be: readNumber('u128', 'be'),
  i8Le: readNumber('i8', 'le'),
  i8Be: readNumber('i8', 'be'),
  i16Le: readNumber('i16', 'le'),
  i16Be: readNumber('i16', 'be'),
  i32Le: readNumber('i32', 'le'),
  i32Be: readNumber('i32', 'be'),
  i64Le: readNumber('i64', 'le'),
  i64Be: readNumber('i64', 'be'),
  i128Le: readNumber('i128', 'le'),
  i128Be: readNumber('i128', 'be'),
  f32Le: readNumber('f32', 'le'),
  f32Be: readNumber('f32', 'be'),
  f64Le: readNumber('f64', 'le'),
  f64Be: readNumber('f64', 'be'),
}
