import { ByteWriter } from '../../io/ByteWriter.ts'
import { InvalidInputError } from '../../errors.ts'
import type { Rational } from '../../time/Rational.ts'
import { dayOfYear, toCalendar, type Instant } from '../../time/instant.ts'
import { FIXED_HEADER_SIZE, SeedEncoding, type SeedEncodingCode } from './MseedDecoder.ts'
import { encodeSteim, FRAME_BYTES } from './steim.ts'

const DATA_OFFSET = 64

export interface MseedInput {
  network: string
  station: string
  location?: string
  channel: string
  /** Must fall on a whole 0.0001 s, as must every record start */
  startTime: Instant
  sampleRate: Rational
  samples: ArrayLike<number>
  /** Defaults to Steim-2 */
  encoding?: SeedEncodingCode
  /** Power of two, at least 128; defaults to 512 */
  recordLength?: number
  /** Defaults to big-endian, as most miniSEED in the wild */
  byteOrder?: 'big' | 'little'
}

const INT16_MAX = 32767

/** Exact rate to a SEED factor / multiplier pair */
export function seedRateFields(rate: Rational): [number, number] {
  if (!rate.isPositive()) {
    throw new InvalidInputError(`Sample rate must be positive, got ${rate}`)
  }
  if (rate.isInteger() && rate.num <= BigInt(INT16_MAX)) {
    return [Number(rate.num), 1]
  }
  const period = rate.inverse()
  if (period.isInteger() && period.num <= BigInt(INT16_MAX)) {
    return [-Number(period.num), 1]
  }
  if (rate.num <= BigInt(INT16_MAX) && rate.den <= BigInt(INT16_MAX)) {
    return [Number(rate.num), -Number(rate.den)]
  }
  throw new InvalidInputError(`Sample rate ${rate} has no SEED factor/multiplier form`)
}

function sampleSize(encoding: SeedEncodingCode): number {
  switch (encoding) {
    case SeedEncoding.INT16:
      return 2
    case SeedEncoding.INT32:
    case SeedEncoding.FLOAT32:
      return 4
    case SeedEncoding.FLOAT64:
      return 8
    default:
      return 0
  }
}

function assertIntegers(samples: ArrayLike<number>, bits: number): void {
  const limit = 2 ** (bits - 1)
  for (let i = 0; i < samples.length; i++) {
    const v = samples[i]
    if (!Number.isInteger(v) || v < -limit || v >= limit) {
      throw new InvalidInputError(`Sample ${i} (${v}) is not a ${bits}-bit integer`)
    }
  }
}

/**
 * Encode a single trace as consecutive data records with blockette 1000 at
 * byte 48 and data from byte 64.
 */
export function encodeMseedRecords(input: MseedInput): Uint8Array {
  const encoding = input.encoding ?? SeedEncoding.STEIM2
  const recordLength = input.recordLength ?? 512
  const exponent = Math.log2(recordLength)
  if (!Number.isInteger(exponent) || recordLength < 128) {
    throw new InvalidInputError(`Record length must be a power of two >= 128, got ${recordLength}`)
  }
  if (encoding === SeedEncoding.INT16) assertIntegers(input.samples, 16)
  if (encoding === SeedEncoding.INT32 || encoding === SeedEncoding.STEIM1 || encoding === SeedEncoding.STEIM2) {
    assertIntegers(input.samples, 32)
  }

  if (input.samples.length === 0) {
    throw new InvalidInputError('No samples to encode')
  }

  const [factor, multiplier] = seedRateFields(input.sampleRate)
  const littleEndian = input.byteOrder === 'little'
  const w = new ByteWriter(recordLength * 4, littleEndian)
  const dataBytes = recordLength - DATA_OFFSET
  const total = input.samples.length
  let next = 0
  let sequence = 1

  while (next < total) {
    const recordStart = input.startTime.add(input.sampleRate.inverse().mul(next))
    const ticks = recordStart.mul(10_000)
    if (!ticks.isInteger()) {
      throw new InvalidInputError(`Record start ${recordStart} is not a whole 0.0001 s`)
    }

    let count: number
    let steimWords: number[] | undefined
    if (encoding === SeedEncoding.STEIM1 || encoding === SeedEncoding.STEIM2) {
      const level = encoding === SeedEncoding.STEIM1 ? 1 : 2
      const previous = next > 0 ? input.samples[next - 1] : 0
      const packed = encodeSteim(level, input.samples, next, Math.floor(dataBytes / FRAME_BYTES), previous)
      count = packed.count
      steimWords = packed.words
    } else {
      count = Math.min(total - next, Math.floor(dataBytes / sampleSize(encoding)))
    }

    const cal = toCalendar(recordStart)
    const recordBase = w.length
    w.writeAscii(String(sequence).padStart(6, '0'), 6)
      .writeAscii('D', 1)
      .writeAscii(' ', 1)
      .writeAscii(input.station, 5, 0x20)
      .writeAscii(input.location ?? '', 2, 0x20)
      .writeAscii(input.channel, 3, 0x20)
      .writeAscii(input.network, 2, 0x20)
      .writeUint16(cal.year)
      .writeUint16(dayOfYear(cal.year, cal.month, cal.day))
      .writeUint8(cal.hour)
      .writeUint8(cal.minute)
      .writeUint8(cal.second)
      .writeUint8(0)
      .writeUint16(Number(cal.fraction.mul(10_000).floor()))
      .writeUint16(count)
      .writeInt16(factor)
      .writeInt16(multiplier)
      .writeUint8(0)
      .writeUint8(0)
      .writeUint8(0)
      .writeUint8(1)
      .writeInt32(0)
      .writeUint16(DATA_OFFSET)
      .writeUint16(FIXED_HEADER_SIZE)
      // Blockette 1000
      .writeUint16(1000)
      .writeUint16(0)
      .writeUint8(encoding)
      .writeUint8(littleEndian ? 0 : 1)
      .writeUint8(exponent)
      .writeUint8(0)
      .padTo(recordBase + DATA_OFFSET)

    if (steimWords) {
      for (const word of steimWords) w.writeInt32(word)
    } else {
      for (let i = next; i < next + count; i++) {
        const v = input.samples[i]
        if (encoding === SeedEncoding.INT16) w.writeInt16(v)
        else if (encoding === SeedEncoding.INT32) w.writeInt32(v)
        else if (encoding === SeedEncoding.FLOAT32) w.writeFloat32(v)
        else w.writeFloat64(v)
      }
    }
    w.padTo(recordBase + recordLength)

    next += count
    sequence++
  }
  return w.toBytes()
}
