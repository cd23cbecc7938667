import { ByteWriter } from '../../io/ByteWriter.ts'
import { InvalidInputError } from '../../errors.ts'
import { toCalendar, type Instant } from '../../time/instant.ts'
import { SAMPLE_SIZE, TAG_SIZE } from './PhoenixDecoder.ts'

export interface PhoenixRecordInput {
  /** Whole-second start of the record */
  start: Instant
  /** Counts per channel in scan order; all the same length */
  counts: ReadonlyArray<ArrayLike<number>>
}

export interface PhoenixTsInput {
  serial?: number
  sampleRate: number
  records: readonly PhoenixRecordInput[]
}

export function encodePhoenixTs(input: PhoenixTsInput): Uint8Array {
  const w = new ByteWriter(4096)

  for (const record of input.records) {
    if (!record.start.isInteger()) {
      throw new InvalidInputError(`Phoenix record tags hold whole seconds, got ${record.start}`)
    }
    const nChans = record.counts.length
    const nScans = nChans > 0 ? record.counts[0].length : 0
    const cal = toCalendar(record.start)
    const tagStart = w.length

    w.writeUint8(cal.second)
      .writeUint8(cal.minute)
      .writeUint8(cal.hour)
      .writeUint8(cal.day)
      .writeUint8(cal.month)
      .writeUint8(cal.year % 100)
      .writeUint8(0)
      .writeUint8(Math.floor(cal.year / 100))
      .writeInt16(input.serial ?? 0)
      .writeUint16(nScans)
      .writeUint8(nChans)
      .writeUint8(TAG_SIZE)
      .writeUint8(0)
      .writeUint8(0)
      .writeUint8(0)
      .writeUint8(SAMPLE_SIZE)
      .writeInt16(input.sampleRate)
      .writeUint8(0)
      .writeUint8(0)
      .writeInt32(0)
      .padTo(tagStart + TAG_SIZE)

    for (let s = 0; s < nScans; s++) {
      for (let c = 0; c < nChans; c++) w.writeInt24(record.counts[c][s])
    }
  }
  return w.toBytes()
}
