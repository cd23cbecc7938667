import { ByteWriter } from '../../io/ByteWriter.ts'
import { InvalidInputError } from '../../errors.ts'
import { LEMI_HEADER_LENGTH } from './lemiHeader.ts'

export interface LemiStamp {
  second: number
  counter: number
}

export interface B423FileInput {
  variant?: 'lemi-b423' | 'lemi-b423e'
  /** Kmx, Ax, Ke1, Ae1, ... */
  constants: Record<string, number>
  location?: Partial<Record<'Lat' | 'Lon' | 'Alt', number>>
  /** Integer samples per second, used to generate stamps */
  sampleRate: number
  firstSecond: number
  firstCounter?: number
  /** Counts per channel, in file channel order */
  counts: ReadonlyArray<ArrayLike<number>>
  /** Explicit per-record stamps, overriding the generated sequence */
  stamps?: readonly LemiStamp[]
}

export function encodeLemiAsciiHeader(
  constants: Record<string, number>,
  location: Partial<Record<'Lat' | 'Lon' | 'Alt', number>> = {},
): string {
  const lines = ['%LEMI423 recording']
  for (const [key, value] of Object.entries(location)) {
    lines.push(`%${key} ${value},N`)
  }
  for (const [key, value] of Object.entries(constants)) {
    lines.push(`%${key} = ${value}`)
  }
  return lines.join('\r\n') + '\r\n'
}

export function encodeB423File(input: B423FileInput): Uint8Array {
  const nChans = (input.variant ?? 'lemi-b423') === 'lemi-b423' ? 5 : 4
  if (input.counts.length !== nChans) {
    throw new InvalidInputError(`Expected ${nChans} channels of counts, got ${input.counts.length}`)
  }
  const nRecords = input.counts[0].length
  const recordBytes = 6 + nChans * 4 + 4
  const text = encodeLemiAsciiHeader(input.constants, input.location)
  if (text.length > LEMI_HEADER_LENGTH) {
    throw new InvalidInputError('Lemi header text exceeds 1024 bytes')
  }

  const w = new ByteWriter(LEMI_HEADER_LENGTH + nRecords * recordBytes)
  w.writeAscii(text).padTo(LEMI_HEADER_LENGTH)

  let second = input.firstSecond
  let counter = input.firstCounter ?? 0
  for (let r = 0; r < nRecords; r++) {
    const stamp = input.stamps?.[r] ?? { second, counter }
    w.writeUint32(stamp.second).writeUint16(stamp.counter)
    for (let c = 0; c < nChans; c++) w.writeInt32(input.counts[c][r])
    w.writeInt16(0).writeInt16(0)

    counter = stamp.counter + 1
    second = stamp.second
    if (counter >= input.sampleRate) {
      counter = 0
      second += 1
    }
  }
  return w.toBytes()
}
