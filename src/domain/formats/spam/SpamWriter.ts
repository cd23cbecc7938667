import { ByteWriter } from '../../io/ByteWriter.ts'
import { InvalidInputError } from '../../errors.ts'
import type { Rational } from '../../time/Rational.ts'
import type { Instant } from '../../time/instant.ts'
import { MICROSECONDS } from './SpamDecoder.ts'

export interface XtrChannelInput {
  name: string
  /** Electrode spacing in metres; ignored for magnetic channels */
  dipoleLength?: number
  /** Volts per unit as recorded in [DATA] */
  scaling: number
}

export interface XtrInput {
  rawFile: string
  sampleRate: Rational
  startTime: Instant
  nSamples: number
  channels: readonly XtrChannelInput[]
  coords?: { latitude: number; longitude: number; elevation: number }
}

function microsecondFields(instant: Instant): string {
  const us = instant.mul(MICROSECONDS)
  if (!us.isInteger()) {
    throw new InvalidInputError(`XTR times hold whole microseconds, got ${instant}`)
  }
  const seconds = us.num / MICROSECONDS
  const rest = us.num % MICROSECONDS
  return `${seconds} ${rest.toString().padStart(6, '0')}`
}

export function encodeXtr(input: XtrInput): Uint8Array {
  const last = input.startTime.add(input.sampleRate.inverse().mul(input.nSamples - 1))
  const lines = [
    '[STATUS]',
    'STATUS=OK',
    '[FILE]',
    `NAME='${input.rawFile} 0 0 ${input.sampleRate.toNumber()}'`,
    `DATE='${microsecondFields(input.startTime)} ${microsecondFields(last)}'`,
    '[CHANNAME]',
    `ITEMS=${input.channels.length}`,
    ...input.channels.map((c, i) => `NAME='${i + 1} ${c.name}'`),
    '[DATA]',
    `ITEMS=${input.channels.length}`,
    ...input.channels.map((c, i) => `CHAN='${i + 1} 0 0 ${c.dipoleLength ?? 0} 0 ${c.scaling} 0'`),
  ]
  if (input.coords) {
    const { latitude, longitude, elevation } = input.coords
    lines.push('[SITE]', `COORDS='0 ${latitude} ${longitude} ${elevation}'`)
  }
  const text = lines.join('\n') + '\n'
  return new ByteWriter(text.length).writeAscii(text).toBytes()
}

export interface SpamRawInput {
  /** Volts per channel, all the same length */
  data: ReadonlyArray<ArrayLike<number>>
  /** Defaults to 128 */
  recLength?: number
  /** Sample count written to the event header; defaults to the data length */
  nSamples?: number
  /** Extra events to chain after the first (for malformed fixtures) */
  extraEvents?: number
}

export function encodeSpamRaw(input: SpamRawInput): Uint8Array {
  const recLength = input.recLength ?? 128
  const recChans = input.data.length
  const n = recChans > 0 ? input.data[0].length : 0
  const nEvents = 1 + (input.extraEvents ?? 0)
  const dataRecords = Math.ceil((n * recChans * 4) / recLength)
  const firstData = 2 + nEvents
  const totalRec = firstData - 1 + dataRecords

  const w = new ByteWriter(totalRec * recLength)
  const general = `${recLength} RAW 32 1.0 0 ${recChans} ${totalRec} 2 ${nEvents} 0`
  if (general.length > recLength) {
    throw new InvalidInputError(`Record length ${recLength} too short for the headers`)
  }
  w.writeAscii(general, recLength, 0x20)

  for (let e = 0; e < nEvents; e++) {
    const record = 2 + e
    const next = e + 1 < nEvents ? record + 1 : totalRec + 1
    const previous = e === 0 ? 0 : record - 1
    const event = `0 0 0 0 0 0 0 ${record} ${next} ${previous} ${input.nSamples ?? n} ${firstData} 0`
    w.writeAscii(event, recLength, 0x20)
  }

  for (let s = 0; s < n; s++) {
    for (let c = 0; c < recChans; c++) w.writeFloat32(input.data[c][s])
  }
  return w.toBytes()
}
