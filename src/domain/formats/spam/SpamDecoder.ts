/**
 * SPAM recordings: a .XTR text header beside a .RAW data file.
 *
 * The RAW file is divided into fixed-length records. Record 1 holds a
 * whitespace-separated general header, the event header sits in the record
 * named by the general header, and samples start in the record named by the
 * event header as interleaved little-endian float32 volts.
 *
 * Polarity is reversed on every channel. Electric channels take the XTR
 * scaling to mV and are divided by the dipole length in km; magnetic
 * channels are scaled by -1000 to mV.
 */
import { ByteStream, decodeBytes } from '../../io/ByteStream.ts'
import { MalformedHeaderError } from '../../errors.ts'
import { Rational } from '../../time/Rational.ts'
import type { ChannelSpec, Header, SensorType } from '../../types/TimeSeries.ts'
import { mapChannelName, numberProperty, validateHeader } from '../headerValidation.ts'
import { checkAborted, reportTruncation, selectChannels } from '../payloadSupport.ts'
import { SegmentBuilder } from '../SegmentBuilder.ts'
import type { DecodeOptions, DecodeWarning, FormatDecoder, PayloadResult, SourceFile } from '../types.ts'
import { extensionOf, findCompanion } from '../paths.ts'
import { parseXtr, xtrValue, xtrValues } from './xtr.ts'

export const MICROSECONDS = 1_000_000n

export interface RawGeneralHeader {
  recLength: number
  fileType: string
  wordLength: number
  version: string
  procId: string
  recChans: number
  totalRec: number
  firstEvent: number
  nEvents: number
  extend: number
}

export interface RawEventHeader {
  start: number
  startMs: number
  stop: number
  stopMs: number
  eventHeaderInFile: number
  nextEventHeader: number
  previousEventHeader: number
  nSamples: number
  startData: number
  extended: number
}

function tokens(bytes: Uint8Array, start: number, length: number): string[] {
  return decodeBytes(bytes, start, Math.min(bytes.length, start + length))
    .replace(/\0/g, ' ')
    .trim()
    .split(/\s+/)
}

function toInt(text: string | undefined, what: string, file: string, offset: number): number {
  const value = text === undefined ? NaN : Number(text)
  if (!Number.isInteger(value)) {
    throw new MalformedHeaderError(`Invalid ${what} "${text ?? ''}"`, { file, offset })
  }
  return value
}

export function readRawGeneralHeader(bytes: Uint8Array, file: string): RawGeneralHeader {
  const t = tokens(bytes, 0, 1000)
  if (t.length < 10) {
    throw new MalformedHeaderError('RAW general header has fewer than 10 fields', { file, offset: 0 })
  }
  const header: RawGeneralHeader = {
    recLength: toInt(t[0], 'record length', file, 0),
    fileType: t[1],
    wordLength: toInt(t[2], 'word length', file, 0),
    version: t[3],
    procId: t[4],
    recChans: toInt(t[5], 'channel count', file, 0),
    totalRec: toInt(t[6], 'record count', file, 0),
    firstEvent: toInt(t[7], 'first event record', file, 0),
    nEvents: toInt(t[8], 'event count', file, 0),
    extend: toInt(t[9], 'extend flag', file, 0),
  }
  if (header.recLength <= 0 || header.recChans <= 0 || header.firstEvent < 1) {
    throw new MalformedHeaderError('RAW general header out of range', { file, offset: 0 })
  }
  return header
}

export function readRawEventHeader(bytes: Uint8Array, offset: number, length: number, file: string): RawEventHeader {
  const t = tokens(bytes, offset, length)
  if (t.length < 13) {
    throw new MalformedHeaderError('RAW event header has fewer than 13 fields', { file, offset })
  }
  return {
    start: toInt(t[0], 'event start', file, offset),
    startMs: toInt(t[1], 'event start ms', file, offset),
    stop: toInt(t[2], 'event stop', file, offset),
    stopMs: toInt(t[3], 'event stop ms', file, offset),
    eventHeaderInFile: toInt(t[7], 'event header record', file, offset),
    nextEventHeader: toInt(t[8], 'next event record', file, offset),
    previousEventHeader: toInt(t[9], 'previous event record', file, offset),
    nSamples: toInt(t[10], 'event sample count', file, offset),
    startData: toInt(t[11], 'data start record', file, offset),
    extended: toInt(t[12], 'extended flag', file, offset),
  }
}

/** Walk the event chain; SPAM files written for MT hold exactly one event */
export function readSingleEvent(bytes: Uint8Array, general: RawGeneralHeader, file: string): RawEventHeader {
  const events: RawEventHeader[] = []
  let record = general.firstEvent
  for (let i = 0; i < general.nEvents; i++) {
    const offset = (record - 1) * general.recLength
    if (offset >= bytes.length) break
    const event = readRawEventHeader(bytes, offset, general.recLength, file)
    events.push(event)
    if (event.nextEventHeader < general.totalRec) {
      record = event.nextEventHeader
    } else {
      break
    }
  }
  if (events.length !== 1) {
    throw new MalformedHeaderError(`Expected 1 event in RAW file, found ${events.length}`, { file })
  }
  return events[0]
}

function sensorTypeOf(channel: string): SensorType {
  if (/^E/i.test(channel)) return 'electric'
  if (/^H/i.test(channel)) return 'magnetic'
  return 'other'
}

function decodeHeader(source: SourceFile, options?: DecodeOptions): Header {
  const file = source.path
  if (!source.sidecar) {
    throw new MalformedHeaderError('SPAM data needs its .XTR header file', { file })
  }
  const xtrFile = source.sidecar.path
  const xtr = parseXtr(source.sidecar.bytes, xtrFile)

  const nameFields = xtrValue(xtr, 'FILE', 'NAME', xtrFile).split(/\s+/)
  const rate = Rational.parse(nameFields[nameFields.length - 1])
  if (!rate || rate.isZero()) {
    throw new MalformedHeaderError('Invalid sample rate in [FILE] NAME', { file: xtrFile })
  }
  const sampleRate = rate.abs()

  const dateFields = xtrValue(xtr, 'FILE', 'DATE', xtrFile).split(/\s+/)
  if (dateFields.length < 4 || !dateFields.every(f => /^\d+$/.test(f))) {
    throw new MalformedHeaderError('Invalid [FILE] DATE', { file: xtrFile })
  }
  const firstTime = Rational.of(BigInt(dateFields[0] + dateFields[1]), MICROSECONDS)
  const lastTime = Rational.of(BigInt(dateFields[2] + dateFields[3]), MICROSECONDS)
  const span = lastTime.sub(firstTime).mul(sampleRate)
  if (!span.isInteger() || span.num < 0n) {
    throw new MalformedHeaderError('First and last times are not a whole number of samples apart', { file: xtrFile })
  }
  const nSamples = Number(span.num) + 1

  const chanNames = xtrValues(xtr, 'CHANNAME', 'NAME', xtrFile).map(v => {
    const parts = v.split(/\s+/)
    return parts.length > 1 ? parts[1] : parts[0]
  })
  const dataLines = xtrValues(xtr, 'DATA', 'CHAN', xtrFile)
  if (dataLines.length !== chanNames.length) {
    throw new MalformedHeaderError(
      `[CHANNAME] lists ${chanNames.length} channels, [DATA] ${dataLines.length}`,
      { file: xtrFile },
    )
  }

  const properties: Record<string, string | number> = {
    rawFile: nameFields[0],
  }

  const channels: ChannelSpec[] = chanNames.map((chan, i): ChannelSpec => {
    const fields = dataLines[i].split(/\s+/)
    const xtrScaling = Number(fields[fields.length - 2])
    if (fields.length < 5 || !Number.isFinite(xtrScaling)) {
      throw new MalformedHeaderError(`Invalid [DATA] CHAN line for ${chan}`, { file: xtrFile })
    }
    const name = mapChannelName(chan, options)
    const sensorType = sensorTypeOf(chan)
    if (sensorType === 'electric') {
      const dipole = Number(fields[3])
      if (!Number.isFinite(dipole) || dipole === 0) {
        throw new MalformedHeaderError(`No dipole length for ${chan}`, { file: xtrFile })
      }
      properties[`dipole_${name}`] = dipole
      return { name, unit: 'mV/km', scaling: (-1e6 * xtrScaling * 1000) / dipole, offset: 0, sensorType }
    }
    if (sensorType === 'magnetic') {
      return { name, unit: 'mV', scaling: -1000, offset: 0, sensorType }
    }
    return { name, unit: 'V', scaling: xtrScaling, offset: 0, sensorType }
  })

  const coords = xtr.get('SITE')?.get('COORDS')?.[0]?.split(/\s+/)
  if (coords && coords.length >= 4) {
    properties.latitude = Number(coords[1])
    properties.longitude = Number(coords[2])
    properties.elevation = Number(coords[3])
  }

  const general = readRawGeneralHeader(source.bytes, file)
  const event = readSingleEvent(source.bytes, general, file)
  if (event.nSamples !== nSamples) {
    throw new MalformedHeaderError(
      `XTR implies ${nSamples} samples, RAW event holds ${event.nSamples}`,
      { file },
    )
  }
  if (general.recChans !== channels.length) {
    throw new MalformedHeaderError(
      `XTR lists ${channels.length} channels, RAW records ${general.recChans}`,
      { file },
    )
  }
  properties.recLength = general.recLength
  properties.recChans = general.recChans
  properties.dataByteStart = (event.startData - 1) * general.recLength

  return validateHeader({
    format: 'spam',
    source: file,
    startTime: firstTime,
    sampleRate,
    channels,
    nSamples,
    properties,
  })
}

function decodePayload(source: SourceFile, header: Header, options?: DecodeOptions): PayloadResult {
  const file = source.path
  const warnings: DecodeWarning[] = []
  const { channels, indices, missing } = selectChannels(header, options)
  if (channels.length === 0) {
    return { segments: [], warnings, missingChannels: missing }
  }

  const recChans = numberProperty(header, 'recChans')
  const dataStart = numberProperty(header, 'dataByteStart')
  const expected = header.nSamples ?? 0
  const scanBytes = recChans * 4
  const available = Math.max(0, Math.floor((source.bytes.length - dataStart) / scanBytes))
  let count = expected
  if (available < expected) {
    count = available
    reportTruncation(warnings, options, count, expected, `RAW data holds ${available} of ${expected} samples`, {
      file,
      offset: dataStart + available * scanBytes,
    })
  }

  const builder = new SegmentBuilder(channels, header.sampleRate, file, count)
  const base = builder.beginRecord(header.startTime, count)
  const stream = new ByteStream(source.bytes, dataStart)
  const raw = new Array<number>(recChans)
  for (let s = 0; s < count; s++) {
    if ((s & 0xFFFF) === 0) checkAborted(options, file)
    for (let c = 0; c < recChans; c++) raw[c] = stream.readFloat32()
    for (let c = 0; c < channels.length; c++) {
      builder.put(c, base + s, raw[indices[c]])
    }
  }
  checkAborted(options, file)

  return { segments: builder.build(), warnings, missingChannels: missing }
}

export const spamDecoder: FormatDecoder = {
  format: 'spam',
  matchesName: (path, siblings) =>
    extensionOf(path) === '.RAW' && findCompanion(path, siblings, '.XTR') !== undefined,
  sidecarPath: (path, siblings) => findCompanion(path, siblings, '.XTR'),
  decodeHeader,
  decodePayload,
}
