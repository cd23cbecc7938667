/**
 * miniSEED 2.4 data records.
 *
 * Each record is a 48-byte fixed header, a chain of blockettes (1000 is
 * required and gives encoding, word order and record length; 100 optionally
 * overrides the nominal rate) and a data section. A file may interleave
 * several channels; each one becomes its own run of segments.
 */
import { ByteStream } from '../../io/ByteStream.ts'
import { MalformedHeaderError } from '../../errors.ts'
import { Rational } from '../../time/Rational.ts'
import { instantFromDayOfYear, type Instant } from '../../time/instant.ts'
import type { ChannelSpec, Header, Segment, SensorType } from '../../types/TimeSeries.ts'
import { createSegment } from '../../types/segment.ts'
import { validateHeader } from '../headerValidation.ts'
import { checkAborted, reportTruncation } from '../payloadSupport.ts'
import type { DecodeOptions, DecodeWarning, FormatDecoder, PayloadResult, SourceFile } from '../types.ts'
import { decodeSteim, FRAME_BYTES } from './steim.ts'

export const FIXED_HEADER_SIZE = 48

export const SeedEncoding = {
  INT16: 1,
  INT32: 3,
  FLOAT32: 4,
  FLOAT64: 5,
  STEIM1: 10,
  STEIM2: 11,
} as const

export type SeedEncodingCode = typeof SeedEncoding[keyof typeof SeedEncoding]

const ENCODING_CODES: readonly number[] = Object.values(SeedEncoding)

function isEncodingCode(value: number): value is SeedEncodingCode {
  return ENCODING_CODES.includes(value)
}

export interface SeedRecordHeader {
  offset: number
  sequence: string
  quality: string
  network: string
  station: string
  location: string
  channel: string
  /** NET.STA.LOC.CHA */
  id: string
  start: Instant
  nSamples: number
  sampleRate: Rational
  dataOffset: number
  recordLength: number
  encoding: SeedEncodingCode
  bigEndian: boolean
}

/** SEED factor / multiplier pair to an exact rate; 0 for records without samples */
export function seedSampleRate(factor: number, multiplier: number): Rational {
  if (factor === 0 || multiplier === 0) return Rational.ZERO
  if (factor > 0 && multiplier > 0) return Rational.of(factor * multiplier)
  if (factor > 0) return Rational.of(factor, -multiplier)
  if (multiplier > 0) return Rational.of(multiplier, -factor)
  return Rational.of(1, factor * multiplier)
}

function detectBigEndian(bytes: Uint8Array, offset: number): boolean {
  const view = new DataView(bytes.buffer, bytes.byteOffset + offset + 20, 4)
  const year = view.getUint16(0, false)
  const doy = view.getUint16(2, false)
  return year >= 1900 && year <= 2500 && doy >= 1 && doy <= 366
}

function looksLikeSeed(head: Uint8Array): boolean {
  if (head.length < FIXED_HEADER_SIZE) return false
  for (let i = 0; i < 6; i++) {
    const b = head[i]
    if (!((b >= 0x30 && b <= 0x39) || b === 0x20)) return false
  }
  if (!'DRQM'.includes(String.fromCharCode(head[6]))) return false
  if (head[7] !== 0x20 && head[7] !== 0) return false

  const big = detectBigEndian(head, 0)
  const view = new DataView(head.buffer, head.byteOffset, FIXED_HEADER_SIZE)
  const year = view.getUint16(20, big)
  const doy = view.getUint16(22, big)
  return year >= 1900 && year <= 2500 && doy >= 1 && doy <= 366
}

export function readRecordHeader(bytes: Uint8Array, offset: number, file: string): SeedRecordHeader {
  if (offset + FIXED_HEADER_SIZE > bytes.length) {
    throw new MalformedHeaderError('Record shorter than the fixed header', { file, offset })
  }
  const bigEndian = detectBigEndian(bytes, offset)
  const stream = new ByteStream(bytes, offset, bytes.length, !bigEndian)

  const sequence = stream.readAscii(6)
  const quality = String.fromCharCode(stream.readUint8())
  stream.skip(1)
  const station = stream.readAscii(5)
  const location = stream.readAscii(2)
  const channel = stream.readAscii(3)
  const network = stream.readAscii(2)

  const year = stream.readUint16()
  const doy = stream.readUint16()
  const hour = stream.readUint8()
  const minute = stream.readUint8()
  const second = stream.readUint8()
  stream.skip(1)
  const tenThousandths = stream.readUint16()
  const nSamples = stream.readUint16()
  const factor = stream.readInt16()
  const multiplier = stream.readInt16()
  const activityFlags = stream.readUint8()
  stream.skip(2) // I/O and quality flags
  const nBlockettes = stream.readUint8()
  const timeCorrection = stream.readInt32()
  const dataOffset = stream.readUint16()
  let blocketteOffset = stream.readUint16()

  let start = instantFromDayOfYear(year, doy, hour, minute, second, Rational.of(tenThousandths, 10_000))
  if (!start) {
    throw new MalformedHeaderError(`Invalid record start ${year}/${doy}`, { file, offset: offset + 20 })
  }
  // Bit 1 set means the correction is already applied
  if ((activityFlags & 0x02) === 0 && timeCorrection !== 0) {
    start = start.add(Rational.of(timeCorrection, 10_000))
  }

  let sampleRate = seedSampleRate(factor, multiplier)
  let encoding: number | undefined
  let recordLength: number | undefined
  let wordOrderBig = bigEndian

  for (let b = 0; b < nBlockettes && blocketteOffset > 0; b++) {
    const at = offset + blocketteOffset
    if (at + 4 > bytes.length) {
      throw new MalformedHeaderError('Blockette past end of file', { file, offset: at })
    }
    stream.offset = at
    const type = stream.readUint16()
    const next = stream.readUint16()
    if (type === 1000) {
      encoding = stream.readUint8()
      wordOrderBig = stream.readUint8() === 1
      recordLength = 2 ** stream.readUint8()
    } else if (type === 100) {
      const actual = stream.readFloat32()
      if (Number.isFinite(actual) && actual > 0) sampleRate = Rational.fromFloat32(actual)
    }
    blocketteOffset = next
  }

  if (encoding === undefined || recordLength === undefined) {
    throw new MalformedHeaderError('Record has no blockette 1000', { file, offset })
  }
  if (!isEncodingCode(encoding)) {
    throw new MalformedHeaderError(`Unsupported data encoding ${encoding}`, { file, offset })
  }
  if (recordLength < FIXED_HEADER_SIZE || dataOffset > recordLength) {
    throw new MalformedHeaderError(`Invalid record length ${recordLength}`, { file, offset })
  }

  return {
    offset,
    sequence,
    quality,
    network,
    station,
    location,
    channel,
    id: `${network}.${station}.${location}.${channel}`,
    start,
    nSamples,
    sampleRate,
    dataOffset,
    recordLength,
    encoding,
    bigEndian: wordOrderBig,
  }
}

export function readRecordHeaders(bytes: Uint8Array, file: string): { records: SeedRecordHeader[]; trailing: number } {
  const records: SeedRecordHeader[] = []
  let offset = 0
  while (offset + FIXED_HEADER_SIZE <= bytes.length) {
    const header = readRecordHeader(bytes, offset, file)
    if (offset + header.recordLength > bytes.length) break
    records.push(header)
    offset += header.recordLength
  }
  return { records, trailing: bytes.length - offset }
}

/** Samples of one record as raw numbers */
export function decodeRecordData(bytes: Uint8Array, header: SeedRecordHeader, file: string): ArrayLike<number> {
  const start = header.offset + header.dataOffset
  const end = header.offset + header.recordLength
  const stream = new ByteStream(bytes, start, end, !header.bigEndian)
  const n = header.nSamples
  const need = (size: number) => {
    if (n * size > end - start) {
      throw new MalformedHeaderError(`Data section holds fewer than ${n} samples`, { file, offset: start })
    }
  }

  switch (header.encoding) {
    case SeedEncoding.INT16: {
      need(2)
      const out = new Float64Array(n)
      for (let i = 0; i < n; i++) out[i] = stream.readInt16()
      return out
    }
    case SeedEncoding.INT32: {
      need(4)
      const out = new Float64Array(n)
      for (let i = 0; i < n; i++) out[i] = stream.readInt32()
      return out
    }
    case SeedEncoding.FLOAT32: {
      need(4)
      const out = new Float64Array(n)
      for (let i = 0; i < n; i++) out[i] = stream.readFloat32()
      return out
    }
    case SeedEncoding.FLOAT64: {
      need(8)
      const out = new Float64Array(n)
      for (let i = 0; i < n; i++) out[i] = stream.readFloat64()
      return out
    }
    case SeedEncoding.STEIM1:
    case SeedEncoding.STEIM2: {
      const view = new DataView(bytes.buffer, bytes.byteOffset + start, end - start)
      const nFrames = Math.floor((end - start) / FRAME_BYTES)
      const level = header.encoding === SeedEncoding.STEIM1 ? 1 : 2
      try {
        return decodeSteim(level, i => view.getInt32(i * 4, !header.bigEndian), nFrames, n).samples
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err)
        throw new MalformedHeaderError(detail, { file, offset: start })
      }
    }
  }
}

export function seedSensorType(channelCode: string): SensorType {
  const instrument = channelCode.charAt(1).toUpperCase()
  if (instrument === 'F') return 'magnetic'
  if (instrument === 'Q') return 'electric'
  return 'other'
}

function channelName(record: SeedRecordHeader, options: DecodeOptions | undefined): string {
  return options?.channelMap?.[record.id] ?? options?.channelMap?.[record.channel] ?? record.channel
}

function decodeHeader(source: SourceFile, options?: DecodeOptions): Header {
  const file = source.path
  const { records } = readRecordHeaders(source.bytes, file)
  const withData = records.filter(r => r.nSamples > 0 && r.sampleRate.isPositive())
  if (withData.length === 0) {
    throw new MalformedHeaderError('No data records', { file, offset: 0 })
  }

  const ids: string[] = []
  const channels: ChannelSpec[] = []
  let startTime = withData[0].start
  for (const record of withData) {
    if (record.start.lt(startTime)) startTime = record.start
    if (ids.includes(record.id)) continue
    ids.push(record.id)
    channels.push({
      name: channelName(record, options),
      unit: 'counts',
      scaling: 1,
      offset: 0,
      sensorType: seedSensorType(record.channel),
    })
  }

  const first = withData[0]
  return validateHeader({
    format: 'miniseed',
    source: file,
    startTime,
    sampleRate: first.sampleRate,
    channels,
    nSamples: ids.length === 1 ? withData.reduce((sum, r) => sum + r.nSamples, 0) : undefined,
    properties: {
      recordLength: first.recordLength,
      encoding: first.encoding,
      records: records.length,
      traceIds: ids.join(','),
      network: first.network,
      station: first.station,
    },
  })
}

interface PendingRun {
  start: Instant
  rate: Rational
  chunks: ArrayLike<number>[]
  length: number
}

function flushRun(run: PendingRun, name: string, file: string): Segment {
  const samples = new Float64Array(run.length)
  let at = 0
  for (const chunk of run.chunks) {
    samples.set(chunk, at)
    at += chunk.length
  }
  return createSegment(name, run.start, run.rate, samples, [file])
}

function decodePayload(source: SourceFile, header: Header, options?: DecodeOptions): PayloadResult {
  const file = source.path
  const warnings: DecodeWarning[] = []
  const { records, trailing } = readRecordHeaders(source.bytes, file)

  const specs = new Map(header.channels.map(c => [c.name, c]))
  const runs = new Map<string, PendingRun[]>()
  const decoded = new Map<string, number>()

  for (const record of records) {
    checkAborted(options, file)
    if (record.nSamples === 0 || !record.sampleRate.isPositive()) continue
    const name = channelName(record, options)
    const spec = specs.get(name)
    if (!spec) continue
    if (options?.channels !== undefined && !options.channels.includes(name)) continue

    const raw = decodeRecordData(source.bytes, record, file)
    const scaled = new Float64Array(raw.length)
    for (let i = 0; i < raw.length; i++) {
      scaled[i] = spec.offset === 0 ? raw[i] * spec.scaling : raw[i] * spec.scaling + spec.offset
    }

    const list = runs.get(name) ?? []
    runs.set(name, list)
    decoded.set(name, (decoded.get(name) ?? 0) + scaled.length)
    const current = list.length > 0 ? list[list.length - 1] : undefined
    const continuation = current
      ? current.start.add(Rational.of(current.length).div(current.rate))
      : undefined
    if (current && continuation && current.rate.eq(record.sampleRate) && continuation.eq(record.start)) {
      current.chunks.push(scaled)
      current.length += scaled.length
    } else {
      list.push({ start: record.start, rate: record.sampleRate, chunks: [scaled], length: scaled.length })
    }
  }

  if (trailing > 0) {
    const recoverable = Math.max(0, ...decoded.values())
    reportTruncation(warnings, options, recoverable, undefined, `Trailing ${trailing} bytes hold no whole record`, {
      file,
      offset: source.bytes.length - trailing,
    })
  }

  const segments: Segment[] = []
  const missingChannels: string[] = []
  for (const spec of header.channels) {
    const list = runs.get(spec.name)
    if (!list || list.length === 0) {
      missingChannels.push(spec.name)
      continue
    }
    for (const run of list) segments.push(flushRun(run, spec.name, file))
  }
  segments.sort((a, b) => a.startTime.compare(b.startTime))

  return { segments, warnings, missingChannels }
}

export const mseedDecoder: FormatDecoder = {
  format: 'miniseed',
  matchesMagic: looksLikeSeed,
  decodeHeader,
  decodePayload,
}
