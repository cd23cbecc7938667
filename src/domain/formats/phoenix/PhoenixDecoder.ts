/**
 * Phoenix MTU-5 time series (.TS2 - .TS5) with their .TBL table.
 *
 * A .TS file is a sequence of records. Each record opens with a 32-byte tag
 * (start time, scan count, channel count, ...) followed by interleaved 24-bit
 * little-endian two's complement samples, one scan per sample instant.
 * Only the highest band is usually continuous; the others are bursts and
 * come out as separate segments.
 */
import { ByteStream } from '../../io/ByteStream.ts'
import { MalformedHeaderError } from '../../errors.ts'
import { Rational } from '../../time/Rational.ts'
import { instantFromCalendar, type Instant } from '../../time/instant.ts'
import type { ChannelSpec, Header } from '../../types/TimeSeries.ts'
import { mapChannelName, validateHeader } from '../headerValidation.ts'
import { checkAborted, reportTruncation, selectChannels } from '../payloadSupport.ts'
import { SegmentBuilder } from '../SegmentBuilder.ts'
import type { DecodeOptions, DecodeWarning, FormatDecoder, PayloadResult, SourceFile } from '../types.ts'
import { extensionOf, findSingle } from '../paths.ts'
import { parsePhoenixTable, type TableValue } from './PhoenixTable.ts'

export const TAG_SIZE = 32
export const SAMPLE_SIZE = 3
const FULL_SCALE_COUNTS = 2 ** 23

const TS_EXTENSIONS = ['.TS2', '.TS3', '.TS4', '.TS5']

const PHOENIX_CHANNELS = [
  { name: 'Ex', key: 'CHEX', sensorType: 'electric' },
  { name: 'Ey', key: 'CHEY', sensorType: 'electric' },
  { name: 'Hx', key: 'CHHX', sensorType: 'magnetic' },
  { name: 'Hy', key: 'CHHY', sensorType: 'magnetic' },
  { name: 'Hz', key: 'CHHZ', sensorType: 'magnetic' },
] as const

export interface PhoenixTag {
  start: Instant | null
  serial: number
  nScans: number
  nChans: number
  tagLength: number
  statusCode: number
  saturationFlag: number
  sampleLength: number
  sampleRate: number
  /** 0 Hz, 1 per minute, 2 per hour, 3 per day */
  sampleRateUnits: number
  clockStatus: number
  /** Microseconds */
  clockError: number
}

export function readTag(stream: ByteStream): PhoenixTag {
  const second = stream.readUint8()
  const minute = stream.readUint8()
  const hour = stream.readUint8()
  const day = stream.readUint8()
  const month = stream.readUint8()
  const year = stream.readUint8()
  stream.skip(1) // day of week
  const century = stream.readUint8()
  const serial = stream.readInt16()
  const nScans = stream.readUint16()
  const nChans = stream.readUint8()
  const tagLength = stream.readUint8()
  const statusCode = stream.readUint8()
  const saturationFlag = stream.readUint8()
  stream.skip(1) // reserved
  const sampleLength = stream.readUint8()
  const sampleRate = stream.readInt16()
  const sampleRateUnits = stream.readUint8()
  const clockStatus = stream.readUint8()
  const clockError = stream.readInt32()
  const tag: PhoenixTag = {
    start: instantFromCalendar(century * 100 + year, month, day, hour, minute, second),
    serial,
    nScans,
    nChans,
    tagLength,
    statusCode,
    saturationFlag,
    sampleLength,
    sampleRate,
    sampleRateUnits,
    clockStatus,
    clockError,
  }
  stream.skip(6)
  return tag
}

function requireNumber(entries: Map<string, TableValue>, key: string, file: string): number {
  const value = entries.get(key)
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new MalformedHeaderError(`Table entry ${key} missing or not numeric`, { file })
  }
  return value
}

function bandOf(path: string): number {
  return parseInt(extensionOf(path).slice(3), 10)
}

function decodeHeader(source: SourceFile, options?: DecodeOptions): Header {
  const file = source.path
  if (!source.sidecar) {
    throw new MalformedHeaderError('Phoenix data needs its .TBL table file', { file })
  }
  const tableFile = source.sidecar.path
  const { entries, unknown } = parsePhoenixTable(source.sidecar.bytes)

  const band = bandOf(file)
  if (!Number.isInteger(band)) {
    throw new MalformedHeaderError(`Cannot tell the band from ${file}`, { file })
  }
  const rate = requireNumber(entries, `SRL${band}`, tableFile)

  const ordered = PHOENIX_CHANNELS
    .filter(c => typeof entries.get(c.key) === 'number')
    .map(c => ({ ...c, position: requireNumber(entries, c.key, tableFile) }))
    .sort((a, b) => a.position - b.position)

  const fullScale = requireNumber(entries, 'FSCV', tableFile) / FULL_SCALE_COUNTS
  const channels: ChannelSpec[] = ordered.map((c): ChannelSpec => {
    const name = mapChannelName(c.name, options)
    if (c.sensorType === 'electric') {
      const gain = requireNumber(entries, 'EGN', tableFile)
      const dipole = requireNumber(entries, c.name === 'Ex' ? 'EXLN' : 'EYLN', tableFile)
      if (dipole === 0 || gain === 0) {
        throw new MalformedHeaderError(`Zero gain or dipole length for ${c.name}`, { file: tableFile })
      }
      return { name, unit: 'mV/km', scaling: (fullScale / gain / dipole) * 1e6, offset: 0, sensorType: 'electric' }
    }
    const gain = requireNumber(entries, 'HGN', tableFile) * requireNumber(entries, 'HATT', tableFile)
    const hnum = entries.get('HNUM')
    if (gain === 0) {
      throw new MalformedHeaderError(`Zero gain for ${c.name}`, { file: tableFile })
    }
    // HNUM is the coil sensitivity in mV/nT; without it the channel stays in volts
    if (typeof hnum === 'number' && hnum !== 0) {
      return { name, unit: 'nT', scaling: (fullScale / gain) * (1000 / hnum), offset: 0, sensorType: 'magnetic' }
    }
    return { name, unit: 'V', scaling: fullScale / gain, offset: 0, sensorType: 'magnetic' }
  })

  if (source.bytes.length < TAG_SIZE) {
    throw new MalformedHeaderError('No record tag', { file, offset: 0 })
  }
  const first = readTag(new ByteStream(source.bytes))
  if (!first.start) {
    throw new MalformedHeaderError('Invalid start time in first record tag', { file, offset: 0 })
  }
  if (first.nChans !== channels.length) {
    throw new MalformedHeaderError(
      `Record holds ${first.nChans} channels, table lists ${channels.length}`,
      { file, offset: 0 },
    )
  }

  let nSamples = 0
  const stream = new ByteStream(source.bytes)
  while (stream.remaining >= TAG_SIZE) {
    const tag = readTag(stream)
    nSamples += tag.nScans
    stream.skip(tag.nScans * tag.nChans * SAMPLE_SIZE)
  }

  const properties: Record<string, string | number> = {
    band,
    table: tableFile,
    serial: first.serial,
  }
  for (const [key, value] of entries) properties[key] = value
  if (unknown.length > 0) properties.unknownEntries = unknown.join(',')

  return validateHeader({
    format: 'phoenix-ts',
    source: file,
    startTime: first.start,
    sampleRate: Rational.fromNumber(rate),
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

  const nChans = header.channels.length
  const builder = new SegmentBuilder(channels, header.sampleRate, file, header.nSamples ?? 0)
  const stream = new ByteStream(source.bytes)
  const raw = new Array<number>(nChans)

  while (stream.remaining > 0) {
    checkAborted(options, file)
    const tagOffset = stream.offset
    if (stream.remaining < TAG_SIZE) {
      reportTruncation(warnings, options, 0, undefined, `Trailing ${stream.remaining} bytes do not hold a record tag`, {
        file,
        offset: tagOffset,
      })
      break
    }
    const tag = readTag(stream)
    if (!tag.start) {
      throw new MalformedHeaderError('Invalid record start time', { file, offset: tagOffset })
    }
    if (tag.nChans !== nChans) {
      throw new MalformedHeaderError(`Record holds ${tag.nChans} channels, expected ${nChans}`, {
        file,
        offset: tagOffset,
      })
    }

    const scanBytes = nChans * SAMPLE_SIZE
    let nScans = tag.nScans
    if (stream.remaining < nScans * scanBytes) {
      const whole = Math.floor(stream.remaining / scanBytes)
      reportTruncation(warnings, options, whole, nScans, `Record has ${whole} of ${nScans} scans`, {
        file,
        offset: stream.offset + whole * scanBytes,
      })
      nScans = whole
    }
    if (nScans === 0) break

    const base = builder.beginRecord(tag.start, nScans)
    for (let s = 0; s < nScans; s++) {
      for (let c = 0; c < nChans; c++) raw[c] = stream.readInt24()
      for (let c = 0; c < channels.length; c++) {
        builder.put(c, base + s, raw[indices[c]])
      }
    }
    if (nScans < tag.nScans) break
  }

  return { segments: builder.build(), warnings, missingChannels: missing }
}

export const phoenixDecoder: FormatDecoder = {
  format: 'phoenix-ts',
  matchesName: (path, siblings) =>
    TS_EXTENSIONS.includes(extensionOf(path)) && siblings.some(name => extensionOf(name) === '.TBL'),
  sidecarPath: (path, siblings) => findSingle(path, siblings, '.TBL'),
  decodeHeader,
  decodePayload,
}
