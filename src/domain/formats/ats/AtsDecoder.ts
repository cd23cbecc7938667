/**
 * Metronix ADU .ats files: one channel per file, a 1024-byte little-endian
 * binary header followed by int32 counts.
 *
 * Counts times the header's LSB give mV. Electric channels are further
 * divided by the dipole length in km to give mV/km.
 */
import { ByteStream } from '../../io/ByteStream.ts'
import { MalformedHeaderError } from '../../errors.ts'
import { Rational } from '../../time/Rational.ts'
import { instantFromUnix } from '../../time/instant.ts'
import type { ChannelSpec, Header, SensorType } from '../../types/TimeSeries.ts'
import { isSelected, mapChannelName, numberProperty, validateHeader } from '../headerValidation.ts'
import { checkAborted, reportTruncation } from '../payloadSupport.ts'
import { SegmentBuilder } from '../SegmentBuilder.ts'
import type { DecodeOptions, DecodeWarning, FormatDecoder, PayloadResult, SourceFile } from '../types.ts'
import { extensionOf } from '../paths.ts'

export const ATS_HEADER_LENGTH = 1024
export const ATS_VERSIONS: readonly number[] = [73, 75, 79, 80, 1080]

/** Fixed field offsets inside the binary header */
export const AtsOffset = {
  headerLength: 0,
  version: 2,
  nSamples: 4,
  sampleRate: 8,
  startTime: 12,
  lsb: 16,
  gmtOffset: 24,
  origSampleRate: 28,
  aduSerial: 32,
  adcSerial: 34,
  channelNumber: 36,
  chopper: 37,
  channelType: 38,
  sensorType: 40,
  sensorSerial: 46,
  x1: 48,
  y1: 52,
  z1: 56,
  x2: 60,
  y2: 64,
  z2: 68,
  dipoleLength: 72,
  angle: 76,
} as const

export function atsSensorType(channelType: string): SensorType {
  if (/^E[xyz]$/i.test(channelType)) return 'electric'
  if (/^H[xyz]$/i.test(channelType)) return 'magnetic'
  return 'other'
}

function looksLikeAts(head: Uint8Array): boolean {
  if (head.length < 80) return false
  const stream = new ByteStream(head)
  if (stream.readUint16() !== ATS_HEADER_LENGTH) return false
  if (!ATS_VERSIONS.includes(stream.readInt16())) return false
  stream.skip(4)
  const rate = stream.readFloat32()
  return Number.isFinite(rate) && rate > 0
}

/** Electrode spacing in metres from the electrode positions, falling back to the stored length */
function dipoleLength(channelType: string, pos: Record<'x1' | 'y1' | 'z1' | 'x2' | 'y2' | 'z2' | 'stored', number>): number {
  const axis = channelType.slice(1).toLowerCase()
  let d = 0
  if (axis === 'x') d = Math.abs(pos.x1) + Math.abs(pos.x2)
  if (axis === 'y') d = Math.abs(pos.y1) + Math.abs(pos.y2)
  if (axis === 'z') d = Math.abs(pos.z1) + Math.abs(pos.z2)
  return d > 0 ? d : pos.stored
}

function decodeHeader(source: SourceFile, options?: DecodeOptions): Header {
  const file = source.path
  if (source.bytes.length < ATS_HEADER_LENGTH) {
    throw new MalformedHeaderError(
      `File is ${source.bytes.length} bytes, shorter than the ${ATS_HEADER_LENGTH}-byte header`,
      { file, offset: 0 },
    )
  }

  const stream = new ByteStream(source.bytes)
  const headerLength = stream.readUint16()
  const version = stream.readInt16()
  if (headerLength < ATS_HEADER_LENGTH || headerLength > source.bytes.length) {
    throw new MalformedHeaderError(`Invalid header length ${headerLength}`, { file, offset: AtsOffset.headerLength })
  }
  const nSamples = stream.readUint32()
  const rawRate = stream.readFloat32()
  if (!Number.isFinite(rawRate) || rawRate <= 0) {
    throw new MalformedHeaderError(`Invalid sample rate ${rawRate}`, { file, offset: AtsOffset.sampleRate })
  }
  const startSeconds = stream.readInt32()
  const lsb = stream.readFloat64()
  if (!Number.isFinite(lsb) || lsb === 0) {
    throw new MalformedHeaderError(`Invalid LSB ${lsb}`, { file, offset: AtsOffset.lsb })
  }
  const gmtOffset = stream.readInt32()
  const origSampleRate = stream.readFloat32()
  const aduSerial = stream.readUint16()
  const adcSerial = stream.readUint16()
  const channelNumber = stream.readUint8()
  const chopper = stream.readUint8()
  const channelType = stream.readAscii(2)
  const sensor = stream.readAscii(6)
  const sensorSerial = stream.readInt16()
  const pos = {
    x1: stream.readFloat32(),
    y1: stream.readFloat32(),
    z1: stream.readFloat32(),
    x2: stream.readFloat32(),
    y2: stream.readFloat32(),
    z2: stream.readFloat32(),
    stored: 0,
  }
  pos.stored = stream.readFloat32()
  const angle = stream.readFloat32()

  if (channelType === '') {
    throw new MalformedHeaderError('Missing channel type', { file, offset: AtsOffset.channelType })
  }

  const name = mapChannelName(channelType, options)
  const sensorType = atsSensorType(channelType)
  let scaling = lsb
  let unit = 'mV'
  let dipole = 0
  if (sensorType === 'electric') {
    const key = channelType.charAt(1).toLowerCase() === 'y' ? 'Ey' : 'Ex'
    dipole = dipoleLength(channelType, pos)
    if (dipole <= 0) dipole = options?.dipoleLengths?.[key] ?? 0
    if (dipole <= 0) {
      throw new MalformedHeaderError(`No dipole length for ${channelType}`, { file, offset: AtsOffset.x1 })
    }
    scaling = (lsb * 1000) / dipole
    unit = 'mV/km'
  }

  const channel: ChannelSpec = { name, unit, scaling, offset: 0, sensorType }

  return validateHeader({
    format: 'ats',
    source: file,
    startTime: instantFromUnix(startSeconds),
    sampleRate: Rational.fromFloat32(rawRate),
    channels: [channel],
    nSamples,
    properties: {
      headerLength,
      version,
      lsb,
      gmtOffset,
      origSampleRate,
      aduSerial,
      adcSerial,
      channelNumber,
      chopper,
      channelType,
      sensor,
      sensorSerial,
      dipoleLength: dipole,
      angle,
    },
  })
}

function decodePayload(source: SourceFile, header: Header, options?: DecodeOptions): PayloadResult {
  const file = source.path
  const channel = header.channels[0]
  if (!isSelected(channel.name, options)) {
    return { segments: [], warnings: [], missingChannels: [channel.name] }
  }
  checkAborted(options, file)

  const headerLength = numberProperty(header, 'headerLength')
  const payloadBytes = source.bytes.length - headerLength
  const whole = Math.floor(payloadBytes / 4)
  const declared = header.nSamples ?? 0
  const expected = declared > 0 ? declared : whole
  const warnings: DecodeWarning[] = []

  let count = expected
  if (payloadBytes % 4 !== 0 || whole < expected) {
    count = Math.min(whole, expected)
    reportTruncation(
      warnings,
      options,
      count,
      expected,
      `Payload of ${payloadBytes} bytes does not hold ${expected} int32 samples`,
      { file, channel: channel.name, offset: headerLength + count * 4 },
    )
  }

  const builder = new SegmentBuilder([channel], header.sampleRate, file, count)
  const stream = new ByteStream(source.bytes, headerLength)
  const base = builder.beginRecord(header.startTime, count)
  for (let i = 0; i < count; i++) {
    builder.put(0, base + i, stream.readInt32())
  }
  checkAborted(options, file)

  return { segments: builder.build(), warnings, missingChannels: [] }
}

export const atsDecoder: FormatDecoder = {
  format: 'ats',
  matchesName: path => extensionOf(path) === '.ATS',
  sniff: looksLikeAts,
  decodeHeader,
  decodePayload,
}
