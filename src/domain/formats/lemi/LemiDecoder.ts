/**
 * Lemi B423 (Hx Hy Hz Ex Ey) and B423E (E1..E4) decoders.
 *
 * After the ASCII header come fixed-size little-endian records:
 *   u32 second, u16 sample counter, n × i32 channel counts, i16 PPS, i16 PLL
 *
 * The files do not state their sample rate. It comes from the caller or is
 * read off the sample counter, which restarts at 0 every second.
 *
 * Scaling constants in the header take counts to µV (electric) and mV with
 * the internal gain still applied (magnetic). Decoding also removes the gain
 * and divides electric channels by the dipole length, so samples come out in
 * mV/km and mV.
 */
import { ByteStream } from '../../io/ByteStream.ts'
import { MalformedHeaderError } from '../../errors.ts'
import { Rational } from '../../time/Rational.ts'
import { instantFromUnix } from '../../time/instant.ts'
import type { ChannelSpec, Header, InstrumentFormat, SensorType } from '../../types/TimeSeries.ts'
import { mapChannelName, numberProperty, validateHeader } from '../headerValidation.ts'
import { checkAborted, reportTruncation, selectChannels } from '../payloadSupport.ts'
import { SegmentBuilder } from '../SegmentBuilder.ts'
import type { DecodeOptions, DecodeWarning, FormatDecoder, PayloadResult, SourceFile } from '../types.ts'
import { extensionOf } from '../paths.ts'
import { LEMI_HEADER_LENGTH, lemiVariant, parseLemiAsciiHeader } from './lemiHeader.ts'

interface LemiLayout {
  format: Extract<InstrumentFormat, 'lemi-b423' | 'lemi-b423e'>
  channels: readonly string[]
  multipliers: readonly string[]
  additions: readonly string[]
  recordBytes: number
}

export const B423_LAYOUT: LemiLayout = {
  format: 'lemi-b423',
  channels: ['Hx', 'Hy', 'Hz', 'Ex', 'Ey'],
  multipliers: ['Kmx', 'Kmy', 'Kmz', 'Ke1', 'Ke2'],
  additions: ['Ax', 'Ay', 'Az', 'Ae1', 'Ae2'],
  recordBytes: 30,
}

export const B423E_LAYOUT: LemiLayout = {
  format: 'lemi-b423e',
  channels: ['E1', 'E2', 'E3', 'E4'],
  multipliers: ['Ke1', 'Ke2', 'Ke3', 'Ke4'],
  additions: ['Ae1', 'Ae2', 'Ae3', 'Ae4'],
  recordBytes: 26,
}

function sensorTypeOf(channel: string): SensorType {
  return channel.startsWith('H') ? 'magnetic' : 'electric'
}

interface RecordStamp {
  second: number
  counter: number
}

function readStamp(bytes: Uint8Array, layout: LemiLayout, index: number): RecordStamp {
  const stream = new ByteStream(bytes, LEMI_HEADER_LENGTH + index * layout.recordBytes)
  return { second: stream.readUint32(), counter: stream.readUint16() }
}

/**
 * Rate from the first place the counter restarts at 0 as the second ticks
 * over; null when the file never crosses a second boundary.
 */
export function inferLemiSampleRate(bytes: Uint8Array, layout: LemiLayout): Rational | null {
  const nRecords = Math.floor((bytes.length - LEMI_HEADER_LENGTH) / layout.recordBytes)
  let previous: RecordStamp | undefined
  for (let i = 0; i < nRecords; i++) {
    const stamp = readStamp(bytes, layout, i)
    if (previous && stamp.second === previous.second + 1 && stamp.counter === 0) {
      return Rational.of(previous.counter + 1)
    }
    previous = stamp
  }
  return null
}

function createLemiDecoder(layout: LemiLayout): FormatDecoder {
  const nChans = layout.channels.length

  function decodeHeader(source: SourceFile, options?: DecodeOptions): Header {
    const file = source.path
    if (source.bytes.length < LEMI_HEADER_LENGTH + layout.recordBytes) {
      throw new MalformedHeaderError(
        `File is ${source.bytes.length} bytes, too short for the header and one record`,
        { file, offset: 0 },
      )
    }
    const ascii = parseLemiAsciiHeader(source.bytes.subarray(0, LEMI_HEADER_LENGTH))

    const missing = [...layout.multipliers, ...layout.additions].filter(k => !(k in ascii.constants))
    if (missing.length > 0) {
      throw new MalformedHeaderError(`Missing scaling constants ${missing.join(', ')}`, { file, offset: 0 })
    }

    const sampleRate = options?.sampleRate ?? inferLemiSampleRate(source.bytes, layout)
    if (!sampleRate) {
      throw new MalformedHeaderError(
        'Sample rate not given and the sample counter never wraps',
        { file, offset: LEMI_HEADER_LENGTH },
      )
    }
    if (!sampleRate.isPositive()) {
      throw new MalformedHeaderError(`Sample rate must be positive, got ${sampleRate}`, { file })
    }

    const first = readStamp(source.bytes, layout, 0)
    const gain = options?.magneticGain ?? 1
    const properties: Record<string, string | number> = {
      headerLength: LEMI_HEADER_LENGTH,
      recordBytes: layout.recordBytes,
      magneticGain: gain,
      ...ascii.constants,
      ...ascii.text,
    }
    for (const [key, value] of Object.entries(ascii.location)) {
      properties[key] = value
    }

    const channels: ChannelSpec[] = layout.channels.map((chan, i) => {
      const name = mapChannelName(chan, options)
      const k = ascii.constants[layout.multipliers[i]]
      const a = ascii.constants[layout.additions[i]]
      const sensorType = sensorTypeOf(chan)
      if (sensorType === 'magnetic') {
        return { name, unit: 'mV', scaling: k / gain, offset: a / gain, sensorType }
      }
      const dipole = name === 'Ex' || name === 'Ey' ? options?.dipoleLengths?.[name] ?? 1 : 1
      properties[`dipole_${name}`] = dipole
      return { name, unit: 'mV/km', scaling: k / dipole, offset: a / dipole, sensorType }
    })

    return validateHeader({
      format: layout.format,
      source: file,
      startTime: instantFromUnix(first.second, Rational.of(first.counter).div(sampleRate)),
      sampleRate,
      channels,
      nSamples: Math.floor((source.bytes.length - LEMI_HEADER_LENGTH) / layout.recordBytes),
      properties,
    })
  }

  function decodePayload(source: SourceFile, header: Header, options?: DecodeOptions): PayloadResult {
    const file = source.path
    const headerLength = numberProperty(header, 'headerLength')
    const recordBytes = numberProperty(header, 'recordBytes')
    const payloadBytes = source.bytes.length - headerLength
    const nRecords = Math.floor(payloadBytes / recordBytes)
    const warnings: DecodeWarning[] = []
    if (payloadBytes % recordBytes !== 0) {
      reportTruncation(
        warnings,
        options,
        nRecords,
        undefined,
        `Payload of ${payloadBytes} bytes is not a whole number of ${recordBytes}-byte records`,
        { file, offset: headerLength + nRecords * recordBytes },
      )
    }

    const { channels, indices, missing } = selectChannels(header, options)
    if (channels.length === 0) {
      return { segments: [], warnings, missingChannels: missing }
    }

    const rate = header.sampleRate
    const integerRate = rate.isInteger() ? Number(rate.num) : undefined
    const builder = new SegmentBuilder(channels, rate, file, nRecords)
    const stream = new ByteStream(source.bytes, headerLength)
    const raw = new Array<number>(nChans)
    let expected: RecordStamp | undefined

    for (let r = 0; r < nRecords; r++) {
      if ((r & 0xFFFF) === 0) checkAborted(options, file)
      const second = stream.readUint32()
      const counter = stream.readUint16()
      for (let c = 0; c < nChans; c++) raw[c] = stream.readInt32()
      stream.skip(4) // PPS deviation, PLL accuracy

      let index: number
      if (expected && integerRate !== undefined && second === expected.second && counter === expected.counter) {
        index = builder.extend(1)
      } else {
        index = builder.beginRecord(instantFromUnix(second, Rational.of(counter).div(rate)), 1)
      }
      for (let c = 0; c < channels.length; c++) {
        builder.put(c, index, raw[indices[c]])
      }

      if (integerRate !== undefined) {
        expected = counter + 1 >= integerRate
          ? { second: second + 1, counter: 0 }
          : { second, counter: counter + 1 }
      }
    }
    checkAborted(options, file)

    return { segments: builder.build(), warnings, missingChannels: missing }
  }

  return {
    format: layout.format,
    matchesName: path => extensionOf(path) === '.B423',
    sniff: head => lemiVariant(head) === layout.format,
    decodeHeader,
    decodePayload,
  }
}

export const lemiB423Decoder = createLemiDecoder(B423_LAYOUT)
export const lemiB423eDecoder = createLemiDecoder(B423E_LAYOUT)
