/**
 * Delimited text exports.
 *
 *   # start_time: 2024-03-01T00:00:00Z
 *   # sample_rate: 128
 *   # channels: Ex, Ey, Hx
 *   # units: mV/km, mV/km, mV
 *   Ex,Ey,Hx
 *   0.12,-0.40,11.5
 *
 * Header lines come first. The column row is optional and must repeat the
 * channel names. Rows are split on commas, tabs or runs of whitespace,
 * whichever the first data row uses.
 */
import { decodeBytes } from '../../io/ByteStream.ts'
import { MalformedHeaderError } from '../../errors.ts'
import { Rational } from '../../time/Rational.ts'
import { parseInstant } from '../../time/instant.ts'
import type { ChannelSpec, Header, SensorType } from '../../types/TimeSeries.ts'
import { mapChannelName, numberProperty, validateHeader } from '../headerValidation.ts'
import { checkAborted, reportTruncation, selectChannels } from '../payloadSupport.ts'
import { SegmentBuilder } from '../SegmentBuilder.ts'
import type { DecodeOptions, DecodeWarning, FormatDecoder, PayloadResult, SourceFile } from '../types.ts'

const HEADER_LINE = /^#\s*([A-Za-z_][\w.-]*)\s*:\s*(.*)$/
const SENSOR_TYPES: readonly SensorType[] = ['electric', 'magnetic', 'other']

export type AsciiDelimiter = ',' | '\t' | ' '

function isSensorType(value: string): value is SensorType {
  return SENSOR_TYPES.some(t => t === value)
}

export function guessSensorType(channel: string): SensorType {
  if (/^E/i.test(channel)) return 'electric'
  if (/^[HB]/i.test(channel)) return 'magnetic'
  return 'other'
}

export function detectDelimiter(row: string): AsciiDelimiter {
  if (row.includes(',')) return ','
  if (row.includes('\t')) return '\t'
  return ' '
}

export function splitRow(row: string, delimiter: AsciiDelimiter): string[] {
  const trimmed = row.trim()
  if (delimiter === ' ') return trimmed.split(/\s+/)
  return trimmed.split(delimiter).map(field => field.trim())
}

function listValue(value: string): string[] {
  return value.split(',').map(v => v.trim()).filter(v => v !== '')
}

interface AsciiLayout {
  fields: Map<string, string>
  /** Index of the first line after the header and column row */
  dataLine: number
  columns?: string[]
}

function readLayout(bytes: Uint8Array, file: string): AsciiLayout {
  const lines = decodeBytes(bytes).split(/\r?\n/)
  const fields = new Map<string, string>()
  let i = 0
  for (; i < lines.length; i++) {
    const line = lines[i].trim()
    if (line === '') continue
    if (!line.startsWith('#')) break
    const m = line.match(HEADER_LINE)
    if (m) fields.set(m[1].toLowerCase(), m[2].trim())
  }

  let columns: string[] | undefined
  if (i < lines.length) {
    const first = lines[i].trim()
    const cells = splitRow(first, detectDelimiter(first))
    if (cells.some(c => c !== '' && !Number.isFinite(Number(c)))) {
      columns = cells
      i++
    }
  }
  if (fields.size === 0) {
    throw new MalformedHeaderError('No "# key: value" header lines', { file, line: 1 })
  }
  return { fields, dataLine: i, columns }
}

function requireField(layout: AsciiLayout, key: string, file: string): string {
  const value = layout.fields.get(key)
  if (value === undefined || value === '') {
    throw new MalformedHeaderError(`Missing header field ${key}`, { file })
  }
  return value
}

function optionalList(layout: AsciiLayout, key: string, count: number, file: string): string[] | undefined {
  const value = layout.fields.get(key)
  if (value === undefined) return undefined
  const list = listValue(value)
  if (list.length !== count) {
    throw new MalformedHeaderError(`${key} lists ${list.length} values for ${count} channels`, { file })
  }
  return list
}

function decodeHeader(source: SourceFile, options?: DecodeOptions): Header {
  const file = source.path
  const layout = readLayout(source.bytes, file)

  const startText = requireField(layout, 'start_time', file)
  const startTime = parseInstant(startText)
  if (!startTime) {
    throw new MalformedHeaderError(`start_time "${startText}" is not an ISO-8601 time with a zone`, { file })
  }
  const rateText = requireField(layout, 'sample_rate', file)
  const sampleRate = Rational.parse(rateText)
  if (!sampleRate) {
    throw new MalformedHeaderError(`Invalid sample_rate "${rateText}"`, { file })
  }

  const names = listValue(requireField(layout, 'channels', file))
  const units = optionalList(layout, 'units', names.length, file)
  const scalings = optionalList(layout, 'scalings', names.length, file)
  const types = optionalList(layout, 'sensor_types', names.length, file)

  if (layout.columns && layout.columns.join('\u0000') !== names.join('\u0000')) {
    throw new MalformedHeaderError(
      `Column row "${layout.columns.join(' ')}" does not match channels "${names.join(' ')}"`,
      { file, line: layout.dataLine },
    )
  }

  const channels = names.map((chan, i): ChannelSpec => {
    const scaling = scalings ? Number(scalings[i]) : 1
    if (!Number.isFinite(scaling)) {
      throw new MalformedHeaderError(`Invalid scaling "${scalings?.[i] ?? ''}" for ${chan}`, { file })
    }
    const declared = types?.[i].toLowerCase()
    let sensorType = guessSensorType(chan)
    if (declared !== undefined) {
      if (!isSensorType(declared)) {
        throw new MalformedHeaderError(`Unknown sensor type "${declared}" for ${chan}`, { file })
      }
      sensorType = declared
    }
    return {
      name: mapChannelName(chan, options),
      unit: units?.[i] ?? '',
      scaling,
      offset: 0,
      sensorType,
    }
  })

  let nSamples: number | undefined
  const declaredSamples = layout.fields.get('n_samples')
  if (declaredSamples !== undefined) {
    nSamples = Number(declaredSamples)
  }

  const properties: Record<string, string | number> = { dataLine: layout.dataLine }
  for (const [key, value] of layout.fields) {
    if (!['start_time', 'sample_rate', 'channels', 'units', 'scalings', 'sensor_types', 'n_samples'].includes(key)) {
      properties[key] = value
    }
  }

  return validateHeader({
    format: 'ascii',
    source: file,
    startTime,
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

  const lines = decodeBytes(source.bytes).split(/\r?\n/)
  const first = numberProperty(header, 'dataLine')
  const rows: { text: string; line: number }[] = []
  for (let i = first; i < lines.length; i++) {
    const text = lines[i].trim()
    if (text !== '' && !text.startsWith('#')) rows.push({ text, line: i + 1 })
  }

  const width = header.channels.length
  const delimiter = rows.length > 0 ? detectDelimiter(rows[0].text) : ','
  let count = rows.length
  if (header.nSamples !== undefined && count > header.nSamples) count = header.nSamples

  const builder = new SegmentBuilder(channels, header.sampleRate, file, count)
  const base = builder.beginRecord(header.startTime, count)
  for (let s = 0; s < count; s++) {
    if ((s & 0x3FFF) === 0) checkAborted(options, file)
    const { text, line } = rows[s]
    const cells = splitRow(text, delimiter)
    if (cells.length !== width) {
      throw new MalformedHeaderError(`Row has ${cells.length} fields, expected ${width}`, { file, line })
    }
    for (let c = 0; c < channels.length; c++) {
      const cell = cells[indices[c]].trim()
      if (cell === '') {
        throw new MalformedHeaderError(`Empty field for ${header.channels[indices[c]].name}`, { file, line })
      }
      const value = Number(cell)
      if (!Number.isFinite(value)) {
        throw new MalformedHeaderError(`"${cell}" is not a number`, { file, line })
      }
      builder.put(c, base + s, value)
    }
  }
  checkAborted(options, file)

  if (header.nSamples !== undefined && count < header.nSamples) {
    reportTruncation(warnings, options, count, header.nSamples, `File holds ${count} of ${header.nSamples} rows`, {
      file,
    })
  }

  return { segments: builder.build(), warnings, missingChannels: missing }
}

function looksLikeAscii(head: Uint8Array): boolean {
  const text = decodeBytes(head, 0, Math.min(head.length, 2048))
  return text.startsWith('#') && /^#\s*sample_rate\s*:/m.test(text)
}

export const asciiDecoder: FormatDecoder = {
  format: 'ascii',
  sniff: looksLikeAscii,
  decodeHeader,
  decodePayload,
}
