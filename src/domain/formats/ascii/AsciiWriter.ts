import { InvalidInputError } from '../../errors.ts'
import type { Rational } from '../../time/Rational.ts'
import { formatInstant, type Instant } from '../../time/instant.ts'
import type { SensorType } from '../../types/TimeSeries.ts'
import type { AsciiDelimiter } from './AsciiDecoder.ts'

export interface AsciiChannelInput {
  name: string
  values: ArrayLike<number>
  unit?: string
  scaling?: number
  sensorType?: SensorType
}

export interface AsciiFileInput {
  startTime: Instant
  sampleRate: Rational
  channels: readonly AsciiChannelInput[]
  /** Defaults to ',' */
  delimiter?: AsciiDelimiter
  /** Write the column-name row; defaults to true */
  columnRow?: boolean
  /** Extra `# key: value` lines */
  extra?: Readonly<Record<string, string | number>>
}

export function encodeAsciiFile(input: AsciiFileInput): Uint8Array {
  const { channels } = input
  if (channels.length === 0) {
    throw new InvalidInputError('No channels to write')
  }
  const n = channels[0].values.length
  if (channels.some(c => c.values.length !== n)) {
    throw new InvalidInputError('Channels differ in length')
  }

  const delimiter = input.delimiter ?? ','
  const lines = [
    `# start_time: ${formatInstant(input.startTime)}`,
    `# sample_rate: ${input.sampleRate}`,
    `# channels: ${channels.map(c => c.name).join(', ')}`,
  ]
  if (channels.some(c => c.unit !== undefined)) {
    lines.push(`# units: ${channels.map(c => c.unit ?? '-').join(', ')}`)
  }
  if (channels.some(c => c.scaling !== undefined)) {
    lines.push(`# scalings: ${channels.map(c => c.scaling ?? 1).join(', ')}`)
  }
  if (channels.some(c => c.sensorType !== undefined)) {
    lines.push(`# sensor_types: ${channels.map(c => c.sensorType ?? 'other').join(', ')}`)
  }
  for (const [key, value] of Object.entries(input.extra ?? {})) {
    lines.push(`# ${key}: ${value}`)
  }
  if (input.columnRow ?? true) {
    lines.push(channels.map(c => c.name).join(delimiter))
  }
  for (let i = 0; i < n; i++) {
    lines.push(channels.map(c => String(c.values[i])).join(delimiter))
  }

  return new TextEncoder().encode(lines.join('\n') + '\n')
}
