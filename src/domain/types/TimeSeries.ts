import type { Rational } from '../time/Rational.ts'
import type { Instant } from '../time/instant.ts'

/** Closed set of supported recorder formats */
export type InstrumentFormat =
  | 'ats'
  | 'lemi-b423'
  | 'lemi-b423e'
  | 'phoenix-ts'
  | 'spam'
  | 'miniseed'
  | 'ascii'

export const INSTRUMENT_FORMATS: readonly InstrumentFormat[] = [
  'ats',
  'lemi-b423',
  'lemi-b423e',
  'phoenix-ts',
  'spam',
  'miniseed',
  'ascii',
]

export type SensorType = 'electric' | 'magnetic' | 'other'

export interface ChannelSpec {
  /** Unique within a Header */
  name: string
  /** Physical unit after scaling, e.g. "mV/km" */
  unit: string
  /** Multiplier applied to the raw value */
  scaling: number
  /** Added after scaling; 0 unless the instrument declares a constant */
  offset: number
  sensorType: SensorType
}

/**
 * Metadata extracted from a recording's header
 */
export interface Header {
  format: InstrumentFormat
  /** Path of the file the header was read from */
  source: string
  startTime: Instant
  /** Samples per second, exact */
  sampleRate: Rational
  channels: ChannelSpec[]
  /** Samples per channel when the header declares it */
  nSamples?: number
  /** Instrument specific extras (serials, site location, record layout) */
  properties: Record<string, string | number>
}

/**
 * A contiguous, uniformly sampled run of physical values for one channel.
 * Sample i lies at startTime + i / sampleRate.
 */
export interface Segment {
  channel: string
  startTime: Instant
  sampleRate: Rational
  samples: Float64Array
  /** Files that contributed samples, in time order */
  sources: readonly string[]
}

export interface Gap {
  channel: string
  /** Continuation instant of the preceding segment (one period past its last sample) */
  precedingEnd: Instant
  followingStart: Instant
  /** Always > 0, seconds */
  duration: Rational
}

/** Overlap resolved by trimming the preceding segment's tail */
export interface Overlap {
  channel: string
  start: Instant
  end: Instant
  duration: Rational
  trimmedSamples: number
}

export interface RateChange {
  channel: string
  /** Start of the first segment at the new rate */
  at: Instant
  fromRate: Rational
  toRate: Rational
}

/**
 * Ordered, gap-annotated segments of one channel
 */
export interface Timeline {
  channel: string
  segments: readonly Segment[]
  gaps: readonly Gap[]
  overlaps: readonly Overlap[]
  rateChanges: readonly RateChange[]
}

export interface TimeRange {
  start: Instant
  /** Exclusive */
  end: Instant
}
