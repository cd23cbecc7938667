import { Rational } from '../time/Rational.ts'
import type { Instant } from '../time/instant.ts'
import type { Segment } from './TimeSeries.ts'

export function createSegment(
  channel: string,
  startTime: Instant,
  sampleRate: Rational,
  samples: Float64Array,
  sources: readonly string[] = [],
): Segment {
  return Object.freeze({ channel, startTime, sampleRate, samples, sources: Object.freeze([...sources]) })
}

/** Instant of sample i */
export function sampleTime(segment: Segment, index: number): Instant {
  return segment.startTime.add(Rational.of(BigInt(index)).div(segment.sampleRate))
}

/** Exclusive end: the instant one period past the last sample */
export function segmentEnd(segment: Segment): Instant {
  return sampleTime(segment, segment.samples.length)
}

/** New segment holding a copy of samples [from, to) */
export function sliceSegment(segment: Segment, from: number, to: number): Segment {
  const start = Math.max(0, from)
  const end = Math.min(segment.samples.length, to)
  return createSegment(
    segment.channel,
    sampleTime(segment, start),
    segment.sampleRate,
    segment.samples.slice(start, Math.max(start, end)),
    segment.sources,
  )
}
