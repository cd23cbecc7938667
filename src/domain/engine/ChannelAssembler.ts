import {
  DuplicateChannelError,
  IncompatibleRatesError,
  InvalidInputError,
  NoOverlapError,
} from '../errors.ts'
import { Rational } from '../time/Rational.ts'
import { formatInstant, type Instant } from '../time/instant.ts'
import type { Segment, TimeRange, Timeline } from '../types/TimeSeries.ts'
import { segmentEnd } from '../types/segment.ts'
import { reconcile, type ReconcileOptions } from './ContinuityReconciler.ts'
import { Dataset } from './Dataset.ts'

export type NoOverlapPolicy = 'empty' | 'error'

export interface AssembleOptions {
  noOverlapPolicy?: NoOverlapPolicy
}

/** Rates present in a timeline, first occurrence order */
function ratesOf(timeline: Timeline): Rational[] {
  const rates: Rational[] = []
  for (const segment of timeline.segments) {
    if (!rates.some(r => r.eq(segment.sampleRate))) rates.push(segment.sampleRate)
  }
  return rates
}

function extent(timeline: Timeline): TimeRange | null {
  const first = timeline.segments[0]
  const last = timeline.segments[timeline.segments.length - 1]
  if (!first || !last) return null
  return { start: first.startTime, end: segmentEnd(last) }
}

/** True when the larger rate is a whole multiple of the smaller */
export function ratesCompatible(a: Rational, b: Rational): boolean {
  const [lo, hi] = a.lte(b) ? [a, b] : [b, a]
  return hi.div(lo).isInteger()
}

/** Lowest rate across the timelines, or null when none holds samples */
function checkRates(timelines: readonly Timeline[]): Rational | null {
  const byChannel = new Map<string, Rational>()
  const distinct: Rational[] = []
  for (const timeline of timelines) {
    for (const rate of ratesOf(timeline)) {
      if (!byChannel.has(timeline.channel)) byChannel.set(timeline.channel, rate)
      if (!distinct.some(r => r.eq(rate))) distinct.push(rate)
    }
  }
  if (distinct.length === 0) return null

  for (let i = 0; i < distinct.length; i++) {
    for (let j = i + 1; j < distinct.length; j++) {
      if (!ratesCompatible(distinct[i], distinct[j])) {
        throw new IncompatibleRatesError(
          byChannel,
          `${distinct[i].toString()} Hz and ${distinct[j].toString()} Hz are not integer multiples of one another`,
        )
      }
    }
  }
  return distinct.reduce((lo, r) => Rational.min(lo, r))
}

/**
 * Combine per-channel timelines into one Dataset. All rates must be integer
 * multiples of each other; the common rate is the lowest. The valid range is
 * the span every channel covers, from the latest first sample to the
 * earliest exclusive end. A channel without samples leaves no common span.
 */
export function assemble(
  timelines: readonly Timeline[] | ReadonlyMap<string, Timeline>,
  options: AssembleOptions = {},
): Dataset {
  const list = [...timelines.values()]
  if (list.length === 0) {
    throw new InvalidInputError('No timelines to assemble')
  }

  const seen = new Set<string>()
  for (const timeline of list) {
    if (seen.has(timeline.channel)) throw new DuplicateChannelError(timeline.channel)
    seen.add(timeline.channel)
  }

  const commonSampleRate = checkRates(list)

  let start: Instant | undefined
  let end: Instant | undefined
  let missing: string | undefined
  for (const timeline of list) {
    const span = extent(timeline)
    if (!span) {
      missing ??= timeline.channel
      continue
    }
    start = start ? Rational.max(start, span.start) : span.start
    end = end ? Rational.min(end, span.end) : span.end
  }

  if (missing === undefined && commonSampleRate && start && end && start.lt(end)) {
    return new Dataset(list, commonSampleRate, { start, end })
  }

  const condition = new NoOverlapError(
    missing !== undefined
      ? `Channel "${missing}" holds no samples`
      : `Channels share no common span (latest start ${start ? formatInstant(start) : '?'}, earliest end ${end ? formatInstant(end) : '?'})`,
  )
  if (options.noOverlapPolicy === 'error') throw condition
  return new Dataset(list, commonSampleRate, null, [condition])
}

export interface BuildOptions extends ReconcileOptions, AssembleOptions {}

/** Group decoded segments by channel, reconcile each channel and assemble */
export function assembleSegments(segments: readonly Segment[], options: BuildOptions = {}): Dataset {
  const byChannel = new Map<string, Segment[]>()
  for (const segment of segments) {
    const list = byChannel.get(segment.channel)
    if (list) list.push(segment)
    else byChannel.set(segment.channel, [segment])
  }
  const timelines = [...byChannel.values()].map(list => reconcile(list, options))
  return assemble(timelines, options)
}
