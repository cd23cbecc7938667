import { InvalidInputError, OverlappingSegmentsError, RateChangeError } from '../errors.ts'
import { Rational } from '../time/Rational.ts'
import { formatInstant, type Instant } from '../time/instant.ts'
import type { Gap, Overlap, RateChange, Segment, Timeline } from '../types/TimeSeries.ts'
import { createSegment } from '../types/segment.ts'

export type OverlapPolicy = 'error' | 'truncate'
export type RateChangePolicy = 'record' | 'error'

export interface ReconcileOptions {
  /** Fraction of a sample period; default 0.5 */
  tolerance?: number
  overlapPolicy?: OverlapPolicy
  rateChangePolicy?: RateChangePolicy
}

interface Part {
  segment: Segment
  /** Leading samples kept; less than the segment's length after a trim */
  count: number
}

interface Run {
  start: Instant
  rate: Rational
  parts: Part[]
  length: number
}

function startRun(segment: Segment): Run {
  return {
    start: segment.startTime,
    rate: segment.sampleRate,
    parts: [{ segment, count: segment.samples.length }],
    length: segment.samples.length,
  }
}

function extend(run: Run, segment: Segment): void {
  run.parts.push({ segment, count: segment.samples.length })
  run.length += segment.samples.length
}

/** Keep the first `length` samples of the run */
function trim(run: Run, length: number): void {
  let excess = run.length - length
  for (let i = run.parts.length - 1; i >= 0 && excess > 0; i--) {
    const cut = Math.min(run.parts[i].count, excess)
    run.parts[i].count -= cut
    excess -= cut
  }
  run.parts = run.parts.filter(p => p.count > 0)
  run.length = length
}

function continuation(run: Run): Instant {
  return run.start.add(Rational.of(run.length).div(run.rate))
}

function sources(parts: readonly Part[]): string[] {
  const seen: string[] = []
  for (const part of parts) {
    for (const file of part.segment.sources) {
      if (!seen.includes(file)) seen.push(file)
    }
  }
  return seen
}

/** One Segment for the run; the original object when nothing was joined or cut */
function flush(run: Run): Segment | undefined {
  const [first] = run.parts
  if (!first) return undefined
  if (run.parts.length === 1 && first.count === first.segment.samples.length) return first.segment

  const samples = new Float64Array(run.length)
  let at = 0
  for (const { segment, count } of run.parts) {
    samples.set(count === segment.samples.length ? segment.samples : segment.samples.subarray(0, count), at)
    at += count
  }
  return createSegment(first.segment.channel, run.start, run.rate, samples, sources(run.parts))
}

function toleranceOf(options: ReconcileOptions): Rational {
  const tolerance = options.tolerance ?? 0.5
  if (!Number.isFinite(tolerance) || tolerance < 0 || tolerance >= 1) {
    throw new InvalidInputError(`Tolerance must be in [0, 1) sample periods, got ${tolerance}`)
  }
  return Rational.fromNumber(tolerance)
}

/**
 * Stitch the segments of one channel into a Timeline.
 *
 * Each segment is compared with the continuation instant of the run before
 * it. Within `tolerance` periods it joins the run on the run's own sample
 * grid; later leaves a Gap; earlier is an overlap, rejected unless the
 * `truncate` policy cuts the run's tail. A segment at another rate always
 * starts a new run.
 */
export function reconcile(segments: readonly Segment[], options: ReconcileOptions = {}): Timeline {
  if (segments.length === 0) {
    throw new InvalidInputError('No segments to reconcile')
  }
  const channel = segments[0].channel
  const other = segments.find(s => s.channel !== channel)
  if (other) {
    throw new InvalidInputError(`Cannot reconcile "${other.channel}" with "${channel}"`, { channel })
  }

  const tolerance = toleranceOf(options)
  const overlapPolicy = options.overlapPolicy ?? 'error'
  const rateChangePolicy = options.rateChangePolicy ?? 'record'

  const sorted = segments
    .filter(s => s.samples.length > 0)
    .sort((a, b) => a.startTime.compare(b.startTime))

  const merged: Segment[] = []
  const gaps: Gap[] = []
  const overlaps: Overlap[] = []
  const rateChanges: RateChange[] = []
  let run: Run | undefined

  const push = (r: Run) => {
    const segment = flush(r)
    if (segment) merged.push(segment)
  }

  for (const segment of sorted) {
    if (!run) {
      run = startRun(segment)
      continue
    }

    const end = continuation(run)
    const delta = segment.startTime.sub(end)
    const slack = tolerance.div(run.rate)
    const sameRate = segment.sampleRate.eq(run.rate)

    if (sameRate && delta.abs().lte(slack)) {
      extend(run, segment)
      continue
    }

    if (delta.neg().gt(slack)) {
      const overlap = delta.neg()
      if (overlapPolicy === 'error') {
        throw new OverlappingSegmentsError(
          overlap,
          `Segment starting ${formatInstant(segment.startTime)} reaches ${overlap.toNumber()} s back into the one ending ${formatInstant(end)}`,
          { channel, instant: segment.startTime, file: segment.sources[0] },
        )
      }
      const keep = Number(segment.startTime.sub(run.start).mul(run.rate).ceil())
      const kept = Math.max(0, Math.min(run.length, keep))
      overlaps.push({
        channel,
        start: segment.startTime,
        end,
        duration: overlap,
        trimmedSamples: run.length - kept,
      })
      trim(run, kept)
      if (sameRate && segment.startTime.sub(continuation(run)).abs().lte(slack)) {
        extend(run, segment)
        continue
      }
    } else if (delta.gt(slack)) {
      gaps.push({ channel, precedingEnd: end, followingStart: segment.startTime, duration: delta })
    }

    if (!sameRate) {
      if (rateChangePolicy === 'error') {
        throw new RateChangeError(run.rate, segment.sampleRate, {
          channel,
          instant: segment.startTime,
          file: segment.sources[0],
        })
      }
      rateChanges.push({ channel, at: segment.startTime, fromRate: run.rate, toRate: segment.sampleRate })
    }

    push(run)
    run = startRun(segment)
  }
  if (run) push(run)

  return Object.freeze({
    channel,
    segments: Object.freeze(merged),
    gaps: Object.freeze(gaps),
    overlaps: Object.freeze(overlaps),
    rateChanges: Object.freeze(rateChanges),
  })
}
