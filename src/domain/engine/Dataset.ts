import { OutOfRangeError, UnknownChannelError, type ReaderError } from '../errors.ts'
import type { Rational } from '../time/Rational.ts'
import { formatInstant, type Instant } from '../time/instant.ts'
import type { Segment, TimeRange, Timeline } from '../types/TimeSeries.ts'
import { sliceSegment } from '../types/segment.ts'

function sampleIndex(segment: Segment, at: Instant): number {
  return Number(at.sub(segment.startTime).mul(segment.sampleRate).ceil())
}

/**
 * Channel-aligned view over reconciled timelines. Immutable once built; a
 * Dataset whose channels never overlap has no valid range and refuses every
 * slice.
 */
export class Dataset {
  readonly channelNames: readonly string[]
  /** Null when no channel holds samples */
  readonly commonSampleRate: Rational | null
  readonly validTimeRange: TimeRange | null
  /** Non-fatal assembly findings, such as NoOverlap */
  readonly conditions: readonly ReaderError[]
  private readonly timelines: ReadonlyMap<string, Timeline>

  constructor(
    timelines: readonly Timeline[],
    commonSampleRate: Rational | null,
    validTimeRange: TimeRange | null,
    conditions: readonly ReaderError[] = [],
  ) {
    this.timelines = new Map(timelines.map(t => [t.channel, t]))
    this.channelNames = Object.freeze(timelines.map(t => t.channel))
    this.commonSampleRate = commonSampleRate
    this.validTimeRange = validTimeRange ? Object.freeze({ ...validTimeRange }) : null
    this.conditions = Object.freeze([...conditions])
    Object.freeze(this)
  }

  get isEmpty(): boolean {
    return this.validTimeRange === null
  }

  hasChannel(name: string): boolean {
    return this.timelines.has(name)
  }

  timeline(name: string): Timeline {
    const timeline = this.timelines.get(name)
    if (!timeline) throw new UnknownChannelError(name)
    return timeline
  }

  /**
   * Samples of one channel whose instants fall in [from, to). A gap inside
   * the range yields more than one segment.
   */
  slice(name: string, from: Instant, to: Instant): Segment[] {
    const timeline = this.timeline(name)
    this.checkRange(from, to, name)

    const out: Segment[] = []
    for (const segment of timeline.segments) {
      const lo = Math.max(0, sampleIndex(segment, from))
      const hi = Math.min(segment.samples.length, sampleIndex(segment, to))
      if (hi > lo) out.push(sliceSegment(segment, lo, hi))
    }
    return out
  }

  sliceAll(from: Instant, to: Instant): Map<string, Segment[]> {
    this.checkRange(from, to)
    return new Map(this.channelNames.map(name => [name, this.slice(name, from, to)]))
  }

  private checkRange(from: Instant, to: Instant, channel?: string): void {
    const range = this.validTimeRange
    if (!range) {
      throw new OutOfRangeError('Dataset has no valid time range', { channel, instant: from })
    }
    if (to.lt(from)) {
      throw new OutOfRangeError(`Range end ${formatInstant(to)} precedes its start ${formatInstant(from)}`, {
        channel,
        instant: to,
      })
    }
    if (from.lt(range.start) || to.gt(range.end)) {
      throw new OutOfRangeError(
        `[${formatInstant(from)}, ${formatInstant(to)}) is outside [${formatInstant(range.start)}, ${formatInstant(range.end)})`,
        { channel, instant: from.lt(range.start) ? from : to },
      )
    }
  }
}
