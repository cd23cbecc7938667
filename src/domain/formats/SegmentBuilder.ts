import type { Rational } from '../time/Rational.ts'
import type { Instant } from '../time/instant.ts'
import type { ChannelSpec, Segment } from '../types/TimeSeries.ts'
import { createSegment } from '../types/segment.ts'

interface Run {
  start: Instant
  from: number
  to: number
}

/**
 * Collects scaled samples for a fixed channel set into pre-sized buffers and
 * cuts them into one Segment per channel per contiguous run.
 *
 * Records that carry their own timestamp go through `beginRecord`; a record
 * starting anywhere other than the exact continuation of the current run
 * opens a new run.
 */
export class SegmentBuilder {
  private readonly channels: readonly ChannelSpec[]
  private readonly sampleRate: Rational
  private readonly source: string
  private readonly buffers: Float64Array[]
  private readonly scalings: number[]
  private readonly offsets: number[]
  private runs: Run[] = []
  private _length = 0

  constructor(channels: readonly ChannelSpec[], sampleRate: Rational, source: string, capacity: number) {
    this.channels = channels
    this.sampleRate = sampleRate
    this.source = source
    this.buffers = channels.map(() => new Float64Array(capacity))
    this.scalings = channels.map(c => c.scaling)
    this.offsets = channels.map(c => c.offset)
  }

  /**
   * Reserve `count` samples starting at `start`; returns the buffer index of
   * the first one.
   */
  beginRecord(start: Instant, count: number): number {
    const base = this._length
    const current = this.runs.length > 0 ? this.runs[this.runs.length - 1] : undefined
    const continuation = current
      ? current.start.add(this.sampleRate.inverse().mul(current.to - current.from))
      : undefined

    if (current && continuation && continuation.eq(start)) {
      current.to += count
    } else {
      this.runs.push({ start, from: base, to: base + count })
    }
    this._length += count
    return base
  }

  /** Grow the current run by `count` samples without a timing check */
  extend(count: number): number {
    const current = this.runs.length > 0 ? this.runs[this.runs.length - 1] : undefined
    if (!current) {
      throw new Error('SegmentBuilder: extend() before beginRecord()')
    }
    const base = this._length
    current.to += count
    this._length += count
    return base
  }

  /** Store raw value for channel `c` at buffer index `i`, scaled */
  put(c: number, i: number, raw: number): void {
    const offset = this.offsets[c]
    const scaled = raw * this.scalings[c]
    this.buffers[c][i] = offset === 0 ? scaled : scaled + offset
  }

  build(): Segment[] {
    const segments: Segment[] = []
    for (const run of this.runs) {
      if (run.to <= run.from) continue
      for (let c = 0; c < this.channels.length; c++) {
        segments.push(
          createSegment(
            this.channels[c].name,
            run.start,
            this.sampleRate,
            this.buffers[c].slice(run.from, run.to),
            [this.source],
          ),
        )
      }
    }
    return segments
  }
}
