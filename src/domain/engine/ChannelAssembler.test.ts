import { describe, it, expect } from 'vitest'
import {
  DuplicateChannelError,
  IncompatibleRatesError,
  NoOverlapError,
  OutOfRangeError,
  UnknownChannelError,
} from '../errors'
import { makeSegment, q } from '../test-helpers'
import { assemble, assembleSegments, ratesCompatible } from './ChannelAssembler'
import { reconcile } from './ContinuityReconciler'

function timeline(channel: string, start: number, rate: number, count: number) {
  return reconcile([makeSegment(channel, start, rate, count)])
}

describe('ratesCompatible', () => {
  it('accepts whole multiples only', () => {
    expect(ratesCompatible(q(10), q(5))).toBe(true)
    expect(ratesCompatible(q(1, 4), q(2))).toBe(true)
    expect(ratesCompatible(q(10), q(7))).toBe(false)
    expect(ratesCompatible(q(10), q(15))).toBe(false)
  })
})

describe('assemble', () => {
  it('intersects the channel spans and takes the lowest rate', () => {
    const dataset = assemble([timeline('Ex', 0, 10, 20), timeline('Hx', 0.4, 5, 10)])

    expect(dataset.channelNames).toEqual(['Ex', 'Hx'])
    expect(dataset.commonSampleRate?.eq(5)).toBe(true)
    expect(dataset.isEmpty).toBe(false)
    expect(dataset.validTimeRange?.start.eq(q(2, 5))).toBe(true)
    expect(dataset.validTimeRange?.end.eq(2)).toBe(true)
    expect(dataset.conditions).toEqual([])
  })

  it('takes timelines keyed by channel', () => {
    const timelines = new Map([['Ex', timeline('Ex', 0, 1, 4)]])
    expect(assemble(timelines).channelNames).toEqual(['Ex'])
  })

  it('rejects rates that are not whole multiples', () => {
    let caught: unknown
    try {
      assemble([timeline('Ex', 0, 10, 20), timeline('Hx', 0, 7, 14)])
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(IncompatibleRatesError)
    expect(caught instanceof IncompatibleRatesError && caught.rates.get('Ex')?.eq(10)).toBe(true)
    expect(caught instanceof IncompatibleRatesError && caught.rates.get('Hx')?.eq(7)).toBe(true)
  })

  it('rejects a repeated channel', () => {
    expect(() => assemble([timeline('Ex', 0, 1, 2), timeline('Ex', 5, 1, 2)])).toThrow(DuplicateChannelError)
  })

  it('reports channels that never overlap as a condition', () => {
    const dataset = assemble([timeline('Ex', 0, 10, 10), timeline('Hx', 5, 10, 10)])

    expect(dataset.isEmpty).toBe(true)
    expect(dataset.validTimeRange).toBeNull()
    expect(dataset.conditions).toHaveLength(1)
    expect(dataset.conditions[0]).toBeInstanceOf(NoOverlapError)
    expect(dataset.timeline('Hx').segments).toHaveLength(1)
    expect(() => dataset.slice('Ex', q(0), q(1))).toThrow(OutOfRangeError)
  })

  it('treats channels without samples as having no common span', () => {
    const empty = reconcile([makeSegment('Ex', 0, 10, 0)])
    const dataset = assemble([empty])

    expect(dataset.isEmpty).toBe(true)
    expect(dataset.commonSampleRate).toBeNull()
    expect(dataset.conditions[0]).toBeInstanceOf(NoOverlapError)
    expect(dataset.conditions[0].message).toBe('Channel "Ex" holds no samples')
    expect(() => assemble([empty], { noOverlapPolicy: 'error' })).toThrow(NoOverlapError)
  })

  it('throws on no overlap when asked to', () => {
    expect(() => assemble(
      [timeline('Ex', 0, 10, 10), timeline('Hx', 5, 10, 10)],
      { noOverlapPolicy: 'error' },
    )).toThrow(NoOverlapError)
  })
})

describe('Dataset', () => {
  const dataset = assemble([timeline('Ex', 0, 10, 20), timeline('Hx', 0.4, 5, 10)])

  it('slices one channel on its own grid', () => {
    const [ex] = dataset.slice('Ex', q(1, 2), q(1))
    expect(Array.from(ex.samples)).toEqual([5, 6, 7, 8, 9])
    expect(ex.startTime.eq(q(1, 2))).toBe(true)

    const [hx] = dataset.slice('Hx', q(2, 5), q(1))
    expect(Array.from(hx.samples)).toEqual([0, 1, 2])
  })

  it('slices every channel over the valid range', () => {
    const all = dataset.sliceAll(q(2, 5), q(2))
    expect(all.get('Ex')?.[0].samples.length).toBe(16)
    expect(all.get('Hx')?.[0].samples.length).toBe(8)
  })

  it('refuses ranges outside the valid range', () => {
    expect(() => dataset.slice('Ex', q(0), q(1))).toThrow(OutOfRangeError)
    expect(() => dataset.slice('Ex', q(1), q(3))).toThrow(OutOfRangeError)
    expect(() => dataset.slice('Ex', q(1), q(1, 2))).toThrow(OutOfRangeError)
  })

  it('rejects an unknown channel', () => {
    expect(() => dataset.timeline('Ez')).toThrow(UnknownChannelError)
    expect(dataset.hasChannel('Ez')).toBe(false)
  })

  it('hands out copies that leave the dataset untouched', () => {
    const whole = assemble([timeline('Ex', 0, 1, 4), timeline('Hx', 0, 1, 4)])
    const [piece] = whole.slice('Ex', q(0), q(4))
    const stored = whole.timeline('Ex').segments[0]

    expect(piece).not.toBe(stored)
    piece.samples[0] = 999
    expect(Array.from(stored.samples)).toEqual([0, 1, 2, 3])
    expect(Array.from(whole.slice('Ex', q(0), q(4))[0].samples)).toEqual([0, 1, 2, 3])
  })

  it('returns one piece per side of a gap', () => {
    const gapped = assembleSegments([
      makeSegment('Ex', 0, 10, 10),
      makeSegment('Ex', 1.5, 10, 10),
      makeSegment('Hx', 0, 10, 25),
    ])
    expect(gapped.timeline('Ex').gaps).toHaveLength(1)
    const pieces = gapped.slice('Ex', q(1, 2), q(2))
    expect(pieces.map(p => Array.from(p.samples))).toEqual([[5, 6, 7, 8, 9], [0, 1, 2, 3, 4]])
  })
})

describe('assembleSegments', () => {
  it('groups, reconciles and assembles decoded segments', () => {
    const dataset = assembleSegments([
      makeSegment('Ex', 1, 10, 5),
      makeSegment('Hx', 0, 10, 15),
      makeSegment('Ex', 0, 10, 10),
    ])

    expect(dataset.channelNames).toEqual(['Ex', 'Hx'])
    expect(dataset.timeline('Ex').segments).toHaveLength(1)
    expect(dataset.validTimeRange?.start.isZero()).toBe(true)
    expect(dataset.validTimeRange?.end.eq(q(3, 2))).toBe(true)
  })
})
