import { describe, it, expect } from 'vitest'
import { q, source } from '../../test-helpers'
import { mseedDecoder, readRecordHeaders, SeedEncoding, seedSampleRate, seedSensorType } from './MseedDecoder'
import { encodeMseedRecords, seedRateFields, type MseedInput } from './MseedWriter'
import type { DecodeOptions } from '../types'

const T0 = 1_704_067_200

function wave(n: number, amplitude: number): number[] {
  return Array.from({ length: n }, (_, i) => Math.round(amplitude * Math.sin(i / 10)) + 0)
}

function mseed(overrides: Partial<MseedInput> = {}): Uint8Array {
  return encodeMseedRecords({
    network: 'XX',
    station: 'ST01',
    channel: 'LFZ',
    startTime: q(T0),
    sampleRate: q(1),
    samples: wave(300, 500),
    recordLength: 256,
    ...overrides,
  })
}

function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0))
  let at = 0
  for (const part of parts) {
    out.set(part, at)
    at += part.length
  }
  return out
}

function decode(bytes: Uint8Array, options: DecodeOptions = {}) {
  const src = source('a.mseed', bytes)
  const header = mseedDecoder.decodeHeader(src, options)
  return { header, ...mseedDecoder.decodePayload(src, header, options) }
}

describe('SEED rate fields', () => {
  it('turns factor / multiplier pairs into exact rates', () => {
    expect(seedSampleRate(100, 1).eq(100)).toBe(true)
    expect(seedSampleRate(-10, 1).eq(q(1, 10))).toBe(true)
    expect(seedSampleRate(2, -3).eq(q(2, 3))).toBe(true)
    expect(seedSampleRate(-2, -5).eq(q(1, 10))).toBe(true)
    expect(seedSampleRate(0, 1).isZero()).toBe(true)
  })

  it('writes the pair back', () => {
    expect(seedRateFields(q(100))).toEqual([100, 1])
    expect(seedRateFields(q(1, 10))).toEqual([-10, 1])
    expect(seedRateFields(q(2, 3))).toEqual([2, -3])
  })
})

describe('seedSensorType', () => {
  it('reads the instrument code', () => {
    expect(seedSensorType('LFZ')).toBe('magnetic')
    expect(seedSensorType('LQN')).toBe('electric')
    expect(seedSensorType('HHZ')).toBe('other')
  })
})

describe('mseedDecoder', () => {
  it('recognises data records by their fixed header', () => {
    expect(mseedDecoder.matchesMagic?.(mseed())).toBe(true)
    expect(mseedDecoder.matchesMagic?.(new Uint8Array(64))).toBe(false)
  })

  it('reads the header of a Steim-2 trace', () => {
    const { header } = decode(mseed())
    expect(header.format).toBe('miniseed')
    expect(header.sampleRate.eq(1)).toBe(true)
    expect(header.startTime.eq(T0)).toBe(true)
    expect(header.nSamples).toBe(300)
    expect(header.channels).toEqual([
      { name: 'LFZ', unit: 'counts', scaling: 1, offset: 0, sensorType: 'magnetic' },
    ])
    expect(header.properties.traceIds).toBe('XX.ST01..LFZ')
  })

  it('merges consecutive Steim-2 records into one segment', () => {
    const bytes = mseed()
    expect(readRecordHeaders(bytes, 'a.mseed').records.length).toBeGreaterThan(1)

    const { segments, warnings } = decode(bytes)
    expect(warnings).toEqual([])
    expect(segments).toHaveLength(1)
    expect(Array.from(segments[0].samples)).toEqual(wave(300, 500))
  })

  it('decodes Steim-1 with wide differences', () => {
    const samples = wave(120, 2_000_000)
    const { segments } = decode(mseed({ samples, encoding: SeedEncoding.STEIM1 }))
    expect(Array.from(segments[0].samples)).toEqual(samples)
  })

  it('decodes little-endian int16 with a sub-second start', () => {
    const { header, segments } = decode(mseed({
      samples: [1, -2, 3],
      encoding: SeedEncoding.INT16,
      byteOrder: 'little',
      sampleRate: q(10),
      startTime: q(T0 * 2 + 1, 2),
    }))
    expect(header.startTime.eq(q(T0 * 2 + 1, 2))).toBe(true)
    expect(header.sampleRate.eq(10)).toBe(true)
    expect(Array.from(segments[0].samples)).toEqual([1, -2, 3])
  })

  it('decodes float64 samples', () => {
    const { segments } = decode(mseed({ samples: [0.5, 1.25, -3.75], encoding: SeedEncoding.FLOAT64 }))
    expect(Array.from(segments[0].samples)).toEqual([0.5, 1.25, -3.75])
  })

  it('keeps interleaved traces apart and applies the channel map', () => {
    const bytes = concat(
      mseed({ samples: [1, 2, 3], encoding: SeedEncoding.INT32 }),
      mseed({ channel: 'LQN', samples: [4, 5, 6], encoding: SeedEncoding.INT32 }),
    )
    const { header, segments } = decode(bytes, { channelMap: { 'XX.ST01..LFZ': 'Hz', LQN: 'Ex' } })

    expect(header.channels.map(c => [c.name, c.sensorType])).toEqual([['Hz', 'magnetic'], ['Ex', 'electric']])
    expect(header.nSamples).toBeUndefined()
    expect(segments.map(s => s.channel)).toEqual(['Hz', 'Ex'])
    expect(Array.from(segments[1].samples)).toEqual([4, 5, 6])
  })

  it('opens a new segment where records do not continue each other', () => {
    const bytes = concat(
      mseed({ samples: [1, 2], encoding: SeedEncoding.INT32 }),
      mseed({ samples: [3, 4], encoding: SeedEncoding.INT32, startTime: q(T0 + 10) }),
    )
    const { segments } = decode(bytes)
    expect(segments).toHaveLength(2)
    expect(segments[1].startTime.eq(T0 + 10)).toBe(true)
  })

  it('warns about a trailing partial record', () => {
    const full = mseed({ samples: [1, 2, 3], encoding: SeedEncoding.INT32 })
    const { segments, warnings } = decode(concat(full, full.slice(0, 100)))
    expect(Array.from(segments[0].samples)).toEqual([1, 2, 3])
    expect(warnings).toHaveLength(1)
    expect(warnings[0].error?.recoverableSamples).toBe(3)
  })
})
