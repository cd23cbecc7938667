import { describe, it, expect } from 'vitest'
import { MalformedHeaderError, TruncatedPayloadError } from '../../errors'
import { q, source } from '../../test-helpers'
import { atsDecoder } from './AtsDecoder'
import { encodeAtsFile, type AtsFileInput } from './AtsWriter'

function atsFile(overrides: Partial<AtsFileInput> = {}): Uint8Array {
  return encodeAtsFile({
    startTime: q(1_700_000_000),
    sampleRate: q(128),
    channelType: 'Ex',
    lsb: 0.5,
    counts: [3, -2, 0, 10],
    positions: { x1: -50, x2: 50 },
    ...overrides,
  })
}

describe('atsDecoder', () => {
  describe('header', () => {
    it('reads rate, start and sample count', () => {
      const header = atsDecoder.decodeHeader(source('site/084_Ex.ats', atsFile()))
      expect(header.format).toBe('ats')
      expect(header.sampleRate.eq(128)).toBe(true)
      expect(header.startTime.eq(1_700_000_000)).toBe(true)
      expect(header.nSamples).toBe(4)
      expect(header.properties.dipoleLength).toBe(100)
    })

    it('keeps a decimal float32 rate exact', () => {
      const header = atsDecoder.decodeHeader(source('a.ats', atsFile({ sampleRate: q(1, 10) })))
      expect(header.sampleRate.num).toBe(1n)
      expect(header.sampleRate.den).toBe(10n)
    })

    it('scales electric channels to mV/km by the electrode spacing', () => {
      const [channel] = atsDecoder.decodeHeader(source('a.ats', atsFile())).channels
      expect(channel).toEqual({ name: 'Ex', unit: 'mV/km', scaling: 5, offset: 0, sensorType: 'electric' })
    })

    it('scales magnetic channels by the LSB alone', () => {
      const bytes = atsFile({ channelType: 'Hx', lsb: 0.25, positions: {} })
      const [channel] = atsDecoder.decodeHeader(source('a.ats', bytes)).channels
      expect(channel).toEqual({ name: 'Hx', unit: 'mV', scaling: 0.25, offset: 0, sensorType: 'magnetic' })
    })

    it('falls back to the caller dipole length', () => {
      const bytes = atsFile({ positions: {} })
      expect(() => atsDecoder.decodeHeader(source('a.ats', bytes))).toThrow(MalformedHeaderError)

      const header = atsDecoder.decodeHeader(source('a.ats', bytes), { dipoleLengths: { Ex: 200 } })
      expect(header.channels[0].scaling).toBe(2.5)
    })

    it('applies the channel map', () => {
      const header = atsDecoder.decodeHeader(source('a.ats', atsFile()), { channelMap: { Ex: 'E1' } })
      expect(header.channels[0].name).toBe('E1')
    })

    it('rejects a file shorter than its header', () => {
      expect(() => atsDecoder.decodeHeader(source('a.ats', new Uint8Array(100)))).toThrow(MalformedHeaderError)
    })

    it('re-encodes the rate and start fields byte for byte', () => {
      const original = atsFile({ sampleRate: q(1, 10) })
      const header = atsDecoder.decodeHeader(source('a.ats', original))
      const again = atsFile({ sampleRate: header.sampleRate, startTime: header.startTime })
      expect(Array.from(again.slice(8, 16))).toEqual(Array.from(original.slice(8, 16)))
    })
  })

  describe('payload', () => {
    it('produces one scaled segment', () => {
      const src = source('a.ats', atsFile())
      const header = atsDecoder.decodeHeader(src)
      const { segments, warnings, missingChannels } = atsDecoder.decodePayload(src, header)

      expect(warnings).toEqual([])
      expect(missingChannels).toEqual([])
      expect(segments).toHaveLength(1)
      expect(Array.from(segments[0].samples)).toEqual([15, -10, 0, 50])
      expect(segments[0].startTime.eq(1_700_000_000)).toBe(true)
      expect(segments[0].sources).toEqual(['a.ats'])
    })

    it('multiplies exact integers once across 10 000 samples', () => {
      const counts = new Array<number>(10_000).fill(100)
      const src = source('a.ats', atsFile({ channelType: 'Hz', lsb: 0.01, counts, positions: {} }))
      const header = atsDecoder.decodeHeader(src)
      const [segment] = atsDecoder.decodePayload(src, header).segments

      expect(segment.samples.every(v => v === 1)).toBe(true)
      expect(segment.samples.reduce((sum, v) => sum + v, 0)).toBe(10_000)
    })

    it('keeps whole samples of a truncated payload with a warning', () => {
      const bytes = atsFile().slice(0, 1024 + 14)
      const src = source('a.ats', bytes)
      const header = atsDecoder.decodeHeader(src)
      const { segments, warnings } = atsDecoder.decodePayload(src, header)

      expect(Array.from(segments[0].samples)).toEqual([15, -10, 0])
      expect(warnings).toHaveLength(1)
      expect(warnings[0].error?.recoverableSamples).toBe(3)
    })

    it('throws on a truncated payload under the reject policy', () => {
      const src = source('a.ats', atsFile().slice(0, 1024 + 14))
      const header = atsDecoder.decodeHeader(src)
      expect(() => atsDecoder.decodePayload(src, header, { truncatedPayload: 'reject' }))
        .toThrow(TruncatedPayloadError)
    })

    it('reports an unselected channel as missing', () => {
      const src = source('a.ats', atsFile())
      const header = atsDecoder.decodeHeader(src)
      const result = atsDecoder.decodePayload(src, header, { channels: ['Hy'] })
      expect(result.segments).toEqual([])
      expect(result.missingChannels).toEqual(['Ex'])
    })
  })
})
