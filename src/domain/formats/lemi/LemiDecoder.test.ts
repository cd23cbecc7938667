import { describe, it, expect } from 'vitest'
import { MalformedHeaderError } from '../../errors'
import { q, source } from '../../test-helpers'
import { inferLemiSampleRate, B423_LAYOUT, lemiB423Decoder, lemiB423eDecoder } from './LemiDecoder'
import { lemiVariant, parseLemiAsciiHeader } from './lemiHeader'
import { encodeB423File, type B423FileInput } from './LemiWriter'

const FIRST_SECOND = 1_600_000_000

const B423_CONSTANTS = {
  Kmx: 2, Kmy: 2, Kmz: 2, Ke1: 0.5, Ke2: 0.5,
  Ax: 1, Ay: 0, Az: 0, Ae1: 0, Ae2: 0,
}

const B423E_CONSTANTS = {
  Ke1: 1, Ke2: 1, Ke3: 1, Ke4: 1,
  Ae1: 0, Ae2: 0, Ae3: 0, Ae4: 0,
}

function b423(overrides: Partial<B423FileInput> = {}): Uint8Array {
  return encodeB423File({
    constants: B423_CONSTANTS,
    location: { Lat: 5130.5 },
    sampleRate: 4,
    firstSecond: FIRST_SECOND,
    counts: [
      [1, 2, 3, 4, 5, 6],
      [0, 0, 0, 0, 0, 0],
      [0, 0, 0, 0, 0, 0],
      [200, 200, 200, 200, 200, 200],
      [0, 0, 0, 0, 0, 0],
    ],
    ...overrides,
  })
}

function b423e(): Uint8Array {
  return encodeB423File({
    variant: 'lemi-b423e',
    constants: B423E_CONSTANTS,
    sampleRate: 2,
    firstSecond: FIRST_SECOND,
    counts: [[1, 2, 3], [4, 5, 6], [7, 8, 9], [10, 11, 12]],
  })
}

describe('lemi ASCII header', () => {
  it('reads constants and location', () => {
    const parsed = parseLemiAsciiHeader(b423())
    expect(parsed.constants.Kmx).toBe(2)
    expect(parsed.constants.Ke1).toBe(0.5)
    expect(parsed.location.Lat).toBe(5130.5)
  })

  it('tells the variants apart by their constants', () => {
    expect(lemiVariant(b423())).toBe('lemi-b423')
    expect(lemiVariant(b423e())).toBe('lemi-b423e')
    expect(lemiVariant(new Uint8Array([0x41, 0x42]))).toBeUndefined()
  })
})

describe('lemiB423Decoder', () => {
  it('infers the rate from the sample counter wrap', () => {
    expect(inferLemiSampleRate(b423(), B423_LAYOUT)?.eq(4)).toBe(true)
  })

  it('decodes the header', () => {
    const header = lemiB423Decoder.decodeHeader(source('a.B423', b423()))
    expect(header.format).toBe('lemi-b423')
    expect(header.sampleRate.eq(4)).toBe(true)
    expect(header.startTime.eq(FIRST_SECOND)).toBe(true)
    expect(header.nSamples).toBe(6)
    expect(header.channels.map(c => c.name)).toEqual(['Hx', 'Hy', 'Hz', 'Ex', 'Ey'])
    expect(header.channels[0]).toEqual({ name: 'Hx', unit: 'mV', scaling: 2, offset: 1, sensorType: 'magnetic' })
    expect(header.properties.Lat).toBe(5130.5)
  })

  it('puts the counter fraction into the start time', () => {
    const header = lemiB423Decoder.decodeHeader(source('a.B423', b423({ firstCounter: 2 })))
    expect(header.startTime.eq(q(FIRST_SECOND * 2 + 1, 2))).toBe(true)
  })

  it('fails without a rate when the counter never wraps', () => {
    const bytes = b423({ counts: [[1, 2], [0, 0], [0, 0], [0, 0], [0, 0]] })
    expect(() => lemiB423Decoder.decodeHeader(source('a.B423', bytes))).toThrow(MalformedHeaderError)
    const header = lemiB423Decoder.decodeHeader(source('a.B423', bytes), { sampleRate: q(4) })
    expect(header.sampleRate.eq(4)).toBe(true)
  })

  it('removes the magnetic gain and divides by the dipole length', () => {
    const header = lemiB423Decoder.decodeHeader(source('a.B423', b423()), {
      magneticGain: 2,
      dipoleLengths: { Ex: 100 },
    })
    expect(header.channels[0].scaling).toBe(1)
    expect(header.channels[0].offset).toBe(0.5)
    expect(header.channels[3].scaling).toBe(0.005)
    expect(header.properties.dipole_Ex).toBe(100)
    expect(header.properties.dipole_Ey).toBe(1)
  })

  it('decodes one continuous segment per channel', () => {
    const src = source('a.B423', b423())
    const header = lemiB423Decoder.decodeHeader(src, { dipoleLengths: { Ex: 100 } })
    const { segments, warnings } = lemiB423Decoder.decodePayload(src, header)

    expect(warnings).toEqual([])
    expect(segments).toHaveLength(5)
    const hx = segments.find(s => s.channel === 'Hx')
    expect(Array.from(hx?.samples ?? [])).toEqual([3, 5, 7, 9, 11, 13])
    const ex = segments.find(s => s.channel === 'Ex')
    expect(ex?.samples[0]).toBeCloseTo(1, 12)
  })

  it('splits runs where the stamps jump', () => {
    const s = FIRST_SECOND
    const bytes = b423({
      stamps: [
        { second: s, counter: 0 },
        { second: s, counter: 1 },
        { second: s, counter: 2 },
        { second: s, counter: 3 },
        { second: s + 2, counter: 0 },
        { second: s + 2, counter: 1 },
      ],
    })
    const src = source('a.B423', bytes)
    const header = lemiB423Decoder.decodeHeader(src, { sampleRate: q(4) })
    const hx = lemiB423Decoder.decodePayload(src, header).segments.filter(seg => seg.channel === 'Hx')

    expect(hx).toHaveLength(2)
    expect(hx[0].samples.length).toBe(4)
    expect(hx[1].startTime.eq(s + 2)).toBe(true)
    expect(Array.from(hx[1].samples)).toEqual([11, 13])
  })

  it('warns about a partial trailing record', () => {
    const bytes = b423()
    const src = source('a.B423', bytes.slice(0, bytes.length - 10))
    const header = lemiB423Decoder.decodeHeader(src)
    const { segments, warnings } = lemiB423Decoder.decodePayload(src, header)

    expect(warnings).toHaveLength(1)
    expect(warnings[0].error?.recoverableSamples).toBe(5)
    expect(segments[0].samples.length).toBe(5)
  })
})

describe('lemiB423eDecoder', () => {
  it('relabels and limits channels', () => {
    const src = source('b.B423', b423e())
    const options = { channelMap: { E1: 'Ex', E2: 'Ey' }, channels: ['Ex'] }
    const header = lemiB423eDecoder.decodeHeader(src, options)
    const { segments, missingChannels } = lemiB423eDecoder.decodePayload(src, header, options)

    expect(header.channels.map(c => c.name)).toEqual(['Ex', 'Ey', 'E3', 'E4'])
    expect(segments).toHaveLength(1)
    expect(segments[0].channel).toBe('Ex')
    expect(Array.from(segments[0].samples)).toEqual([1, 2, 3])
    expect(missingChannels).toEqual(['Ey', 'E3', 'E4'])
  })
})
