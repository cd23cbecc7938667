import { describe, it, expect } from 'vitest'
import { InvalidInputError, MalformedHeaderError } from '../../errors'
import { q, source } from '../../test-helpers'
import { phoenixDecoder } from './PhoenixDecoder'
import { encodePhoenixTable, parsePhoenixTable, type TableValue } from './PhoenixTable'
import { encodePhoenixTs } from './PhoenixWriter'

// 2024-01-01T00:00:00Z
const T0 = 1_704_067_200

const TABLE: Record<string, TableValue> = {
  SNUM: 1234,
  SITE: 'ridge',
  SRL3: 4,
  FSCV: 2 ** 23,
  EGN: 4,
  HGN: 2,
  HATT: 1,
  HNUM: 1000,
  EXLN: 100,
  CHEX: 2,
  CHHX: 1,
}

function tsFile(): Uint8Array {
  return encodePhoenixTs({
    serial: 1234,
    sampleRate: 4,
    records: [
      { start: q(T0), counts: [[2, 4, 6, 8], [10, 20, 30, 40]] },
      { start: q(T0 + 1), counts: [[10, 12, 14, 16], [-10, -20, -30, -40]] },
      { start: q(T0 + 5), counts: [[100, 102], [1, 2]] },
    ],
  })
}

function phoenixSource(ts = tsFile(), table = TABLE) {
  return source('site/1234A.TS3', ts, { path: 'site/1234A.TBL', bytes: encodePhoenixTable(table) })
}

describe('PhoenixTable', () => {
  it('reads back typed entries', () => {
    const { entries, unknown } = parsePhoenixTable(encodePhoenixTable(TABLE))
    expect(entries.get('SNUM')).toBe(1234)
    expect(entries.get('SITE')).toBe('ridge')
    expect(entries.get('FSCV')).toBe(2 ** 23)
    expect(unknown).toEqual([])
  })

  it('refuses names without a known type', () => {
    expect(() => encodePhoenixTable({ ZZZZ: 1 })).toThrow(InvalidInputError)
  })
})

describe('phoenixDecoder', () => {
  it('matches a band file beside its table', () => {
    expect(phoenixDecoder.matchesName?.('site/1234A.TS3', ['1234A.TS3', '1234A.TBL'])).toBe(true)
    expect(phoenixDecoder.matchesName?.('site/1234A.TS3', ['1234A.TS3'])).toBe(false)
    expect(phoenixDecoder.sidecarPath?.('site/1234A.TS3', ['1234A.TBL'])).toBe('site/1234A.TBL')
  })

  it('orders channels by scan position and scales them', () => {
    const header = phoenixDecoder.decodeHeader(phoenixSource())
    expect(header.format).toBe('phoenix-ts')
    expect(header.sampleRate.eq(4)).toBe(true)
    expect(header.startTime.eq(T0)).toBe(true)
    expect(header.nSamples).toBe(10)
    expect(header.channels.map(c => c.name)).toEqual(['Hx', 'Ex'])
    expect(header.channels[0]).toEqual({ name: 'Hx', unit: 'nT', scaling: 0.5, offset: 0, sensorType: 'magnetic' })
    expect(header.channels[1].unit).toBe('mV/km')
    expect(header.channels[1].scaling).toBeCloseTo(2500, 9)
    expect(header.properties.SITE).toBe('ridge')
  })

  it('leaves magnetic channels in volts without a coil sensitivity', () => {
    const noCoil = Object.fromEntries(Object.entries(TABLE).filter(([name]) => name !== 'HNUM'))
    const header = phoenixDecoder.decodeHeader(phoenixSource(tsFile(), noCoil))
    expect(header.channels[0]).toEqual({ name: 'Hx', unit: 'V', scaling: 0.5, offset: 0, sensorType: 'magnetic' })
  })

  it('needs the table', () => {
    expect(() => phoenixDecoder.decodeHeader(source('site/1234A.TS3', tsFile()))).toThrow(MalformedHeaderError)
  })

  it('rejects a table that disagrees with the record channel count', () => {
    expect(() => phoenixDecoder.decodeHeader(phoenixSource(tsFile(), { ...TABLE, CHHY: 3 })))
      .toThrow(MalformedHeaderError)
  })

  it('joins contiguous records and splits at a gap', () => {
    const src = phoenixSource()
    const header = phoenixDecoder.decodeHeader(src)
    const { segments, warnings } = phoenixDecoder.decodePayload(src, header)
    const hx = segments.filter(s => s.channel === 'Hx')

    expect(warnings).toEqual([])
    expect(hx).toHaveLength(2)
    expect(Array.from(hx[0].samples)).toEqual([1, 2, 3, 4, 5, 6, 7, 8])
    expect(hx[1].startTime.eq(T0 + 5)).toBe(true)
    expect(Array.from(hx[1].samples)).toEqual([50, 51])
  })

  it('keeps negative 24-bit counts', () => {
    const src = phoenixSource()
    const header = phoenixDecoder.decodeHeader(src)
    const ex = phoenixDecoder.decodePayload(src, header, { channels: ['Ex'] }).segments
    expect(ex).toHaveLength(2)
    expect(ex[0].samples[4] / header.channels[1].scaling).toBeCloseTo(-10, 9)
  })

  it('keeps the whole scans of a cut record', () => {
    const bytes = tsFile()
    const src = phoenixSource(bytes.slice(0, bytes.length - 3))
    const header = phoenixDecoder.decodeHeader(src)
    const { segments, warnings } = phoenixDecoder.decodePayload(src, header)
    const hx = segments.filter(s => s.channel === 'Hx')

    expect(warnings).toHaveLength(1)
    expect(warnings[0].error?.recoverableSamples).toBe(1)
    expect(Array.from(hx[1].samples)).toEqual([50])
  })
})
