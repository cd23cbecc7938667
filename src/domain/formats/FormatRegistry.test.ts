import { describe, it, expect } from 'vitest'
import { UnrecognizedFormatError } from '../errors'
import { q, probe } from '../test-helpers'
import { INSTRUMENT_FORMATS } from '../types/TimeSeries'
import { getDecoder, resolveFormat } from './FormatRegistry'
import { encodeAsciiFile } from './ascii/AsciiWriter'
import { encodeAtsFile } from './ats/AtsWriter'
import { encodeB423File } from './lemi/LemiWriter'
import { encodeMseedRecords } from './miniseed/MseedWriter'

const ats = encodeAtsFile({
  startTime: q(0),
  sampleRate: q(128),
  channelType: 'Hx',
  lsb: 1,
  counts: [1, 2],
})

function lemi(constants: Record<string, number>): Uint8Array {
  return encodeB423File({
    variant: 'lemi-b423e',
    constants,
    sampleRate: 1,
    firstSecond: 0,
    counts: [[0], [0], [0], [0]],
  })
}

function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  return undefined
}

describe('FormatRegistry', () => {
  it('binds a decoder to every format', () => {
    for (const format of INSTRUMENT_FORMATS) {
      expect(getDecoder(format).format).toBe(format)
    }
  })

  it('takes a hint over anything in the file', () => {
    expect(resolveFormat(probe('x.ats', ats), 'ascii')).toBe('ascii')
  })

  it('matches by naming convention', () => {
    expect(resolveFormat(probe('site/084_V01_C02_R000_THx_BL_128H.ats', ats))).toBe('ats')
    expect(resolveFormat(probe('run/0001.RAW', new Uint8Array(8), ['0001.RAW', '0001.XTR']))).toBe('spam')
    expect(resolveFormat(probe('run/1234A.TS4', new Uint8Array(8), ['1234A.TS4', '1234A.TBL']))).toBe('phoenix-ts')
  })

  it('matches miniSEED by its record header', () => {
    const bytes = encodeMseedRecords({
      network: 'XX',
      station: 'ST01',
      channel: 'LFZ',
      startTime: q(1_704_067_200),
      sampleRate: q(1),
      samples: [1, 2, 3],
    })
    expect(resolveFormat(probe('data/trace.bin', bytes))).toBe('miniseed')
  })

  it('falls back to content sniffing', () => {
    expect(resolveFormat(probe('renamed.bin', ats))).toBe('ats')
    const text = encodeAsciiFile({
      startTime: q(0),
      sampleRate: q(1),
      channels: [{ name: 'A', values: [1] }],
    })
    expect(resolveFormat(probe('export.txt', text))).toBe('ascii')
  })

  it('lets the header text pick the Lemi variant', () => {
    const e = lemi({ Ke1: 1, Ke2: 1, Ke3: 1, Ke4: 1, Ae1: 0, Ae2: 0, Ae3: 0, Ae4: 0 })
    expect(resolveFormat(probe('a.B423', e))).toBe('lemi-b423e')
  })

  it('fails closed when the Lemi variant cannot be told', () => {
    const err = catchError(() => resolveFormat(probe('a.B423', lemi({ Ke1: 1 }))))
    expect(err).toBeInstanceOf(UnrecognizedFormatError)
    expect(err instanceof UnrecognizedFormatError && err.candidates).toEqual(['lemi-b423', 'lemi-b423e'])
  })

  it('rejects an unknown file', () => {
    const err = catchError(() => resolveFormat(probe('notes.md', new TextEncoder().encode('hello'))))
    expect(err).toBeInstanceOf(UnrecognizedFormatError)
    expect(err instanceof UnrecognizedFormatError && err.candidates).toEqual([])
  })
})
