/**
 * Format Registry
 *
 * Maps every InstrumentFormat to its decoder and detects the format of a file
 * from an explicit hint, its naming convention / magic bytes, or a content
 * sniff, in that order. Detection fails closed: when one tier yields several
 * candidates the file is rejected rather than guessed.
 */
import { UnrecognizedFormatError } from '../errors.ts'
import type { InstrumentFormat } from '../types/TimeSeries.ts'
import { asciiDecoder } from './ascii/AsciiDecoder.ts'
import { atsDecoder } from './ats/AtsDecoder.ts'
import { lemiB423Decoder, lemiB423eDecoder } from './lemi/LemiDecoder.ts'
import { mseedDecoder } from './miniseed/MseedDecoder.ts'
import { phoenixDecoder } from './phoenix/PhoenixDecoder.ts'
import { spamDecoder } from './spam/SpamDecoder.ts'
import type { FormatDecoder, FormatProbe } from './types.ts'

const DECODERS = {
  ats: atsDecoder,
  'lemi-b423': lemiB423Decoder,
  'lemi-b423e': lemiB423eDecoder,
  'phoenix-ts': phoenixDecoder,
  spam: spamDecoder,
  miniseed: mseedDecoder,
  ascii: asciiDecoder,
} satisfies Record<InstrumentFormat, FormatDecoder>

const ALL: readonly FormatDecoder[] = Object.values(DECODERS)

export function getDecoder(format: InstrumentFormat): FormatDecoder {
  return DECODERS[format]
}

export function listDecoders(): readonly FormatDecoder[] {
  return ALL
}

function formats(decoders: readonly FormatDecoder[]): InstrumentFormat[] {
  return decoders.map(d => d.format)
}

function isStrongMatch(decoder: FormatDecoder, probe: FormatProbe): boolean {
  return (decoder.matchesName?.(probe.path, probe.siblings) ?? false) || (decoder.matchesMagic?.(probe.head) ?? false)
}

export function resolveFormat(probe: FormatProbe, hint?: InstrumentFormat): InstrumentFormat {
  if (hint !== undefined) return hint

  const file = probe.path
  const strong = ALL.filter(d => isStrongMatch(d, probe))
  if (strong.length === 1) return strong[0].format
  if (strong.length > 1) {
    const narrowed = strong.filter(d => d.sniff?.(probe.head) ?? false)
    if (narrowed.length === 1) return narrowed[0].format
    throw new UnrecognizedFormatError(
      `Ambiguous format, candidates: ${formats(strong).join(', ')}`,
      { file },
      formats(strong),
    )
  }

  const sniffed = ALL.filter(d => d.sniff?.(probe.head) ?? false)
  if (sniffed.length === 1) return sniffed[0].format
  if (sniffed.length > 1) {
    throw new UnrecognizedFormatError(
      `Ambiguous format, candidates: ${formats(sniffed).join(', ')}`,
      { file },
      formats(sniffed),
    )
  }
  throw new UnrecognizedFormatError('No reader recognises this file', { file })
}
