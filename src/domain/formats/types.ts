import type { Rational } from '../time/Rational.ts'
import type { Header, InstrumentFormat, Segment } from '../types/TimeSeries.ts'
import type { TruncatedPayloadError } from '../errors.ts'

/** File contents plus the companion file some formats keep their header in */
export interface SourceFile {
  path: string
  bytes: Uint8Array
  sidecar?: {
    path: string
    bytes: Uint8Array
  }
}

/** What the registry sees of a file before reading it whole */
export interface FormatProbe {
  path: string
  /** Names (not paths) of the other files in the same directory */
  siblings: readonly string[]
  /** Leading bytes of the file, typically 4 KiB */
  head: Uint8Array
}

export type TruncationPolicy = 'accept' | 'reject'

export interface DecodeOptions {
  /** Skips detection entirely */
  format?: InstrumentFormat
  /** Required by formats that do not record their rate (Lemi) unless it can be inferred */
  sampleRate?: Rational
  /** Rename channels as declared by the file; applied before duplicate checks */
  channelMap?: Readonly<Record<string, string>>
  /** Decode only these channels (names after mapping) */
  channels?: readonly string[]
  /** Electrode spacing in metres, for formats that do not store it */
  dipoleLengths?: Readonly<Partial<Record<'Ex' | 'Ey', number>>>
  /** Internal magnetic gain to remove (Lemi) */
  magneticGain?: number
  truncatedPayload?: TruncationPolicy
  signal?: AbortSignal
  /** Refuse files larger than this many bytes */
  maxBytes?: number
}

export interface DecodeWarning {
  message: string
  error?: TruncatedPayloadError
}

export interface PayloadResult {
  segments: Segment[]
  warnings: DecodeWarning[]
  /** Declared channels that produced no samples, or were not selected */
  missingChannels: string[]
}

/**
 * A header/payload decoder pair for one instrument format.
 */
export interface FormatDecoder {
  readonly format: InstrumentFormat
  /** Naming convention match (extension plus required companion files) */
  matchesName?(path: string, siblings: readonly string[]): boolean
  /** Magic-byte match */
  matchesMagic?(head: Uint8Array): boolean
  /** Weaker content check used when nothing stronger matched */
  sniff?(head: Uint8Array): boolean
  /** Companion file holding the header, if the format has one */
  sidecarPath?(path: string, siblings: readonly string[]): string | undefined
  decodeHeader(source: SourceFile, options?: DecodeOptions): Header
  decodePayload(source: SourceFile, header: Header, options?: DecodeOptions): PayloadResult
}
