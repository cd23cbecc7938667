/**
 * Reader error taxonomy.
 *
 * Format errors (UnrecognizedFormat, MalformedHeader, DuplicateChannel,
 * TruncatedPayload, DecodeAborted) are fatal for one file only. Continuity
 * errors (OverlappingSegments, RateChange) and assembly errors
 * (IncompatibleRates, NoOverlap, OutOfRange) abort the dataset under
 * construction, never already-built timelines.
 */
import type { Rational } from './time/Rational.ts'
import { formatInstant } from './time/instant.ts'

export type ReaderErrorCode =
  | 'UnrecognizedFormat'
  | 'MalformedHeader'
  | 'DuplicateChannel'
  | 'TruncatedPayload'
  | 'DecodeAborted'
  | 'OverlappingSegments'
  | 'RateChange'
  | 'IncompatibleRates'
  | 'NoOverlap'
  | 'OutOfRange'
  | 'UnknownChannel'
  | 'InvalidInput'

export interface ErrorContext {
  file?: string
  channel?: string
  instant?: Rational
  /** Byte offset (binary formats) or 1-based line number (text formats) */
  offset?: number
  line?: number
}

export class ReaderError extends Error {
  readonly code: ReaderErrorCode
  readonly context: ErrorContext
  /** The message without the appended context */
  readonly detail: string

  constructor(code: ReaderErrorCode, detail: string, context: ErrorContext = {}) {
    super(withContext(detail, context))
    this.name = `${code}Error`
    this.code = code
    this.detail = detail
    this.context = context
  }
}

export class UnrecognizedFormatError extends ReaderError {
  readonly candidates: readonly string[]

  constructor(detail: string, context: ErrorContext = {}, candidates: readonly string[] = []) {
    super('UnrecognizedFormat', detail, context)
    this.candidates = candidates
  }
}

export class MalformedHeaderError extends ReaderError {
  constructor(detail: string, context: ErrorContext = {}) {
    super('MalformedHeader', detail, context)
  }
}

export class DuplicateChannelError extends ReaderError {
  constructor(channel: string, context: ErrorContext = {}) {
    super('DuplicateChannel', `Channel "${channel}" is declared more than once`, { ...context, channel })
  }
}

export class TruncatedPayloadError extends ReaderError {
  /** Whole samples (per channel) that could still be decoded */
  readonly recoverableSamples: number
  readonly expectedSamples: number | undefined

  constructor(recoverableSamples: number, expectedSamples: number | undefined, detail: string, context: ErrorContext = {}) {
    super('TruncatedPayload', `${detail}; ${recoverableSamples} whole samples recoverable`, context)
    this.recoverableSamples = recoverableSamples
    this.expectedSamples = expectedSamples
  }
}

export class DecodeAbortedError extends ReaderError {
  constructor(detail: string, context: ErrorContext = {}) {
    super('DecodeAborted', detail, context)
  }
}

export class OverlappingSegmentsError extends ReaderError {
  /** How far the following segment reaches back into the preceding one, seconds */
  readonly overlap: Rational

  constructor(overlap: Rational, detail: string, context: ErrorContext = {}) {
    super('OverlappingSegments', detail, context)
    this.overlap = overlap
  }
}

export class RateChangeError extends ReaderError {
  readonly fromRate: Rational
  readonly toRate: Rational

  constructor(fromRate: Rational, toRate: Rational, context: ErrorContext = {}) {
    super('RateChange', `Sample rate changes from ${fromRate} Hz to ${toRate} Hz`, context)
    this.fromRate = fromRate
    this.toRate = toRate
  }
}

export class IncompatibleRatesError extends ReaderError {
  readonly rates: ReadonlyMap<string, Rational>

  constructor(rates: ReadonlyMap<string, Rational>, detail: string) {
    super('IncompatibleRates', detail)
    this.rates = rates
  }
}

export class NoOverlapError extends ReaderError {
  constructor(detail: string) {
    super('NoOverlap', detail)
  }
}

export class OutOfRangeError extends ReaderError {
  constructor(detail: string, context: ErrorContext = {}) {
    super('OutOfRange', detail, context)
  }
}

export class UnknownChannelError extends ReaderError {
  constructor(channel: string) {
    super('UnknownChannel', `No channel named "${channel}"`, { channel })
  }
}

export class InvalidInputError extends ReaderError {
  constructor(detail: string, context: ErrorContext = {}) {
    super('InvalidInput', detail, context)
  }
}

export function isReaderError(error: unknown): error is ReaderError {
  return error instanceof ReaderError
}

function withContext(detail: string, context: ErrorContext): string {
  const parts: string[] = []
  if (context.file !== undefined) parts.push(`file ${context.file}`)
  if (context.channel !== undefined) parts.push(`channel ${context.channel}`)
  if (context.instant !== undefined) parts.push(`at ${formatInstant(context.instant)}`)
  if (context.offset !== undefined) parts.push(`byte offset ${context.offset}`)
  if (context.line !== undefined) parts.push(`line ${context.line}`)
  return parts.length > 0 ? `${detail} (${parts.join(', ')})` : detail
}
