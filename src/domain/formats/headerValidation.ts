/**
 * Checks shared by every header decoder, plus the channelMap / channels
 * option helpers.
 */
import { DuplicateChannelError, MalformedHeaderError } from '../errors.ts'
import type { Header } from '../types/TimeSeries.ts'
import type { DecodeOptions } from './types.ts'

export function validateHeader(header: Header): Header {
  const file = header.source
  if (!header.sampleRate.isPositive()) {
    throw new MalformedHeaderError(`Sample rate must be positive, got ${header.sampleRate}`, { file })
  }
  if (header.channels.length === 0) {
    throw new MalformedHeaderError('Header declares no channels', { file })
  }
  const seen = new Set<string>()
  for (const chan of header.channels) {
    if (chan.name === '') {
      throw new MalformedHeaderError('Channel with empty name', { file })
    }
    if (seen.has(chan.name)) {
      throw new DuplicateChannelError(chan.name, { file })
    }
    seen.add(chan.name)
  }
  if (header.nSamples !== undefined && (!Number.isInteger(header.nSamples) || header.nSamples < 0)) {
    throw new MalformedHeaderError(`Invalid sample count ${header.nSamples}`, { file })
  }
  return header
}

export function mapChannelName(name: string, options: DecodeOptions | undefined): string {
  return options?.channelMap?.[name] ?? name
}

export function isSelected(name: string, options: DecodeOptions | undefined): boolean {
  return options?.channels === undefined || options.channels.includes(name)
}

/** Look up a numeric header property, failing with MalformedHeader when absent */
export function numberProperty(header: Header, key: string): number {
  const value = header.properties[key]
  if (typeof value !== 'number') {
    throw new MalformedHeaderError(`Header property ${key} missing`, { file: header.source })
  }
  return value
}
