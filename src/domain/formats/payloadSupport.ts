import { DecodeAbortedError, TruncatedPayloadError, type ErrorContext } from '../errors.ts'
import type { ChannelSpec, Header } from '../types/TimeSeries.ts'
import { isSelected } from './headerValidation.ts'
import type { DecodeOptions, DecodeWarning } from './types.ts'

export function checkAborted(options: DecodeOptions | undefined, file: string): void {
  if (options?.signal?.aborted) {
    throw new DecodeAbortedError('Decode aborted', { file })
  }
}

/**
 * Throw under the `reject` policy, otherwise record a warning and let the
 * caller keep the whole samples.
 */
export function reportTruncation(
  warnings: DecodeWarning[],
  options: DecodeOptions | undefined,
  recoverable: number,
  expected: number | undefined,
  detail: string,
  context: ErrorContext,
): void {
  const error = new TruncatedPayloadError(recoverable, expected, detail, context)
  if ((options?.truncatedPayload ?? 'accept') === 'reject') {
    throw error
  }
  warnings.push({ message: error.message, error })
}

export interface ChannelSelection {
  /** Selected specs, in file order */
  channels: ChannelSpec[]
  /** Position of each selected channel within the file's channel order */
  indices: number[]
  missing: string[]
}

export function selectChannels(header: Header, options: DecodeOptions | undefined): ChannelSelection {
  const channels: ChannelSpec[] = []
  const indices: number[] = []
  const missing: string[] = []
  header.channels.forEach((chan, i) => {
    if (isSelected(chan.name, options)) {
      channels.push(chan)
      indices.push(i)
    } else {
      missing.push(chan.name)
    }
  })
  return { channels, indices, missing }
}
