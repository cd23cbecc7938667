import type { DecodeOptions } from '../domain/formats/types.ts'
import type { DecodedFile } from './FileLoader.ts'

export interface FileStamp {
  size: number
  mtimeMs: number
  /** The companion header file the decode also read */
  sidecar?: {
    path: string
    size: number
    mtimeMs: number
  }
}

interface Entry {
  stampKey: string
  optionsKey: string
  file: DecodedFile
}

function stampKey(stamp: FileStamp): string {
  const { sidecar } = stamp
  return JSON.stringify([
    stamp.size,
    stamp.mtimeMs,
    sidecar ? [sidecar.path, sidecar.size, sidecar.mtimeMs] : null,
  ])
}

/** The decode options that change what a file decodes to */
export function optionsKey(options: DecodeOptions): string {
  return JSON.stringify([
    options.format ?? null,
    options.sampleRate?.toString() ?? null,
    options.channelMap ?? null,
    options.channels ?? null,
    options.dipoleLengths ?? null,
    options.magneticGain ?? null,
    options.truncatedPayload ?? 'accept',
  ])
}

/**
 * Decoded files keyed by path. An entry is only returned while the size and
 * modification time of the file and of its companion header file, and the
 * decode options, match those it was stored with; a mismatch drops it.
 */
export class SegmentCache {
  private entries = new Map<string, Entry>()

  get size(): number {
    return this.entries.size
  }

  get(path: string, stamp: FileStamp, options: DecodeOptions = {}): DecodedFile | undefined {
    const entry = this.entries.get(path)
    if (!entry) return undefined
    if (entry.stampKey !== stampKey(stamp) || entry.optionsKey !== optionsKey(options)) {
      this.entries.delete(path)
      return undefined
    }
    return entry.file
  }

  set(path: string, stamp: FileStamp, options: DecodeOptions, file: DecodedFile): void {
    this.entries.set(path, {
      stampKey: stampKey(stamp),
      optionsKey: optionsKey(options),
      file,
    })
  }

  delete(path: string): boolean {
    return this.entries.delete(path)
  }

  clear(): void {
    this.entries.clear()
  }
}
