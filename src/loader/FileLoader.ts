import { open, readdir, readFile, stat } from 'node:fs/promises'
import { basename, dirname } from 'node:path'
import { DecodeAbortedError } from '../domain/errors.ts'
import { getDecoder, resolveFormat } from '../domain/formats/FormatRegistry.ts'
import { checkAborted } from '../domain/formats/payloadSupport.ts'
import type { DecodeOptions, DecodeWarning, FormatProbe, SourceFile } from '../domain/formats/types.ts'
import type { Header, InstrumentFormat, Segment } from '../domain/types/TimeSeries.ts'
import type { FileStamp, SegmentCache } from './SegmentCache.ts'

export const PROBE_BYTES = 4096

export interface DecodedFile {
  path: string
  format: InstrumentFormat
  header: Header
  segments: readonly Segment[]
  warnings: readonly DecodeWarning[]
  missingChannels: readonly string[]
}

export interface LoadOptions {
  signal?: AbortSignal
  maxBytes?: number
  /** Names of the files beside `path`; listed from disk when absent */
  siblings?: readonly string[]
}

export interface DecodeFileOptions extends DecodeOptions {
  cache?: SegmentCache
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError'
}

async function listSiblings(path: string): Promise<string[]> {
  const names = await readdir(dirname(path))
  const own = basename(path)
  return names.filter(name => name !== own).sort()
}

/** First bytes of a file plus the names beside it, for format detection */
export async function probeFile(path: string): Promise<FormatProbe> {
  const handle = await open(path, 'r')
  try {
    const buffer = new Uint8Array(PROBE_BYTES)
    const { bytesRead } = await handle.read(buffer, 0, PROBE_BYTES, 0)
    return { path, siblings: await listSiblings(path), head: buffer.subarray(0, bytesRead) }
  } finally {
    await handle.close()
  }
}

async function readWithin(path: string, budget: { left: number }, options: LoadOptions): Promise<Uint8Array> {
  const { size } = await stat(path)
  if (size > budget.left) {
    throw new DecodeAbortedError(`Read budget of ${options.maxBytes ?? 0} bytes exceeded`, { file: path })
  }
  budget.left -= size
  try {
    const buffer = await readFile(path, { signal: options.signal })
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength)
  } catch (err) {
    if (isAbortError(err)) throw new DecodeAbortedError('Decode aborted', { file: path })
    throw err
  }
}

function companionOf(path: string, format: InstrumentFormat, siblings: readonly string[]): string | undefined {
  return getDecoder(format).sidecarPath?.(path, siblings)
}

/** Read a file and the companion file its format keeps the header in */
export async function loadSource(path: string, format: InstrumentFormat, options: LoadOptions = {}): Promise<SourceFile> {
  checkAborted(options, path)
  const budget = { left: options.maxBytes ?? Number.POSITIVE_INFINITY }
  const bytes = await readWithin(path, budget, options)

  if (!getDecoder(format).sidecarPath) return { path, bytes }
  const siblings = options.siblings ?? await listSiblings(path)
  const sidecar = companionOf(path, format, siblings)
  if (sidecar === undefined) return { path, bytes }
  return { path, bytes, sidecar: { path: sidecar, bytes: await readWithin(sidecar, budget, options) } }
}

async function stampOf(path: string, sidecar: string | undefined): Promise<FileStamp> {
  const { size, mtimeMs } = await stat(path)
  if (sidecar === undefined) return { size, mtimeMs }
  const companion = await stat(sidecar)
  return { size, mtimeMs, sidecar: { path: sidecar, size: companion.size, mtimeMs: companion.mtimeMs } }
}

/**
 * Detect, read and decode one file. The result is only produced once the
 * whole payload decoded; an abort or error leaves nothing behind.
 */
export async function decodeFile(path: string, options: DecodeFileOptions = {}): Promise<DecodedFile> {
  checkAborted(options, path)
  const { cache, ...decodeOptions } = options

  const probe = await probeFile(path)
  const format = resolveFormat(probe, decodeOptions.format)

  const stamp = cache ? await stampOf(path, companionOf(path, format, probe.siblings)) : undefined
  if (cache && stamp) {
    const hit = cache.get(path, stamp, decodeOptions)
    if (hit) return hit
  }

  const source = await loadSource(path, format, {
    signal: decodeOptions.signal,
    maxBytes: decodeOptions.maxBytes,
    siblings: probe.siblings,
  })

  const decoder = getDecoder(format)
  const header = decoder.decodeHeader(source, decodeOptions)
  const payload = decoder.decodePayload(source, header, decodeOptions)
  checkAborted(decodeOptions, path)

  const file: DecodedFile = Object.freeze({
    path,
    format,
    header,
    segments: Object.freeze(payload.segments),
    warnings: Object.freeze(payload.warnings),
    missingChannels: Object.freeze(payload.missingChannels),
  })
  if (cache && stamp) cache.set(path, stamp, decodeOptions, file)
  return file
}
