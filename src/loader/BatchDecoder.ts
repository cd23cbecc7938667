import { assembleSegments, type BuildOptions } from '../domain/engine/ChannelAssembler.ts'
import type { Dataset } from '../domain/engine/Dataset.ts'
import { DecodeAbortedError, InvalidInputError } from '../domain/errors.ts'
import { decodeFile, type DecodeFileOptions, type DecodedFile } from './FileLoader.ts'

export interface FileFailure {
  path: string
  error: Error
}

export interface BatchProgress {
  done: number
  total: number
  path: string
}

export interface BatchOptions extends DecodeFileOptions {
  /** Files decoded at once; default 4 */
  concurrency?: number
  onProgress?: (progress: BatchProgress) => void
}

export interface BatchResult {
  /** Successfully decoded files, in input order */
  files: DecodedFile[]
  failures: FileFailure[]
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/**
 * Decode many files with at most `concurrency` in flight. A file that fails
 * is recorded and its siblings carry on; an abort stops the whole batch.
 */
export async function decodeBatch(paths: readonly string[], options: BatchOptions = {}): Promise<BatchResult> {
  const { concurrency = 4, onProgress, ...decodeOptions } = options
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidInputError(`Concurrency must be a positive integer, got ${concurrency}`)
  }

  const results: (DecodedFile | undefined)[] = new Array(paths.length)
  const failures: { index: number; failure: FileFailure }[] = []
  let next = 0
  let done = 0

  const worker = async (): Promise<void> => {
    while (next < paths.length && !decodeOptions.signal?.aborted) {
      const index = next++
      const path = paths[index]
      try {
        const file = await decodeFile(path, decodeOptions)
        for (const warning of file.warnings) {
          console.warn(`${path}: ${warning.message}`)
        }
        results[index] = file
      } catch (err) {
        const error = toError(err)
        if (!(error instanceof DecodeAbortedError && decodeOptions.signal?.aborted)) {
          console.error(`Failed to decode ${path}:`, error.message)
          failures.push({ index, failure: { path, error } })
        }
      }
      done++
      onProgress?.({ done, total: paths.length, path })
    }
  }

  await Promise.all(Array.from({ length: Math.min(concurrency, paths.length) }, () => worker()))

  if (decodeOptions.signal?.aborted) {
    throw new DecodeAbortedError(`Batch aborted after ${done} of ${paths.length} files`)
  }

  return {
    files: results.filter((f): f is DecodedFile => f !== undefined),
    failures: failures.sort((a, b) => a.index - b.index).map(f => f.failure),
  }
}

/** Reconcile every channel found in the files and assemble them */
export function buildDataset(files: readonly DecodedFile[], options: BuildOptions = {}): Dataset {
  if (files.length === 0) {
    throw new InvalidInputError('No decoded files to build a dataset from')
  }
  return assembleSegments(files.flatMap(f => f.segments), options)
}

export interface ReadDatasetOptions extends BatchOptions, BuildOptions {}

export interface ReadDatasetResult extends BatchResult {
  dataset: Dataset
}

/** Decode, reconcile and assemble in one call */
export async function readDataset(paths: readonly string[], options: ReadDatasetOptions = {}): Promise<ReadDatasetResult> {
  const { files, failures } = await decodeBatch(paths, options)
  return { dataset: buildDataset(files, options), files, failures }
}
