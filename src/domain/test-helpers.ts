import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Rational } from './time/Rational'
import type { Instant } from './time/instant'
import type { Segment } from './types/TimeSeries'
import { createSegment } from './types/segment'
import type { FormatProbe, SourceFile } from './formats/types'

export function q(num: number | bigint, den: number | bigint = 1): Rational {
  return Rational.of(num, den)
}

export function source(path: string, bytes: Uint8Array, sidecar?: SourceFile['sidecar']): SourceFile {
  return sidecar ? { path, bytes, sidecar } : { path, bytes }
}

export function probe(path: string, head: Uint8Array, siblings: readonly string[] = []): FormatProbe {
  return { path, siblings, head: head.subarray(0, 4096) }
}

/** Segment with values 0..n-1 (or the given values) */
export function makeSegment(
  channel: string,
  start: Instant | number,
  rate: Rational | number,
  values: number | readonly number[],
  file = 'test.dat',
): Segment {
  const samples = typeof values === 'number'
    ? Float64Array.from({ length: values }, (_, i) => i)
    : Float64Array.from(values)
  return createSegment(
    channel,
    typeof start === 'number' ? Rational.fromNumber(start) : start,
    typeof rate === 'number' ? Rational.fromNumber(rate) : rate,
    samples,
    [file],
  )
}

export interface TempDir {
  path: string
  write(name: string, bytes: Uint8Array): Promise<string>
  remove(): Promise<void>
}

export async function makeTempDir(): Promise<TempDir> {
  const path = await mkdtemp(join(tmpdir(), 'em-readers-'))
  return {
    path,
    async write(name, bytes) {
      const file = join(path, name)
      await writeFile(file, bytes)
      return file
    },
    remove: () => rm(path, { recursive: true, force: true }),
  }
}
