import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { NoOverlapError } from '../domain/errors'
import { encodeAtsFile } from '../domain/formats/ats/AtsWriter'
import { makeTempDir, q, type TempDir } from '../domain/test-helpers'
import { RootStore } from './RootStore'

const T0 = 1_704_067_200

function ats(channelType: string, start: number, counts: number[]): Uint8Array {
  return encodeAtsFile({ startTime: q(start), sampleRate: q(1), channelType, lsb: 1, counts })
}

describe('IngestStore', () => {
  let dir: TempDir

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    dir = await makeTempDir()
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await dir.remove()
  })

  it('decodes and assembles a batch', async () => {
    const { ingestStore } = new RootStore()
    const paths = [
      await dir.write('a_Hx.ats', ats('Hx', T0, [1, 2, 3, 4])),
      await dir.write('a_Hy.ats', ats('Hy', T0 + 1, [5, 6, 7, 8])),
    ]
    await ingestStore.ingest(paths)

    expect(ingestStore.status).toBe('success')
    expect(ingestStore.progress).toBe(100)
    expect(ingestStore.message).toBe('Loaded 2 channels from 2 files')
    expect(ingestStore.files).toHaveLength(2)
    expect(ingestStore.dataset?.channelNames).toEqual(['Hx', 'Hy'])
    expect(ingestStore.isBusy).toBe(false)
  })

  it('keeps going past a file that fails', async () => {
    const { ingestStore } = new RootStore()
    await ingestStore.ingest([
      await dir.write('a_Hx.ats', ats('Hx', T0, [1, 2, 3, 4])),
      await dir.write('bad.ats', new Uint8Array(10)),
    ])

    expect(ingestStore.status).toBe('success')
    expect(ingestStore.failures.map(f => f.path)).toEqual([`${dir.path}/bad.ats`])
  })

  it('ends in error when no file decodes', async () => {
    const { ingestStore } = new RootStore()
    await ingestStore.ingest([await dir.write('bad.ats', new Uint8Array(10))])

    expect(ingestStore.status).toBe('error')
    expect(ingestStore.error).toBe('No decoded files to build a dataset from')
    expect(ingestStore.dataset).toBeNull()
  })

  it('reports channels without a common span', async () => {
    const paths = [
      await dir.write('a_Hx.ats', ats('Hx', T0, [1, 2])),
      await dir.write('a_Hy.ats', ats('Hy', T0 + 10, [3, 4])),
    ]

    const lenient = new RootStore()
    await lenient.ingestStore.ingest(paths)
    expect(lenient.ingestStore.status).toBe('success')
    expect(lenient.ingestStore.message).toBe('Channels share no common time span')
    expect(lenient.ingestStore.conditions[0]).toBeInstanceOf(NoOverlapError)

    const strict = new RootStore({ noOverlapPolicy: 'error' })
    await strict.ingestStore.ingest(paths)
    expect(strict.ingestStore.status).toBe('error')
    expect(strict.ingestStore.error).toMatch(/no common span/)
  })

  it('can be aborted', async () => {
    const { ingestStore } = new RootStore()
    const path = await dir.write('a_Hx.ats', ats('Hx', T0, [1, 2, 3, 4]))

    const running = ingestStore.ingest([path])
    expect(ingestStore.isBusy).toBe(true)
    ingestStore.abort()
    await running

    expect(ingestStore.status).toBe('error')
    expect(ingestStore.error).toMatch(/aborted/)
  })

  it('resets', async () => {
    const root = new RootStore()
    await root.ingestStore.ingest([await dir.write('a_Hx.ats', ats('Hx', T0, [1, 2]))])
    root.reset()

    expect(root.ingestStore.status).toBe('idle')
    expect(root.ingestStore.dataset).toBeNull()
    expect(root.ingestStore.files).toEqual([])
  })
})
