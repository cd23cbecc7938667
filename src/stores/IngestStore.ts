import { makeAutoObservable, observable, runInAction } from 'mobx'
import type { Dataset } from '../domain/engine/Dataset'
import type { ReaderError } from '../domain/errors'
import { buildDataset, decodeBatch, type FileFailure } from '../loader/BatchDecoder'
import type { DecodedFile } from '../loader/FileLoader'
import { SegmentCache } from '../loader/SegmentCache'
import type { SettingsStore } from './SettingsStore'

export type IngestStatus = 'idle' | 'decoding' | 'assembling' | 'success' | 'error'

/** Share of the progress bar given to decoding; assembly takes the rest */
const DECODE_SHARE = 90

/**
 * Store for a batch of recorder files turned into one Dataset
 */
export class IngestStore {
  status: IngestStatus = 'idle'
  progress: number = 0
  message: string = ''
  error: string | null = null
  files: DecodedFile[] = []
  failures: FileFailure[] = []
  dataset: Dataset | null = null

  private settings: SettingsStore
  private cache = new SegmentCache()
  private controller: AbortController | null = null
  private generation = 0

  constructor(settings: SettingsStore) {
    this.settings = settings
    makeAutoObservable<this, 'settings' | 'cache' | 'controller' | 'generation'>(this, {
      // Replaced wholesale; sample arrays are never made observable
      files: observable.ref,
      failures: observable.ref,
      dataset: observable.ref,
      settings: false,
      cache: false,
      controller: false,
      generation: false,
    })
  }

  get isBusy(): boolean {
    return this.status === 'decoding' || this.status === 'assembling'
  }

  get conditions(): readonly ReaderError[] {
    return this.dataset?.conditions ?? []
  }

  ingest = async (paths: readonly string[]): Promise<void> => {
    this.controller?.abort()
    const controller = new AbortController()
    this.controller = controller
    const generation = ++this.generation

    this.status = 'decoding'
    this.progress = 0
    this.message = `Decoding ${paths.length} files...`
    this.error = null
    this.files = []
    this.failures = []
    this.dataset = null

    try {
      const { files, failures } = await decodeBatch(paths, {
        ...this.settings.decodeOptions,
        concurrency: this.settings.concurrency,
        signal: controller.signal,
        cache: this.cache,
        onProgress: ({ done, total }) => {
          if (generation !== this.generation) return
          runInAction(() => {
            this.progress = Math.round((done / total) * DECODE_SHARE)
            this.message = `Decoded ${done} of ${total} files`
          })
        },
      })
      if (generation !== this.generation) return

      runInAction(() => {
        this.status = 'assembling'
        this.files = files
        this.failures = failures
        this.message = 'Reconciling channels...'
      })

      const dataset = buildDataset(files, {
        ...this.settings.reconcileOptions,
        ...this.settings.assembleOptions,
      })

      runInAction(() => {
        this.dataset = dataset
        this.status = 'success'
        this.progress = 100
        this.message = dataset.isEmpty
          ? 'Channels share no common time span'
          : `Loaded ${dataset.channelNames.length} channels from ${files.length} files`
      })
    } catch (error) {
      if (generation !== this.generation) return
      console.error('Ingest failed:', error)
      const message = error instanceof Error ? error.message : 'Ingest failed'
      runInAction(() => {
        this.status = 'error'
        this.error = message
        this.message = message
      })
    } finally {
      if (this.controller === controller) this.controller = null
    }
  }

  abort = (): void => {
    this.controller?.abort()
  }

  reset = (): void => {
    this.generation++
    this.controller?.abort()
    this.controller = null
    this.cache.clear()
    this.status = 'idle'
    this.progress = 0
    this.message = ''
    this.error = null
    this.files = []
    this.failures = []
    this.dataset = null
  }
}
