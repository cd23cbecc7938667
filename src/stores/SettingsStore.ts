import { readFile, writeFile } from 'node:fs/promises'
import { makeAutoObservable, observable, runInAction } from 'mobx'
import { z } from 'zod'
import type { AssembleOptions } from '../domain/engine/ChannelAssembler'
import type { ReconcileOptions } from '../domain/engine/ContinuityReconciler'
import { InvalidInputError } from '../domain/errors'
import type { DecodeOptions } from '../domain/formats/types'
import { Rational } from '../domain/time/Rational'

export const readerSettingsSchema = z
  .object({
    /** Join tolerance, as a fraction of a sample period */
    tolerance: z.number().min(0).lt(1).default(0.5),
    overlapPolicy: z.enum(['error', 'truncate']).default('error'),
    rateChangePolicy: z.enum(['record', 'error']).default('record'),
    truncatedPayload: z.enum(['accept', 'reject']).default('accept'),
    noOverlapPolicy: z.enum(['empty', 'error']).default('empty'),
    concurrency: z.number().int().min(1).max(64).default(4),
    /** Per-file read budget in bytes */
    maxBytes: z.number().int().positive().nullable().default(null),
    /** Rate for formats that do not record one, e.g. "128" or "1/10" */
    sampleRate: z
      .string()
      .refine(text => Rational.parse(text)?.isPositive() ?? false, 'must be a positive number or fraction')
      .nullable()
      .default(null),
    magneticGain: z.number().positive().nullable().default(null),
    channelMap: z.record(z.string().min(1)).default({}),
    dipoleLengths: z
      .object({
        Ex: z.number().positive().optional(),
        Ey: z.number().positive().optional(),
      })
      .strict()
      .default({}),
  })
  .strict()

export type ReaderSettings = z.infer<typeof readerSettingsSchema>
export type ReaderSettingsInput = z.input<typeof readerSettingsSchema>

export function parseSettings(input: unknown): ReaderSettings {
  const result = readerSettingsSchema.safeParse(input)
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new InvalidInputError(`Invalid reader settings: ${problems.join('; ')}`)
  }
  return result.data
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Reader settings, validated as a whole on every change and turned into the
 * option records the decoders and engine take.
 */
export class SettingsStore {
  settings: ReaderSettings

  constructor(initial: ReaderSettingsInput = {}) {
    this.settings = parseSettings(initial)
    makeAutoObservable(this, { settings: observable.ref })
  }

  get concurrency(): number {
    return this.settings.concurrency
  }

  get reconcileOptions(): ReconcileOptions {
    const { tolerance, overlapPolicy, rateChangePolicy } = this.settings
    return { tolerance, overlapPolicy, rateChangePolicy }
  }

  get assembleOptions(): AssembleOptions {
    return { noOverlapPolicy: this.settings.noOverlapPolicy }
  }

  get decodeOptions(): DecodeOptions {
    const s = this.settings
    const options: DecodeOptions = { truncatedPayload: s.truncatedPayload }
    if (s.maxBytes !== null) options.maxBytes = s.maxBytes
    if (s.magneticGain !== null) options.magneticGain = s.magneticGain
    if (s.sampleRate !== null) options.sampleRate = Rational.parse(s.sampleRate) ?? undefined
    if (Object.keys(s.channelMap).length > 0) options.channelMap = s.channelMap
    if (s.dipoleLengths.Ex !== undefined || s.dipoleLengths.Ey !== undefined) options.dipoleLengths = s.dipoleLengths
    return options
  }

  /** Apply a partial change; nothing changes if the result is invalid */
  update(patch: ReaderSettingsInput): void {
    this.settings = parseSettings({ ...this.settings, ...patch })
  }

  reset(): void {
    this.settings = parseSettings({})
  }

  /** Load from a JSON file; a missing file leaves the defaults */
  async load(path: string): Promise<void> {
    let text: string
    try {
      text = await readFile(path, 'utf-8')
    } catch (err) {
      if (isMissingFile(err)) return
      throw err
    }
    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      throw new InvalidInputError(`Settings file is not JSON: ${err instanceof Error ? err.message : String(err)}`, { file: path })
    }
    const settings = parseSettings(raw)
    runInAction(() => {
      this.settings = settings
    })
  }

  async save(path: string): Promise<void> {
    await writeFile(path, JSON.stringify(this.settings, null, 2) + '\n', 'utf-8')
  }
}
