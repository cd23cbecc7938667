import { ByteWriter } from '../../io/ByteWriter.ts'
import { InvalidInputError } from '../../errors.ts'
import type { Rational } from '../../time/Rational.ts'
import type { Instant } from '../../time/instant.ts'
import { ATS_HEADER_LENGTH } from './AtsDecoder.ts'

export interface AtsFileInput {
  startTime: Instant
  sampleRate: Rational
  /** "Ex", "Ey", "Hx", ... */
  channelType: string
  lsb: number
  counts: ArrayLike<number>
  /** Defaults to counts.length */
  nSamples?: number
  version?: number
  sensor?: string
  sensorSerial?: number
  aduSerial?: number
  /** Electrode positions in metres */
  positions?: Partial<Record<'x1' | 'y1' | 'z1' | 'x2' | 'y2' | 'z2', number>>
  dipoleLength?: number
}

export function encodeAtsFile(input: AtsFileInput): Uint8Array {
  if (!input.startTime.isInteger()) {
    throw new InvalidInputError(`ATS start times are whole seconds, got ${input.startTime}`)
  }
  const pos = input.positions ?? {}
  const w = new ByteWriter(ATS_HEADER_LENGTH + input.counts.length * 4)

  w.writeUint16(ATS_HEADER_LENGTH)
    .writeInt16(input.version ?? 80)
    .writeUint32(input.nSamples ?? input.counts.length)
    .writeFloat32(input.sampleRate.toNumber())
    .writeInt32(Number(input.startTime.num))
    .writeFloat64(input.lsb)
    .writeInt32(0)
    .writeFloat32(input.sampleRate.toNumber())
    .writeUint16(input.aduSerial ?? 0)
    .writeUint16(0)
    .writeUint8(0)
    .writeUint8(0)
    .writeAscii(input.channelType, 2)
    .writeAscii(input.sensor ?? '', 6)
    .writeInt16(input.sensorSerial ?? 0)
    .writeFloat32(pos.x1 ?? 0)
    .writeFloat32(pos.y1 ?? 0)
    .writeFloat32(pos.z1 ?? 0)
    .writeFloat32(pos.x2 ?? 0)
    .writeFloat32(pos.y2 ?? 0)
    .writeFloat32(pos.z2 ?? 0)
    .writeFloat32(input.dipoleLength ?? 0)
    .writeFloat32(0)
    .padTo(ATS_HEADER_LENGTH)

  for (let i = 0; i < input.counts.length; i++) {
    w.writeInt32(input.counts[i])
  }
  return w.toBytes()
}
