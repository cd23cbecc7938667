/**
 * The 1024-byte ASCII block at the start of every Lemi B423 / B423E file.
 *
 * Lines look like "%Kmx = 2.44e-3" for scaling constants and
 * "%Lat 5130.1234,N" for location.
 */
import { decodeBytes } from '../../io/ByteStream.ts'

export const LEMI_HEADER_LENGTH = 1024

export interface LemiAsciiHeader {
  constants: Record<string, number>
  location: Partial<Record<'Lat' | 'Lon' | 'Alt', number>>
  /** Key/value lines whose value is not numeric */
  text: Record<string, string>
}

export function parseLemiAsciiHeader(bytes: Uint8Array): LemiAsciiHeader {
  const raw = decodeBytes(bytes, 0, Math.min(bytes.length, LEMI_HEADER_LENGTH)).replace(/\0+$/, '')
  const constants: Record<string, number> = {}
  const location: LemiAsciiHeader['location'] = {}
  const text: Record<string, string> = {}

  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.replace(/%/g, '').trim()
    if (line === '') continue

    const eq = line.indexOf('=')
    if (eq >= 0) {
      const key = line.slice(0, eq).trim()
      const value = line.slice(eq + 1).trim()
      const num = Number(value)
      if (value !== '' && Number.isFinite(num)) {
        constants[key] = num
      } else {
        text[key] = value
      }
      continue
    }

    const loc = line.match(/^(Lat|Lon|Alt)\s*([+-]?[\d.]+)/)
    if (loc) {
      const key = loc[1]
      if (key === 'Lat' || key === 'Lon' || key === 'Alt') {
        location[key] = Number(loc[2])
      }
    }
  }

  return { constants, location, text }
}

/** Header text tells the variants apart by their scaling constants */
export function lemiVariant(head: Uint8Array): 'lemi-b423' | 'lemi-b423e' | undefined {
  if (head.length === 0 || head[0] !== 0x25) return undefined // '%'
  const { constants } = parseLemiAsciiHeader(head)
  const magnetic = 'Kmx' in constants
  const fourElectric = 'Ke3' in constants && 'Ke4' in constants
  if (magnetic && !fourElectric) return 'lemi-b423'
  if (fourElectric && !magnetic) return 'lemi-b423e'
  return undefined
}
