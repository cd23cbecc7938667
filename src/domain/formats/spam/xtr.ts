/**
 * SPAM .XTR header files: INI-like sections whose keys may repeat
 * (one NAME / CHAN line per channel). Single quotes around values are noise.
 */
import { decodeBytes } from '../../io/ByteStream.ts'
import { MalformedHeaderError } from '../../errors.ts'

export type XtrSections = Map<string, Map<string, string[]>>

export function parseXtr(bytes: Uint8Array, file: string): XtrSections {
  const sections: XtrSections = new Map()
  let current = new Map<string, string[]>()
  sections.set('GLOBAL', current)

  const lines = decodeBytes(bytes).split(/\r?\n/)
  lines.forEach((rawLine, i) => {
    const line = rawLine.replace(/'/g, '').trim()
    if (line === '') return

    if (line.startsWith('[') && line.endsWith(']')) {
      current = new Map()
      sections.set(line.slice(1, -1).trim(), current)
      return
    }

    const eq = line.indexOf('=')
    if (eq < 0) {
      throw new MalformedHeaderError(`Expected key=value, got "${line}"`, { file, line: i + 1 })
    }
    const key = line.slice(0, eq).trim()
    const value = line.slice(eq + 1).trim()
    const values = current.get(key)
    if (values) {
      values.push(value)
    } else {
      current.set(key, [value])
    }
  })

  return sections
}

export function xtrValues(sections: XtrSections, section: string, key: string, file: string): string[] {
  const values = sections.get(section)?.get(key)
  if (!values || values.length === 0) {
    throw new MalformedHeaderError(`Missing [${section}] ${key}`, { file })
  }
  return values
}

export function xtrValue(sections: XtrSections, section: string, key: string, file: string): string {
  return xtrValues(sections, section, key, file)[0]
}
