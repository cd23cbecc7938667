/**
 * Phoenix MTU .TBL files: a flat run of 25-byte entries, each a NUL-padded
 * 4-byte name, 8 unused bytes, then a value of up to 13 bytes whose type
 * depends on the name.
 */
import { ByteStream } from '../../io/ByteStream.ts'
import { ByteWriter } from '../../io/ByteWriter.ts'
import { InvalidInputError } from '../../errors.ts'
import entryDefinitions from './tableEntries.json'

export const TABLE_ENTRY_SIZE = 25
export const TABLE_NAME_SIZE = 4
export const TABLE_VALUE_OFFSET = 12
export const TABLE_VALUE_SIZE = 13

export type TableValueType = 'int32' | 'float64' | 'string'
export type TableValue = string | number

function isValueType(value: string): value is TableValueType {
  return value === 'int32' || value === 'float64' || value === 'string'
}

const ENTRY_TYPES: ReadonlyMap<string, TableValueType> = new Map(
  Object.entries(entryDefinitions).flatMap(([name, def]): [string, TableValueType][] =>
    isValueType(def.type) ? [[name, def.type]] : [],
  ),
)

export function tableEntryType(name: string): TableValueType | undefined {
  return ENTRY_TYPES.get(name)
}

export interface PhoenixTable {
  entries: Map<string, TableValue>
  /** Names present in the file that have no known type */
  unknown: string[]
}

export function parsePhoenixTable(bytes: Uint8Array): PhoenixTable {
  const entries = new Map<string, TableValue>()
  const unknown: string[] = []
  const count = Math.floor(bytes.length / TABLE_ENTRY_SIZE)

  for (let i = 0; i < count; i++) {
    const base = i * TABLE_ENTRY_SIZE
    const stream = new ByteStream(bytes, base, base + TABLE_ENTRY_SIZE)
    const name = stream.readAscii(TABLE_NAME_SIZE)
    const type = tableEntryType(name)
    if (!type) {
      if (name !== '') unknown.push(name)
      continue
    }
    stream.offset = base + TABLE_VALUE_OFFSET
    switch (type) {
      case 'int32':
        entries.set(name, stream.readInt32())
        break
      case 'float64':
        entries.set(name, stream.readFloat64())
        break
      case 'string':
        entries.set(name, stream.readAscii(TABLE_VALUE_SIZE))
        break
    }
  }

  return { entries, unknown }
}

export function encodePhoenixTable(entries: Readonly<Record<string, TableValue>>): Uint8Array {
  const names = Object.keys(entries)
  const w = new ByteWriter(names.length * TABLE_ENTRY_SIZE)

  for (const name of names) {
    const type = tableEntryType(name)
    const value = entries[name]
    if (!type) {
      throw new InvalidInputError(`Unknown table entry ${name}`)
    }
    const start = w.length
    w.writeAscii(name, TABLE_NAME_SIZE).padTo(start + TABLE_VALUE_OFFSET)
    if (type === 'string') {
      w.writeAscii(String(value), TABLE_VALUE_SIZE)
    } else if (typeof value !== 'number') {
      throw new InvalidInputError(`Table entry ${name} needs a number`)
    } else if (type === 'int32') {
      w.writeInt32(value)
    } else {
      w.writeFloat64(value)
    }
    w.padTo(start + TABLE_ENTRY_SIZE)
  }
  return w.toBytes()
}
