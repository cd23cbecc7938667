import { basename, dirname, extname, join } from 'node:path'

/** Upper-case extension with the dot, e.g. ".TS3" */
export function extensionOf(path: string): string {
  return extname(path).toUpperCase()
}

/** File name without extension, case preserved */
export function stemOf(path: string): string {
  const name = basename(path)
  const ext = extname(name)
  return ext ? name.slice(0, -ext.length) : name
}

/**
 * Sibling with the same stem and the given extension (case-insensitive),
 * returned as a full path.
 */
export function findCompanion(path: string, siblings: readonly string[], extension: string): string | undefined {
  const stem = stemOf(path).toUpperCase()
  const match = siblings.find(
    name => stemOf(name).toUpperCase() === stem && extensionOf(name) === extension,
  )
  return match === undefined ? undefined : join(dirname(path), match)
}

/** Any sibling with the extension, when exactly one exists */
export function findSingle(path: string, siblings: readonly string[], extension: string): string | undefined {
  const matches = siblings.filter(name => extensionOf(name) === extension)
  return matches.length === 1 ? join(dirname(path), matches[0]) : undefined
}
