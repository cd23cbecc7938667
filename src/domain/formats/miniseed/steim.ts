/**
 * Steim-1 and Steim-2 compression.
 *
 * Data is a run of 64-byte frames of sixteen 32-bit words. Word 0 of each
 * frame packs sixteen 2-bit codes describing the words. In the first frame,
 * words 1 and 2 are the forward (first sample) and reverse (last sample)
 * integration constants. Every other word holds first differences.
 */

export type SteimLevel = 1 | 2

export const FRAME_BYTES = 64
const WORDS_PER_FRAME = 16

function signExtend(value: number, bits: number): number {
  const shift = 32 - bits
  return (value << shift) >> shift
}

function unpack(word: number, count: number, bits: number, out: number[]): void {
  const mask = bits === 32 ? 0xFFFFFFFF : (1 << bits) - 1
  for (let i = count - 1; i >= 0; i--) {
    out.push(signExtend((word >>> (i * bits)) & mask, bits))
  }
}

function unpackWord(level: SteimLevel, code: number, word: number, out: number[]): void {
  if (code === 0) return
  if (code === 1) {
    unpack(word, 4, 8, out)
    return
  }
  if (level === 1) {
    if (code === 2) unpack(word, 2, 16, out)
    else out.push(word | 0)
    return
  }

  const dnib = word >>> 30
  if (code === 2) {
    if (dnib === 1) unpack(word, 1, 30, out)
    else if (dnib === 2) unpack(word, 2, 15, out)
    else if (dnib === 3) unpack(word, 3, 10, out)
    else throw new RangeError(`Steim-2: invalid sub-code ${dnib} for code 2`)
    return
  }
  if (dnib === 0) unpack(word, 5, 6, out)
  else if (dnib === 1) unpack(word, 6, 5, out)
  else if (dnib === 2) unpack(word, 7, 4, out)
  else throw new RangeError(`Steim-2: invalid sub-code ${dnib} for code 3`)
}

export interface SteimResult {
  samples: Int32Array
  /** Reverse integration constant; equals the last sample in a sound record */
  reverseConstant: number
}

/**
 * Decode `count` samples from a frame area. `readWord(i)` returns 32-bit word
 * i in the record's byte order.
 */
export function decodeSteim(
  level: SteimLevel,
  readWord: (index: number) => number,
  nFrames: number,
  count: number,
): SteimResult {
  const diffs: number[] = []
  let forward = 0
  let reverse = 0

  for (let f = 0; f < nFrames && diffs.length < count; f++) {
    const base = f * WORDS_PER_FRAME
    const control = readWord(base) >>> 0
    for (let w = 1; w < WORDS_PER_FRAME; w++) {
      const code = (control >>> (30 - 2 * w)) & 0x3
      const word = readWord(base + w)
      if (f === 0 && w === 1) {
        forward = word | 0
        continue
      }
      if (f === 0 && w === 2) {
        reverse = word | 0
        continue
      }
      unpackWord(level, code, word, diffs)
    }
  }

  const samples = new Int32Array(count)
  if (count === 0) return { samples, reverseConstant: reverse }
  if (diffs.length < count) {
    throw new RangeError(`Steim-${level}: frames hold ${diffs.length} differences, need ${count}`)
  }
  samples[0] = forward
  for (let i = 1; i < count; i++) {
    samples[i] = samples[i - 1] + diffs[i]
  }
  return { samples, reverseConstant: reverse }
}

interface Packing {
  code: number
  dnib: number
  count: number
  bits: number
}

const STEIM1_PACKINGS: readonly Packing[] = [
  { code: 1, dnib: -1, count: 4, bits: 8 },
  { code: 2, dnib: -1, count: 2, bits: 16 },
  { code: 3, dnib: -1, count: 1, bits: 32 },
]

const STEIM2_PACKINGS: readonly Packing[] = [
  { code: 3, dnib: 2, count: 7, bits: 4 },
  { code: 3, dnib: 1, count: 6, bits: 5 },
  { code: 3, dnib: 0, count: 5, bits: 6 },
  { code: 1, dnib: -1, count: 4, bits: 8 },
  { code: 2, dnib: 3, count: 3, bits: 10 },
  { code: 2, dnib: 2, count: 2, bits: 15 },
  { code: 2, dnib: 1, count: 1, bits: 30 },
]

function fits(value: number, bits: number): boolean {
  if (bits >= 32) return value >= -0x80000000 && value <= 0x7FFFFFFF
  const limit = 2 ** (bits - 1)
  return value >= -limit && value < limit
}

export interface SteimEncoding {
  /** Frame words in order, a multiple of 16 */
  words: number[]
  /** Samples the frames hold */
  count: number
}

/**
 * Pack as many of `samples[start..]` as fit in `maxFrames` frames.
 * `previous` is the sample before `start`, for the first difference.
 */
export function encodeSteim(
  level: SteimLevel,
  samples: ArrayLike<number>,
  start: number,
  maxFrames: number,
  previous = 0,
): SteimEncoding {
  const packings = level === 1 ? STEIM1_PACKINGS : STEIM2_PACKINGS
  const diffAt = (i: number) => samples[i] - (i === start ? previous : samples[i - 1])
  const words: number[] = []
  let next = start

  for (let f = 0; f < maxFrames && next < samples.length; f++) {
    const frame = new Array<number>(WORDS_PER_FRAME).fill(0)
    let control = 0
    for (let w = f === 0 ? 3 : 1; w < WORDS_PER_FRAME && next < samples.length; w++) {
      const remaining = samples.length - next
      const packing = packings.find(p => {
        if (p.count > remaining) return false
        for (let k = 0; k < p.count; k++) {
          if (!fits(diffAt(next + k), p.bits)) return false
        }
        return true
      })
      if (!packing) {
        throw new RangeError(`Steim-${level}: difference at sample ${next} out of range`)
      }
      let word = packing.dnib >= 0 ? packing.dnib << 30 : 0
      const mask = packing.bits === 32 ? 0xFFFFFFFF : (1 << packing.bits) - 1
      for (let k = 0; k < packing.count; k++) {
        const shift = (packing.count - 1 - k) * packing.bits
        word |= (diffAt(next + k) & mask) << shift
      }
      frame[w] = word | 0
      control |= packing.code << (30 - 2 * w)
      next += packing.count
    }
    frame[0] = control | 0
    words.push(...frame)
  }

  const count = next - start
  if (words.length > 0 && count > 0) {
    words[1] = samples[start] | 0
    words[2] = samples[next - 1] | 0
  }
  return { words, count }
}
