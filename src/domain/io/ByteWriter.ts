/**
 * Growable byte buffer, the write-side counterpart of ByteStream.
 * Used by the format writers.
 */
export class ByteWriter {
  private buffer: Uint8Array
  private view: DataView
  private _length = 0
  littleEndian: boolean

  constructor(initialCapacity = 1024, littleEndian = true) {
    this.buffer = new Uint8Array(Math.max(16, initialCapacity))
    this.view = new DataView(this.buffer.buffer)
    this.littleEndian = littleEndian
  }

  get length(): number {
    return this._length
  }

  private reserve(n: number): number {
    const needed = this._length + n
    if (needed > this.buffer.length) {
      let capacity = this.buffer.length * 2
      while (capacity < needed) capacity *= 2
      const next = new Uint8Array(capacity)
      next.set(this.buffer.subarray(0, this._length))
      this.buffer = next
      this.view = new DataView(next.buffer)
    }
    const at = this._length
    this._length = needed
    return at
  }

  writeUint8(v: number): this {
    this.view.setUint8(this.reserve(1), v)
    return this
  }

  writeUint16(v: number): this {
    this.view.setUint16(this.reserve(2), v, this.littleEndian)
    return this
  }

  writeInt16(v: number): this {
    this.view.setInt16(this.reserve(2), v, this.littleEndian)
    return this
  }

  writeInt24(v: number): this {
    const at = this.reserve(3)
    const u = v < 0 ? v + 0x1000000 : v
    const bytes = [u & 0xFF, (u >> 8) & 0xFF, (u >> 16) & 0xFF]
    if (!this.littleEndian) bytes.reverse()
    this.buffer.set(bytes, at)
    return this
  }

  writeUint32(v: number): this {
    this.view.setUint32(this.reserve(4), v, this.littleEndian)
    return this
  }

  writeInt32(v: number): this {
    this.view.setInt32(this.reserve(4), v, this.littleEndian)
    return this
  }

  writeFloat32(v: number): this {
    this.view.setFloat32(this.reserve(4), v, this.littleEndian)
    return this
  }

  writeFloat64(v: number): this {
    this.view.setFloat64(this.reserve(8), v, this.littleEndian)
    return this
  }

  /** Latin1 text padded with NUL (or `pad`) to exactly n bytes */
  writeAscii(text: string, n?: number, pad = 0): this {
    const width = n ?? text.length
    const at = this.reserve(width)
    for (let i = 0; i < width; i++) {
      this.buffer[at + i] = i < text.length ? text.charCodeAt(i) & 0xFF : pad
    }
    return this
  }

  /** Pad with `fill` up to an absolute length */
  padTo(length: number, fill = 0): this {
    if (length > this._length) {
      const at = this.reserve(length - this._length)
      this.buffer.fill(fill, at, this._length)
    }
    return this
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, this._length)
  }
}
