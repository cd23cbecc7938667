/**
 * Byte-level cursor over a Uint8Array.
 * Sequential reads of fixed-width integers, floats and ASCII fields in either
 * byte order.
 */
export class ByteStream {
  private data: Uint8Array
  private view: DataView
  private _offset: number
  private _end: number
  littleEndian: boolean

  constructor(data: Uint8Array, offset = 0, end?: number, littleEndian = true) {
    this.data = data
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength)
    this._offset = offset
    this._end = end ?? data.length
    this.littleEndian = littleEndian
  }

  get offset(): number {
    return this._offset
  }

  set offset(v: number) {
    this._offset = v
  }

  get remaining(): number {
    return this._end - this._offset
  }

  private take(n: number): number {
    if (this._offset + n > this._end) {
      throw new RangeError(`ByteStream: read of ${n} bytes past end at offset ${this._offset}`)
    }
    const at = this._offset
    this._offset += n
    return at
  }

  readUint8(): number {
    return this.view.getUint8(this.take(1))
  }

  readUint16(): number {
    return this.view.getUint16(this.take(2), this.littleEndian)
  }

  readInt16(): number {
    return this.view.getInt16(this.take(2), this.littleEndian)
  }

  /** 24-bit two's complement */
  readInt24(): number {
    const at = this.take(3)
    const b0 = this.data[at]
    const b1 = this.data[at + 1]
    const b2 = this.data[at + 2]
    const value = this.littleEndian
      ? b0 | (b1 << 8) | (b2 << 16)
      : (b0 << 16) | (b1 << 8) | b2
    return (value & 0x800000) ? value - 0x1000000 : value
  }

  readUint32(): number {
    return this.view.getUint32(this.take(4), this.littleEndian)
  }

  readInt32(): number {
    return this.view.getInt32(this.take(4), this.littleEndian)
  }

  readFloat32(): number {
    return this.view.getFloat32(this.take(4), this.littleEndian)
  }

  readFloat64(): number {
    return this.view.getFloat64(this.take(8), this.littleEndian)
  }

  /**
   * Read a fixed-width latin1 field, dropping NUL padding and surrounding spaces.
   */
  readAscii(n: number): string {
    const at = this.take(n)
    return decodeBytes(this.data, at, at + n).replace(/\0.*$/s, '').trim()
  }

  /**
   * Skip n bytes.
   */
  skip(n: number): void {
    this._offset = Math.min(this._offset + n, this._end)
  }
}

/**
 * Decode a byte range as ASCII/latin1 string.
 */
export function decodeBytes(data: Uint8Array, start = 0, end = data.length): string {
  let s = ''
  for (let i = start; i < end; i++) {
    s += String.fromCharCode(data[i])
  }
  return s
}
