// Big-endian reader with bounds checking
// Every read past the end throws TruncatedBuffer labelled with the owning table

import { truncated, type FontErrorDetails } from './errors'

export class ByteCursor {
  private readonly u8: Uint8Array
  private pos: number = 0
  readonly label: string
  private readonly details: FontErrorDetails

  constructor(data: Uint8Array, label: string, details: FontErrorDetails = {}) {
    this.u8 = data
    this.label = label
    this.details = details
  }

  get offset(): number {
    return this.pos
  }

  get length(): number {
    return this.u8.byteLength
  }

  get remaining(): number {
    return this.u8.byteLength - this.pos
  }

  private require(n: number): number {
    if (n < 0 || this.pos + n > this.u8.byteLength) {
      throw truncated(this.label, this.details)
    }
    const idx = this.pos
    this.pos = idx + n
    return idx
  }

  skip(n: number): void {
    this.require(n)
  }

  seek(offset: number): void {
    if (offset > this.u8.byteLength || offset < 0) {
      throw truncated(this.label, this.details)
    }
    this.pos = offset
  }

  readU8(): number {
    return this.u8[this.require(1)]
  }

  readS8(): number {
    const val = this.readU8()
    return (val & 0x80) !== 0 ? val - 0x100 : val
  }

  readU16(): number {
    const idx = this.require(2)
    return (this.u8[idx] << 8) | this.u8[idx + 1]
  }

  readS16(): number {
    const val = this.readU16()
    return (val & 0x8000) !== 0 ? val - 0x10000 : val
  }

  readU32(): number {
    const idx = this.require(4)
    return (
      (this.u8[idx] * 0x1000000 +
        ((this.u8[idx + 1] << 16) | (this.u8[idx + 2] << 8) | this.u8[idx + 3])) >>>
      0
    )
  }

  // 2.14 signed fixed point
  readF2Dot14(): number {
    return this.readS16() / 16384
  }

  readBytes(n: number): Uint8Array {
    const idx = this.require(n)
    return this.u8.subarray(idx, idx + n)
  }

  // Independent cursor over a sub-range, positioned at its start
  slice(offset: number, length: number, label: string = this.label): ByteCursor {
    if (offset < 0 || length < 0 || offset + length > this.u8.byteLength) {
      throw truncated(label, this.details)
    }
    return new ByteCursor(this.u8.subarray(offset, offset + length), label, this.details)
  }
}
