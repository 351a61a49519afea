// Write buffer with auto-growing capacity

export class WriteBuffer {
  private data: Uint8Array
  private view: DataView
  private pos: number = 0

  constructor(initialSize: number = 1024) {
    this.data = new Uint8Array(Math.max(initialSize, 16))
    this.view = new DataView(this.data.buffer)
  }

  private ensureCapacity(needed: number): void {
    if (this.pos + needed <= this.data.byteLength) return

    // Grow by 2x (amortized O(1) appends)
    const newSize = Math.max(this.data.byteLength * 2, this.pos + needed)
    const newData = new Uint8Array(newSize)
    newData.set(this.data)
    this.data = newData
    this.view = new DataView(newData.buffer)
  }

  writeU8(value: number): void {
    this.ensureCapacity(1)
    this.data[this.pos++] = value
  }

  writeU16(value: number): void {
    this.ensureCapacity(2)
    this.view.setUint16(this.pos, value)
    this.pos += 2
  }

  writeS16(value: number): void {
    this.ensureCapacity(2)
    this.view.setInt16(this.pos, value)
    this.pos += 2
  }

  writeU32(value: number): void {
    this.ensureCapacity(4)
    this.view.setUint32(this.pos, value)
    this.pos += 4
  }

  writeBytes(src: Uint8Array): void {
    this.ensureCapacity(src.byteLength)
    this.data.set(src, this.pos)
    this.pos += src.byteLength
  }

  // Zero-fill up to the next 4-byte boundary
  pad4(): void {
    while ((this.pos & 3) !== 0) {
      this.writeU8(0)
    }
  }

  getBytes(): Uint8Array {
    return this.data.subarray(0, this.pos)
  }

  get offset(): number {
    return this.pos
  }

  // Direct write at a specific position (for backpatching)
  setU32(offset: number, value: number): void {
    this.view.setUint32(offset, value)
  }
}
