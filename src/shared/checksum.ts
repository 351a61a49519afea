// SFNT table checksum computation

export function computeChecksum(data: Uint8Array, offset: number = 0, length: number = data.byteLength - offset): number {
  let sum = 0
  const end = offset + length
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)

  // Process 4-byte aligned words
  const alignedEnd = offset + (length & ~3)
  for (let i = offset; i < alignedEnd; i += 4) {
    sum = (sum + view.getUint32(i)) >>> 0
  }

  // Remaining 1-3 bytes are zero padded on the right
  if (end > alignedEnd) {
    let last = 0
    for (let i = alignedEnd; i < end; i++) {
      last = (last << 8) | data[i]
    }
    last <<= (4 - (end - alignedEnd)) * 8
    sum = (sum + last) >>> 0
  }

  return sum
}

// head is summed with checkSumAdjustment (bytes 8-11) treated as zero
export function computeHeadChecksum(head: Uint8Array): number {
  const sum = computeChecksum(head)
  if (head.byteLength < 12) return sum
  const view = new DataView(head.buffer, head.byteOffset, head.byteLength)
  return (sum - view.getUint32(8)) >>> 0
}

