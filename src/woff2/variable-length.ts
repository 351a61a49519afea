// WOFF2 variable-length integer encodings (section 4.1)

import type { ByteCursor } from '../shared/cursor'
import { FontFormatError } from '../shared/errors'

// 255UShort: values 0-65535
export function read255UShort(cursor: ByteCursor): number {
  const code = cursor.readU8()

  if (code === 253) {
    return cursor.readU16()
  } else if (code === 255) {
    return 253 + cursor.readU8()
  } else if (code === 254) {
    return 506 + cursor.readU8()
  }
  return code
}

// UIntBase128: table lengths, offsets
export function readBase128(cursor: ByteCursor): number {
  let result = 0

  for (let i = 0; i < 5; i++) {
    const code = cursor.readU8()

    // Leading zeros are invalid
    if (i === 0 && code === 0x80) {
      throw new FontFormatError('MalformedTable', 'UIntBase128 with leading zero byte')
    }

    // Would overflow 32 bits
    if ((result & 0xfe000000) !== 0) {
      throw new FontFormatError('MalformedTable', 'UIntBase128 value overflows 32 bits')
    }

    result = ((result << 7) | (code & 0x7f)) >>> 0

    // High bit clear = done
    if ((code & 0x80) === 0) return result
  }

  throw new FontFormatError('MalformedTable', 'UIntBase128 longer than 5 bytes')
}
