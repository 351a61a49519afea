// WOFF2 transformed glyf/loca (section 5.1-5.3).
// The transform splits glyph data into parallel streams; this rebuilds
// ordinary glyf and loca tables so the regular decoder can read them.

import { ByteCursor } from '../shared/cursor'
import { FontFormatError } from '../shared/errors'
import { WriteBuffer } from '../shared/write-buffer'
import {
  COMP_ARG_1_AND_2_ARE_WORDS,
  COMP_WE_HAVE_A_SCALE,
  COMP_MORE_COMPONENTS,
  COMP_WE_HAVE_AN_X_AND_Y_SCALE,
  COMP_WE_HAVE_A_TWO_BY_TWO,
  COMP_WE_HAVE_INSTRUCTIONS,
} from '../glyf/flags'
import { GlyphDescription, computeBounds, type Point } from '../glyf/glyph'
import { encodeSimpleGlyph } from '../glyf/encode'
import { read255UShort } from './variable-length'

const GLYF_HEADER_SIZE = 36

export interface ReconstructedGlyf {
  glyf: Uint8Array
  loca: Uint8Array
  // Needed to rebuild a transformed hmtx
  xMins: Int16Array
}

function malformed(reason: string, glyphId?: number): FontFormatError {
  return new FontFormatError('MalformedTable', `Malformed WOFF2 glyf stream: ${reason}`, {
    tag: 'glyf',
    glyphId,
  })
}

interface Streams {
  nContour: ByteCursor
  nPoints: ByteCursor
  flag: ByteCursor
  glyph: ByteCursor
  composite: ByteCursor
  bbox: ByteCursor
  instruction: ByteCursor
}

export function reconstructGlyf(data: Uint8Array): ReconstructedGlyf {
  const header = new ByteCursor(data, 'WOFF2 glyf header', { tag: 'glyf' })

  // version
  header.skip(2)
  const optionFlags = header.readU16()
  const numGlyphs = header.readU16()
  const indexFormat = header.readU16()

  const sizes: number[] = []
  for (let i = 0; i < 7; i++) {
    sizes.push(header.readU32())
  }

  let offset = GLYF_HEADER_SIZE
  const next = (label: string, size: number): ByteCursor => {
    const stream = header.slice(offset, size, `WOFF2 ${label} stream`)
    offset += size
    return stream
  }
  const streams: Streams = {
    nContour: next('nContour', sizes[0]),
    nPoints: next('nPoints', sizes[1]),
    flag: next('flag', sizes[2]),
    glyph: next('glyph', sizes[3]),
    composite: next('composite', sizes[4]),
    bbox: next('bbox', sizes[5]),
    instruction: next('instruction', sizes[6]),
  }

  let overlapBitmap: Uint8Array | null = null
  if ((optionFlags & 1) !== 0) {
    header.seek(offset)
    overlapBitmap = header.readBytes((numGlyphs + 7) >> 3)
  }
  const bboxBitmap = streams.bbox.readBytes(((numGlyphs + 31) >> 5) << 2)

  const glyf = new WriteBuffer(data.byteLength * 2)
  const offsets = new Uint32Array(numGlyphs + 1)
  const xMins = new Int16Array(numGlyphs)

  for (let glyphId = 0; glyphId < numGlyphs; glyphId++) {
    offsets[glyphId] = glyf.offset

    const nContours = streams.nContour.readS16()
    const haveBbox = bitSet(bboxBitmap, glyphId)

    if (nContours === 0) {
      if (haveBbox) throw malformed('empty glyph has an explicit bbox', glyphId)
      continue
    }

    if (nContours === -1) {
      if (!haveBbox) throw malformed('composite glyph without bbox', glyphId)
      const bbox = readBbox(streams.bbox)
      writeCompositeGlyph(glyf, streams, bbox)
      xMins[glyphId] = bbox.xMin
    } else if (nContours > 0) {
      const overlap = overlapBitmap !== null && bitSet(overlapBitmap, glyphId)
      xMins[glyphId] = writeSimpleGlyph(glyf, streams, nContours, haveBbox, overlap)
    } else {
      throw malformed(`invalid contour count ${nContours}`, glyphId)
    }

    glyf.pad4()
  }
  offsets[numGlyphs] = glyf.offset

  return { glyf: glyf.getBytes(), loca: encodeLoca(offsets, indexFormat), xMins }
}

// Bitmaps are MSB first
function bitSet(bitmap: Uint8Array, index: number): boolean {
  return (bitmap[index >> 3] & (0x80 >> (index & 7))) !== 0
}

function readBbox(stream: ByteCursor): GlyphDescription {
  return new GlyphDescription(stream.readS16(), stream.readS16(), stream.readS16(), stream.readS16())
}

function writeCompositeGlyph(out: WriteBuffer, streams: Streams, bbox: GlyphDescription): void {
  const { composite } = streams
  const start = composite.offset
  let haveInstructions = false
  let flags = COMP_MORE_COMPONENTS

  while (flags & COMP_MORE_COMPONENTS) {
    flags = composite.readU16()
    haveInstructions = haveInstructions || (flags & COMP_WE_HAVE_INSTRUCTIONS) !== 0

    // glyph index plus arguments
    let size = 2 + (flags & COMP_ARG_1_AND_2_ARE_WORDS ? 4 : 2)
    if (flags & COMP_WE_HAVE_A_SCALE) {
      size += 2
    } else if (flags & COMP_WE_HAVE_AN_X_AND_Y_SCALE) {
      size += 4
    } else if (flags & COMP_WE_HAVE_A_TWO_BY_TWO) {
      size += 8
    }
    composite.skip(size)
  }
  const length = composite.offset - start
  composite.seek(start)
  const records = composite.readBytes(length)

  out.writeS16(-1)
  writeBbox(out, bbox)
  out.writeBytes(records)

  if (haveInstructions) {
    const instructionLength = read255UShort(streams.glyph)
    out.writeU16(instructionLength)
    out.writeBytes(streams.instruction.readBytes(instructionLength))
  }
}

// Returns the xMin written into the glyph header
function writeSimpleGlyph(
  out: WriteBuffer,
  streams: Streams,
  nContours: number,
  haveBbox: boolean,
  overlap: boolean
): number {
  const endPointsOfContours: number[] = []
  let endPoint = -1
  for (let i = 0; i < nContours; i++) {
    endPoint += read255UShort(streams.nPoints)
    endPointsOfContours.push(endPoint)
  }

  const coordinates: Point[] = []
  let x = 0
  let y = 0
  for (let i = 0; i <= endPoint; i++) {
    const flag = streams.flag.readU8()
    const [dx, dy] = readTriplet(flag & 0x7f, streams.glyph)
    x += dx
    y += dy
    coordinates.push({ x, y, onCurve: (flag & 0x80) === 0 })
  }

  const instructionLength = read255UShort(streams.glyph)
  const instructions = streams.instruction.readBytes(instructionLength)

  const bounds = haveBbox ? readBbox(streams.bbox) : computeBounds(coordinates)
  out.writeBytes(
    encodeSimpleGlyph({ kind: 'simple', endPointsOfContours, coordinates, instructions, overlap }, bounds)
  )
  return bounds.xMin
}

// Triplet encoding (WOFF2 table 2): the low 7 flag bits pick how many bytes
// hold dx/dy and which value ranges they cover; bit 0 and bit 1 give the
// signs of x and y.
function readTriplet(flag: number, stream: ByteCursor): [number, number] {
  let dx: number
  let dy: number

  if (flag < 10) {
    dx = 0
    dy = ((flag & 14) << 7) + stream.readU8()
  } else if (flag < 20) {
    dx = (((flag - 10) & 14) << 7) + stream.readU8()
    dy = 0
  } else if (flag < 84) {
    const b0 = flag - 20
    const b1 = stream.readU8()
    dx = 1 + (b0 & 0x30) + (b1 >> 4)
    dy = 1 + ((b0 & 0x0c) << 2) + (b1 & 0x0f)
  } else if (flag < 120) {
    const b0 = flag - 84
    dx = 1 + (Math.floor(b0 / 12) << 8) + stream.readU8()
    dy = 1 + (((b0 % 12) >> 2) << 8) + stream.readU8()
  } else if (flag < 124) {
    const b1 = stream.readU8()
    const b2 = stream.readU8()
    const b3 = stream.readU8()
    dx = (b1 << 4) + (b2 >> 4)
    dy = ((b2 & 0x0f) << 8) + b3
  } else {
    dx = stream.readU16()
    dy = stream.readU16()
  }

  // In the dx = 0 range the sign bit belongs to y
  if (flag < 10) {
    return [0, flag & 1 ? dy : -dy]
  }
  if (flag < 20) {
    return [flag & 1 ? dx : -dx, 0]
  }
  return [flag & 1 ? dx : -dx, flag & 2 ? dy : -dy]
}

function writeBbox(out: WriteBuffer, bbox: GlyphDescription): void {
  out.writeS16(bbox.xMin)
  out.writeS16(bbox.yMin)
  out.writeS16(bbox.xMax)
  out.writeS16(bbox.yMax)
}

function encodeLoca(offsets: Uint32Array, indexFormat: number): Uint8Array {
  const out = new WriteBuffer(offsets.length * 4)
  for (const offset of offsets) {
    if (indexFormat === 0) {
      out.writeU16(offset >> 1)
    } else {
      out.writeU32(offset)
    }
  }
  return out.getBytes()
}
