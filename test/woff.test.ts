import { describe, it, expect } from 'vitest'
import { parse } from '../src/font'
import { unwrapWoff } from '../src/woff/decode'
import { WriteBuffer } from '../src/shared/write-buffer'
import { buildFont, buildTables, latinFont, wrapWoff } from './helpers/font-builder'
import { expectFontError } from './helpers/errors'

describe('WOFF', () => {
  const sfnt = parse(buildFont(latinFont()))
  const woff = wrapWoff(buildTables(latinFont()))

  it('decodes the same glyphs and metrics as the bare font', () => {
    const font = parse(woff)
    expect(font.glyphCount()).toBe(sfnt.glyphCount())
    expect(font.head).toEqual(sfnt.head)
    for (let glyphId = 0; glyphId < font.glyphCount(); glyphId++) {
      expect(font.glyph(glyphId)).toEqual(sfnt.glyph(glyphId))
    }
  })

  it('keeps table checksums for verification', () => {
    expect(() => parse(woff, { verifyChecksums: true })).not.toThrow()
  })

  it('checks the declared length', () => {
    const bytes = woff.slice()
    new DataView(bytes.buffer).setUint32(8, bytes.byteLength + 4)
    const err = expectFontError(() => parse(bytes), 'MalformedTable')
    expect(err.message).toBe(
      `Malformed WOFF file: header length ${bytes.byteLength + 4} does not match file size ${bytes.byteLength}`
    )
  })

  it('rejects input without the WOFF signature', () => {
    const err = expectFontError(() => unwrapWoff(buildFont(latinFont())), 'BadMagic')
    expect(err.message).toBe('Invalid WOFF signature')
  })

  it('rejects CFF flavored WOFF', () => {
    expectFontError(() => parse(wrapWoff(buildTables(latinFont()), 0x4f54544f)), 'BadMagic')
  })

  it('reports tables that do not inflate', () => {
    const out = new WriteBuffer()
    out.writeU32(0x774f4646)
    out.writeU32(0x00010000)
    out.writeU32(68)
    out.writeU16(1)
    out.writeU16(0)
    out.writeU32(16)
    out.writeU16(1)
    out.writeU16(0)
    for (let i = 0; i < 5; i++) out.writeU32(0)
    // cmap: 4 stored bytes claiming to inflate to 10
    out.writeU32(0x636d6170)
    out.writeU32(64)
    out.writeU32(4)
    out.writeU32(10)
    out.writeU32(0)
    out.writeBytes(new Uint8Array([1, 2, 3, 4]))

    const err = expectFontError(() => unwrapWoff(out.getBytes()), 'MalformedTable')
    expect(err.tag).toBe('cmap')
  })
})
