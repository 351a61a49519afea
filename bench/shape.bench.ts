import { bench, describe } from 'vitest'
import { parse } from '../src/font'
import { Shaper } from '../src/shaper'
import { toSvgPath } from '../src/render/svg'
import { buildFont, buildWoff2, latinFont } from '../test/helpers/font-builder'

const sfnt = buildFont(latinFont())
const woff2 = buildWoff2(latinFont(), { transformGlyf: true, transformHmtx: true })
const font = parse(sfnt)
const shaper = new Shaper(font)
const text = 'A BOA. \u00c4B'.repeat(64)

console.log(`\n[bench] shape: ${[...text].length} code points, ${sfnt.byteLength} byte font`)

describe('parse', () => {
  bench('sfnt', () => {
    parse(sfnt)
  })

  bench('woff2 (transformed glyf)', () => {
    parse(woff2)
  })
})

describe('shape', () => {
  bench('shape text', () => {
    shaper.shape(text)
  })

  bench('shape + outline + svg', () => {
    for (const { glyph } of shaper.shape(text)) {
      toSvgPath(font.outlinePath(glyph))
    }
  })
})
