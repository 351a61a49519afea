// Table tags and sfnt signatures

export const TAG_CMAP = 0x636d6170
export const TAG_GLYF = 0x676c7966
export const TAG_HEAD = 0x68656164
export const TAG_HHEA = 0x68686561
export const TAG_HMTX = 0x686d7478
export const TAG_LOCA = 0x6c6f6361
export const TAG_MAXP = 0x6d617870

// Tables a TrueType outline font must carry
export const REQUIRED_TABLES: readonly number[] = [
  TAG_HEAD,
  TAG_MAXP,
  TAG_HHEA,
  TAG_LOCA,
  TAG_GLYF,
  TAG_HMTX,
  TAG_CMAP,
]

// SFNT signatures with TrueType outlines
export const SFNT_TTF = 0x00010000
export const SFNT_TRUE = 0x74727565 // 'true'
export const SFNT_TYP1 = 0x74797031 // 'typ1'

// Signatures recognised only to give a precise rejection
export const SFNT_CFF = 0x4f54544f // 'OTTO'
export const TTC_FLAVOR = 0x74746366 // 'ttcf'

// Web font containers
export const WOFF_SIGNATURE = 0x774f4646 // 'wOFF'
export const WOFF2_SIGNATURE = 0x774f4632 // 'wOF2'

export function isTrueTypeFlavor(flavor: number): boolean {
  return flavor === SFNT_TTF || flavor === SFNT_TRUE || flavor === SFNT_TYP1
}

// Convert 4-byte tag to string
export function tagToString(tag: number): string {
  return String.fromCharCode(
    (tag >> 24) & 0xff,
    (tag >> 16) & 0xff,
    (tag >> 8) & 0xff,
    tag & 0xff
  )
}

// Convert string to 4-byte tag
export function stringToTag(s: string): number {
  return (
    (s.charCodeAt(0) << 24) |
    (s.charCodeAt(1) << 16) |
    (s.charCodeAt(2) << 8) |
    s.charCodeAt(3)
  ) >>> 0
}
