// TrueType glyph flags

// Simple glyph point flags
export const FLAG_ON_CURVE = 0x01
export const FLAG_X_SHORT = 0x02
export const FLAG_Y_SHORT = 0x04
export const FLAG_REPEAT = 0x08
export const FLAG_X_SAME_OR_POSITIVE = 0x10
export const FLAG_Y_SAME_OR_POSITIVE = 0x20
export const FLAG_OVERLAP_SIMPLE = 0x40

// Composite glyph flags
export const COMP_ARG_1_AND_2_ARE_WORDS = 0x0001
export const COMP_ARGS_ARE_XY_VALUES = 0x0002
export const COMP_WE_HAVE_A_SCALE = 0x0008
export const COMP_MORE_COMPONENTS = 0x0020
export const COMP_WE_HAVE_AN_X_AND_Y_SCALE = 0x0040
export const COMP_WE_HAVE_A_TWO_BY_TWO = 0x0080
export const COMP_WE_HAVE_INSTRUCTIONS = 0x0100
export const COMP_SCALED_COMPONENT_OFFSET = 0x0800
export const COMP_UNSCALED_COMPONENT_OFFSET = 0x1000
