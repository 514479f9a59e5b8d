// Types
export type { ChordShape, ChordShapeInput } from "./chord-shape"
export type { AlignedLine, ChordProToken } from "./chordpro-line"
export type { ChordSource, ResolvedChord } from "./chord-library"
export type { ParsedChordLabel } from "./transpose"

// Voicing model
export {
  MAX_FINGER,
  MAX_FRET,
  MUTED,
  OPEN,
  STRING_COUNT,
  decodeChordShape,
  displayRow,
  makeChordShape,
} from "./chord-shape"

// Library lookups
export { COMMON_CHORDS, getCommonChord, resolveChord, resolveChordShape } from "./chord-library"

// Line aligner
export { alignChordProLine, extractChordLabels, tokenizeChordProLine } from "./chordpro-line"

// Transpose functions
export {
  parseChordLabel,
  transposeChord,
  transposeChordLine,
  transposeChordProText,
} from "./transpose"
