export * from "./lib/chords"
export * from "./lib/diagram"
export * from "./lib/song"
export {
  getAllChordShapes,
  isChordSupported,
  lookupChordShape,
  positionToShape,
} from "./lib/chordDiagrams"
export {
  ChordNotFoundError,
  ChordShapeError,
  type FretsheetError,
  SongValidationError,
} from "./lib/errors"
export * from "./services"
