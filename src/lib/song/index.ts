export type {
  PickingPattern,
  PickingPatternInput,
  Song,
  SongInput,
  SongSection,
  SongSectionInput,
  TabLine,
} from "./song-types"

export {
  barProgressionChords,
  getAllChordNames,
  makeSong,
  sectionDisplayLabel,
  tabLineRows,
  tabLineToAscii,
  toChordProText,
  transposeSong,
} from "./song"

export type { ChordSheet, SheetLine, SheetPattern, SheetSection } from "./sheet-layout"

export {
  buildChordSheet,
  chordSheetToText,
  difficultyLabel,
  formatAttribution,
  formatChordVoicing,
  formatMetaLine,
  formatStructureLine,
  layoutContentLines,
  layoutSection,
  sectionHeading,
} from "./sheet-layout"

export { SongInputSchema, parseSongJson } from "./song-schema"
