import guitarDb from "@tombatossals/chords-db/lib/guitar.json"
import { Either } from "effect"
import { type ChordShape, decodeChordShape } from "./chords/chord-shape"

/**
 * Voicing as stored by chords-db: frets and barres are relative to `baseFret`
 */
export interface ChordPosition {
  frets: number[]
  fingers: number[]
  barres: number[]
  baseFret: number
  capo?: boolean
  midi: number[]
}

export interface ChordData {
  key: string
  suffix: string
  positions: ChordPosition[]
}

const chordsByKey = guitarDb.chords as Record<string, ChordData[]>

/** Roots the database files under their other spelling */
const KEY_ALIASES: Record<string, string> = {
  Db: "C#",
  "D#": "Eb",
  Gb: "F#",
  "G#": "Ab",
  "A#": "Bb",
}

/** Common chord-symbol spellings mapped to the database's suffix names */
const SUFFIX_ALIASES: Record<string, string> = {
  "": "major",
  M: "major",
  m: "minor",
  min: "minor",
  "7sus2": "sus2",
  "°": "dim",
  o: "dim",
  "+": "aug",
  M7: "maj7",
  Maj7: "maj7",
  "Δ7": "maj7",
  "Δ": "maj7",
  M9: "maj9",
  Maj9: "maj9",
  min7: "m7",
  "-7": "m7",
  min9: "m9",
  min6: "m6",
  min11: "m11",
  mM7: "mmaj7",
  minMaj7: "mmaj7",
  "m(M7)": "mmaj7",
  "m(maj7)": "mmaj7",
  sus: "sus4",
  "4": "sus4",
  "2": "sus2",
  "7(#9)": "7#9",
  "7(b9)": "7b9",
  "7(b5)": "7b5",
  "9(#11)": "9#11",
  "M7#5": "maj7#5",
  "Maj7(#5)": "maj7#5",
  M7b5: "maj7b5",
  "Maj7(b5)": "maj7b5",
  "7alt": "alt",
  "(add9)": "add9",
  add2: "add9",
  "m(add9)": "madd9",
  madd2: "madd9",
}

function parseChordName(chordName: string): { key: string; suffix: string } | null {
  const match = chordName.match(/^([A-G][#b]?)(.*)$/)
  if (!match) return null

  const [, root, rest] = match
  if (!root) return null

  const suffix = rest ?? ""
  return {
    key: KEY_ALIASES[root] ?? root,
    suffix: SUFFIX_ALIASES[suffix] ?? suffix,
  }
}

function findChordData(chordName: string): ChordData | null {
  const parsed = parseChordName(chordName)
  if (!parsed) return null

  // Sharp keys are stored as "Csharp" / "Fsharp" in some releases of the database
  const keyChords = chordsByKey[parsed.key] ?? chordsByKey[parsed.key.replace("#", "sharp")]
  return keyChords?.find(c => c.suffix === parsed.suffix) ?? null
}

/**
 * Convert a database voicing to a ChordShape with absolute fret numbers
 */
export function positionToShape(name: string, position: ChordPosition): ChordShape | null {
  const toAbsolute = (fret: number) => (fret > 0 ? fret + position.baseFret - 1 : fret)
  const barre = position.barres[0]

  const decoded = decodeChordShape({
    name,
    frets: position.frets.map(toAbsolute),
    fingers: position.fingers.length > 0 ? position.fingers : undefined,
    barre: barre !== undefined ? toAbsolute(barre) : undefined,
    baseFret: position.baseFret,
  })

  return Either.getOrNull(decoded)
}

export function getAllChordShapes(chordName: string): ChordShape[] {
  const chordData = findChordData(chordName)
  if (!chordData) return []

  return chordData.positions.flatMap(position => {
    const shape = positionToShape(chordName, position)
    return shape ? [shape] : []
  })
}

/**
 * First voicing the database lists for the chord, or null
 */
export function lookupChordShape(chordName: string): ChordShape | null {
  return getAllChordShapes(chordName)[0] ?? null
}

export function isChordSupported(chordName: string): boolean {
  return lookupChordShape(chordName) !== null
}
