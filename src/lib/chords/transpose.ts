const NOTES_SHARP = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"]
const NOTES_FLAT = ["C", "Db", "D", "Eb", "E", "F", "Gb", "G", "Ab", "A", "Bb", "B"]

/** Spellings outside both tables, mapped to their pitch class */
const ENHARMONIC_INDEX: Record<string, number> = { "B#": 0, Fb: 4, "E#": 5, Cb: 11 }

const NO_CHORD_MARKERS = ["N.C.", "NC", "N/C", "n.c.", "nc"]

const CHORD_ROOT_REGEX = /^([A-G])([#b])?(.*)$/

/**
 * Quality, extension and alteration text allowed after a root
 * (m, maj7, sus4, add9, dim, aug, 7b9, m7(b5), 6/9, °, ø, Δ, +, -)
 */
const CHORD_SUFFIX_REGEX =
  /^(?:6\/9|maj|min|mi|ma|dim|aug|sus|add|alt|no|omit|m|M|[0-9#b+°øΔ()\-,])*$/

export interface ParsedChordLabel {
  readonly root: string
  readonly suffix: string
  readonly bass?: string | undefined
}

function parseChordRoot(chord: string): { root: string; suffix: string } | null {
  const match = chord.match(CHORD_ROOT_REGEX)
  if (!match) return null

  const [, letter, accidental, suffix] = match
  if (!letter) return null

  const root = accidental ? `${letter}${accidental}` : letter
  return { root, suffix: suffix ?? "" }
}

/**
 * Split a chord label into root, suffix and optional bass note.
 * Returns null for anything that does not read as a chord symbol ("Chorus", "x2", "N.C.").
 */
export function parseChordLabel(label: string): ParsedChordLabel | null {
  const whole = parseChordRoot(label)
  if (whole && CHORD_SUFFIX_REGEX.test(whole.suffix)) return whole

  // Only the last slash can start a bass note ("C6/9/E")
  const slash = label.lastIndexOf("/")
  if (slash === -1) return null

  const parsed = parseChordRoot(label.slice(0, slash))
  if (!parsed || !CHORD_SUFFIX_REGEX.test(parsed.suffix)) return null

  const bass = parseChordRoot(label.slice(slash + 1))
  if (!bass || bass.suffix !== "") return null

  return { ...parsed, bass: bass.root }
}

function getNoteIndex(note: string): number {
  const sharpIndex = NOTES_SHARP.indexOf(note)
  if (sharpIndex !== -1) return sharpIndex

  const flatIndex = NOTES_FLAT.indexOf(note)
  if (flatIndex !== -1) return flatIndex

  return ENHARMONIC_INDEX[note] ?? -1
}

function usesFlats(note: string): boolean {
  return note.includes("b")
}

function transposeNote(note: string, semitones: number): string {
  const index = getNoteIndex(note)
  if (index === -1) return note

  const newIndex = (((index + semitones) % 12) + 12) % 12
  const notes = usesFlats(note) ? NOTES_FLAT : NOTES_SHARP
  return notes[newIndex] ?? note
}

/**
 * Shift a chord label by a number of semitones. Labels that do not parse come back unchanged.
 */
export function transposeChord(chord: string, semitones: number): string {
  if (semitones % 12 === 0) return chord
  if (NO_CHORD_MARKERS.includes(chord)) return chord

  const parsed = parseChordLabel(chord)
  if (!parsed) return chord

  const root = transposeNote(parsed.root, semitones)
  if (parsed.bass === undefined) return `${root}${parsed.suffix}`

  return `${root}${parsed.suffix}/${transposeNote(parsed.bass, semitones)}`
}

export function transposeChordLine(chords: readonly string[], semitones: number): string[] {
  return chords.map(c => transposeChord(c, semitones))
}

/**
 * Transpose every bracketed chord in a block of ChordPro text
 */
export function transposeChordProText(text: string, semitones: number): string {
  return text.replace(/\[(.*?)\]/g, (_, chord: string) => `[${transposeChord(chord, semitones)}]`)
}
