/**
 * Song model operations: validation, chord extraction, ChordPro export and transposition
 */

import { makeChordShape } from "@/lib/chords/chord-shape"
import { transposeChord, transposeChordProText } from "@/lib/chords/transpose"
import { type ChordShapeError, SongValidationError } from "@/lib/errors"
import { Effect } from "effect"
import type {
  PickingPattern,
  PickingPatternInput,
  Song,
  SongInput,
  SongSection,
  SongSectionInput,
  TabLine,
} from "./song-types"

const CHORD_MARKER_REGEX = /\[([^\]]+)\]/g

const invalid = (field: string, message: string) =>
  Effect.fail(new SongValidationError({ field, message }))

const isNonNegativeInteger = (value: number) => Number.isInteger(value) && value >= 0

const validateSection = (input: SongSectionInput, index: number) =>
  Effect.gen(function* () {
    const type = input.type.trim()
    if (!type) {
      return yield* invalid(`sections[${index}].type`, "Section type must not be empty")
    }

    const repeat = input.repeat ?? undefined
    if (repeat !== undefined && !(Number.isInteger(repeat) && repeat >= 1)) {
      return yield* invalid(`sections[${index}].repeat`, "Repeat count must be a positive integer")
    }

    const section: SongSection = {
      type,
      label: input.label ?? undefined,
      content: input.content ?? "",
      tab: input.tab ?? undefined,
      barProgression: input.barProgression ?? undefined,
      patternRef: input.patternRef ?? undefined,
      repeat,
    }
    return section
  })

const validatePattern = (input: PickingPatternInput, index: number) =>
  Effect.gen(function* () {
    const beatsPerBar = input.beatsPerBar ?? 4
    if (!(Number.isInteger(beatsPerBar) && beatsPerBar >= 1)) {
      return yield* invalid(`patterns[${index}].beatsPerBar`, "Beats per bar must be a positive integer")
    }

    const pattern: PickingPattern = {
      name: input.name,
      notation: input.notation,
      beatsPerBar,
      tab: input.tab ?? undefined,
    }
    return pattern
  })

/**
 * Validate a song and fill in defaults (key C, 4/4, standard tuning)
 */
export const makeSong = (
  input: SongInput,
): Effect.Effect<Song, SongValidationError | ChordShapeError> =>
  Effect.gen(function* () {
    const title = input.title.trim()
    if (!title) return yield* invalid("title", "Song title must not be empty")

    const artist = input.artist.trim()
    if (!artist) return yield* invalid("artist", "Artist must not be empty")

    const capo = input.capo ?? undefined
    if (capo !== undefined && !(isNonNegativeInteger(capo) && capo <= 24)) {
      return yield* invalid("capo", "Capo must be a fret number between 0 and 24")
    }

    const tempo = input.tempo ?? undefined
    if (tempo !== undefined && !(tempo > 0)) {
      return yield* invalid("tempo", "Tempo must be a positive number of BPM")
    }

    const sections = yield* Effect.forEach(input.sections ?? [], validateSection)
    const patterns = input.patterns
      ? yield* Effect.forEach(input.patterns, validatePattern)
      : undefined

    const chordEntries = yield* Effect.forEach(Object.entries(input.chords ?? {}), ([name, chord]) =>
      makeChordShape(chord).pipe(Effect.map(shape => [name, shape] as const)),
    )

    const song: Song = {
      title,
      artist,
      writers: input.writers ?? undefined,
      key: input.key?.trim() || "C",
      capo,
      tempo,
      timeSignature: input.timeSignature?.trim() || "4/4",
      tuning: input.tuning?.trim() || "Standard",
      difficulty: input.difficulty ?? undefined,
      structure: input.structure ?? undefined,
      sections,
      chords: Object.fromEntries(chordEntries),
      patterns,
      notes: input.notes ?? undefined,
      sourceUrl: input.sourceUrl ?? undefined,
      audioUrl: input.audioUrl ?? undefined,
    }
    return song
  })

export function sectionDisplayLabel(section: SongSection): string {
  return section.label || section.type
}

/**
 * Chord names from a bar progression like "|: G | C D :|"
 */
export function barProgressionChords(progression: string): string[] {
  return progression
    .replace(/\|/g, " ")
    .replace(/:/g, "")
    .split(/\s+/)
    .filter(bar => /^[A-Za-z]/.test(bar))
}

/**
 * Every distinct chord name used in section content and bar progressions, sorted
 */
export function getAllChordNames(song: Song): string[] {
  const found = new Set<string>()

  for (const section of song.sections) {
    for (const match of section.content.matchAll(CHORD_MARKER_REGEX)) {
      if (match[1]) found.add(match[1])
    }
    if (section.barProgression) {
      for (const chord of barProgressionChords(section.barProgression)) {
        found.add(chord)
      }
    }
  }

  return [...found].sort()
}

export function tabLineRows(tab: TabLine): string[] {
  return [
    `e|${tab.e}|`,
    `B|${tab.B}|`,
    `G|${tab.G}|`,
    `D|${tab.D}|`,
    `A|${tab.A}|`,
    `E|${tab.E}|`,
  ]
}

export function tabLineToAscii(tab: TabLine): string {
  return tabLineRows(tab).join("\n")
}

/**
 * Export the song as ChordPro text: metadata directives, then one comment-headed block per section
 */
export function toChordProText(song: Song): string {
  const output: string[] = [`{title: ${song.title}}`, `{artist: ${song.artist}}`]

  if (song.key) output.push(`{key: ${song.key}}`)
  if (song.capo) output.push(`{capo: ${song.capo}}`)
  if (song.tempo) output.push(`{tempo: ${song.tempo}}`)
  output.push("")

  for (const section of song.sections) {
    output.push(`{comment: ${sectionDisplayLabel(section)}}`)
    if (section.barProgression) output.push(section.barProgression)
    if (section.content) output.push(section.content)
    output.push("")
  }

  return output.join("\n")
}

function transposeBarProgression(progression: string, semitones: number): string {
  return progression.replace(/[^\s|:]+/g, bar => transposeChord(bar, semitones))
}

/**
 * New song shifted by N semitones. Song-specific voicings are dropped since their names no
 * longer match the transposed chords.
 */
export function transposeSong(song: Song, semitones: number): Song {
  return {
    ...song,
    key: song.key ? transposeChord(song.key, semitones) : song.key,
    sections: song.sections.map(section => ({
      ...section,
      content: transposeChordProText(section.content, semitones),
      barProgression: section.barProgression
        ? transposeBarProgression(section.barProgression, semitones)
        : section.barProgression,
    })),
    chords: semitones % 12 === 0 ? song.chords : {},
  }
}
