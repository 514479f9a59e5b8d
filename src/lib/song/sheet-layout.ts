/**
 * Chord sheet layout
 *
 * Builds the renderer-neutral content of a printable sheet from a song: header lines, the chord
 * diagram strip with its text fallback, the structure roadmap, strumming patterns and every section as aligned
 * chord/lyric rows. Page breaks and fonts belong to the renderer.
 */

import { type AlignedLine, alignChordProLine } from "@/lib/chords/chordpro-line"
import { resolveChord } from "@/lib/chords/chord-library"
import { type ChordShape, MUTED, OPEN } from "@/lib/chords/chord-shape"
import { composeChordStrip, type StripOptions } from "@/lib/diagram/diagram-strip"
import type { DiagramScene } from "@/lib/diagram/scene"
import { getAllChordNames, sectionDisplayLabel, tabLineRows } from "./song"
import type { Song, SongSection, TabLine } from "./song-types"

const MAX_HEADER_PATTERNS = 2
const MAX_TEXT_VOICINGS = 8

const DIFFICULTY_LABELS: Record<string, string> = {
  Beginner: "* Easy",
  Intermediate: "** Intermediate",
  Advanced: "*** Advanced",
}

const SECTION_ABBREVIATIONS: Record<string, string> = {
  intro: "Intro",
  verse: "V",
  verse1: "V1",
  verse2: "V2",
  verse3: "V3",
  verse4: "V4",
  chorus: "C",
  chorus1: "C1",
  chorus2: "C2",
  bridge: "Br",
  outro: "Outro",
  solo: "Solo",
  prechorus: "Pre",
  interlude: "Int",
}

export type SheetLine =
  | { readonly kind: "lyrics"; readonly chordRow: string; readonly lyricRow: string }
  | { readonly kind: "spacer" }

export interface SheetSection {
  readonly heading: string
  readonly barProgression?: string | undefined
  /** ASCII tab, six rows per bar */
  readonly tab: readonly (readonly string[])[]
  readonly lines: readonly SheetLine[]
}

export interface SheetPattern {
  readonly name: string
  readonly notation: string
  readonly tab: readonly (readonly string[])[]
}

export interface ChordSheet {
  readonly title: string
  readonly attribution: string
  readonly metaLine?: string | undefined
  readonly chordNames: readonly string[]
  readonly chordStrip: DiagramScene
  /** Text fallback for the strip: "C: x 3 2 o 1 o", at most eight */
  readonly chordVoicings: readonly string[]
  /** Chord names without a known voicing; they are left out of the strip */
  readonly missingChords: readonly string[]
  readonly structureLine?: string | undefined
  readonly patterns: readonly SheetPattern[]
  readonly sections: readonly SheetSection[]
  readonly notes?: string | undefined
}

export function formatAttribution(song: Song): string {
  return song.writers && song.writers.length > 0
    ? `Words & Music by ${song.writers.join(" & ")}`
    : song.artist
}

export function difficultyLabel(difficulty: string): string {
  return DIFFICULTY_LABELS[difficulty] ?? difficulty
}

/**
 * "Key: G  |  Capo: Fret 2  |  Tempo: 92 BPM", or undefined when there is nothing to show
 */
export function formatMetaLine(song: Song): string | undefined {
  const parts: string[] = []

  if (song.key) parts.push(`Key: ${song.key}`)
  if (song.capo) parts.push(`Capo: Fret ${song.capo}`)
  if (song.tempo) parts.push(`Tempo: ${song.tempo} BPM`)
  if (song.timeSignature && song.timeSignature !== "4/4") parts.push(`Time: ${song.timeSignature}`)
  if (song.tuning && song.tuning !== "Standard") parts.push(`Tuning: ${song.tuning}`)
  if (song.difficulty) parts.push(difficultyLabel(song.difficulty))

  return parts.length > 0 ? parts.join("  |  ") : undefined
}

/**
 * One voicing as text, lowest string first: x muted, o open, otherwise the fret number
 */
export function formatChordVoicing(shape: ChordShape): string {
  const frets = shape.frets.map(fret => (fret === MUTED ? "x" : fret === OPEN ? "o" : String(fret)))
  return `${shape.name}: ${frets.join(" ")}`
}

export function formatStructureLine(structure: readonly string[]): string {
  const roadmap = structure.map(s => SECTION_ABBREVIATIONS[s.toLowerCase()] ?? s).join(" -> ")
  return `Structure: ${roadmap}`
}

export function sectionHeading(section: SongSection): string {
  const label = sectionDisplayLabel(section)
  return section.repeat && section.repeat > 1 ? `${label} (x${section.repeat})` : label
}

export function layoutContentLines(content: string): SheetLine[] {
  if (!content.trim()) return []

  return content.split("\n").map((line): SheetLine => {
    if (!line.trim()) return { kind: "spacer" }
    const aligned: AlignedLine = alignChordProLine(line)
    return { kind: "lyrics", chordRow: aligned.chordRow, lyricRow: aligned.lyricRow }
  })
}

const layoutTab = (tab: readonly TabLine[] | undefined) => (tab ?? []).map(tabLineRows)

export function layoutSection(section: SongSection): SheetSection {
  return {
    heading: sectionHeading(section),
    barProgression: section.barProgression,
    tab: layoutTab(section.tab),
    lines: layoutContentLines(section.content),
  }
}

/**
 * Lay out a whole song. Chord voicings come from the song first, then the built-in library.
 */
export function buildChordSheet(song: Song, options: StripOptions = {}): ChordSheet {
  const chordNames = getAllChordNames(song)
  const shapes: ChordShape[] = []
  const missingChords: string[] = []

  for (const name of chordNames) {
    const resolved = resolveChord(name, song.chords)
    if (resolved) shapes.push(resolved.shape)
    else missingChords.push(name)
  }

  return {
    title: song.title,
    attribution: formatAttribution(song),
    metaLine: formatMetaLine(song),
    chordNames,
    chordStrip: composeChordStrip(shapes, options),
    chordVoicings: shapes.slice(0, MAX_TEXT_VOICINGS).map(formatChordVoicing),
    missingChords,
    structureLine:
      song.structure && song.structure.length > 0
        ? formatStructureLine(song.structure)
        : undefined,
    patterns: (song.patterns ?? []).slice(0, MAX_HEADER_PATTERNS).map(pattern => ({
      name: pattern.name,
      notation: pattern.notation,
      tab: layoutTab(pattern.tab),
    })),
    sections: song.sections.map(layoutSection),
    notes: song.notes,
  }
}

/**
 * Plain-text rendering of a sheet, one string per printed line
 */
export function chordSheetToText(sheet: ChordSheet): string[] {
  const out: string[] = [sheet.title, sheet.attribution]
  if (sheet.metaLine) out.push(sheet.metaLine)
  if (sheet.chordVoicings.length > 0) out.push(sheet.chordVoicings.join("   "))
  if (sheet.structureLine) out.push(sheet.structureLine)

  for (const pattern of sheet.patterns) {
    out.push(`${pattern.name}:  ${pattern.notation}`)
    for (const bar of pattern.tab) out.push(...bar)
  }

  for (const section of sheet.sections) {
    out.push("", section.heading)
    if (section.barProgression) out.push(section.barProgression)
    for (const bar of section.tab) out.push(...bar)
    for (const line of section.lines) {
      if (line.kind === "spacer") {
        out.push("")
        continue
      }
      if (line.chordRow) out.push(line.chordRow)
      out.push(line.lyricRow)
    }
  }

  if (sheet.notes) out.push("", `Notes: ${sheet.notes}`)
  return out
}
