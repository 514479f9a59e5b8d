/**
 * Static chord library
 *
 * Hand-picked open voicings for the chords that show up on most beginner sheets. Anything not
 * listed here falls back to the chords-db guitar database.
 */

import { lookupChordShape } from "@/lib/chordDiagrams"
import type { ChordShape } from "./chord-shape"

const open = (
  name: string,
  frets: readonly number[],
  fingers: readonly number[],
  barre?: number,
): ChordShape => ({
  name,
  frets,
  fingers,
  ...(barre !== undefined ? { barre } : {}),
  baseFret: 1,
})

export const COMMON_CHORDS: ReadonlyMap<string, ChordShape> = new Map(
  [
    open("G", [3, 2, 0, 0, 0, 3], [2, 1, 0, 0, 0, 3]),
    open("C", [-1, 3, 2, 0, 1, 0], [0, 3, 2, 0, 1, 0]),
    open("D", [-1, -1, 0, 2, 3, 2], [0, 0, 0, 1, 3, 2]),
    open("Am", [-1, 0, 2, 2, 1, 0], [0, 0, 2, 3, 1, 0]),
    open("A", [-1, 0, 2, 2, 2, 0], [0, 0, 1, 2, 3, 0]),
    open("E", [0, 2, 2, 1, 0, 0], [0, 2, 3, 1, 0, 0]),
    open("Em", [0, 2, 2, 0, 0, 0], [0, 2, 3, 0, 0, 0]),
    open("F", [1, 3, 3, 2, 1, 1], [1, 3, 4, 2, 1, 1], 1),
    open("Dm", [-1, -1, 0, 2, 3, 1], [0, 0, 0, 2, 3, 1]),
    open("B7", [-1, 2, 1, 2, 0, 2], [0, 2, 1, 3, 0, 4]),
    open("Cadd9", [-1, 3, 2, 0, 3, 0], [0, 2, 1, 0, 3, 0]),
    open("Dsus4", [-1, -1, 0, 2, 3, 3], [0, 0, 0, 1, 2, 3]),
    open("G/B", [-1, 2, 0, 0, 0, 3], [0, 1, 0, 0, 0, 2]),
  ].map(shape => [shape.name, shape] as const),
)

export function getCommonChord(name: string): ChordShape | undefined {
  return COMMON_CHORDS.get(name)
}

export type ChordSource = "song" | "common" | "database"

export interface ResolvedChord {
  readonly shape: ChordShape
  readonly source: ChordSource
}

/**
 * Find a voicing for a chord name: the song's own voicing first, then the common library,
 * then the chord database.
 */
export function resolveChord(
  name: string,
  songChords: Readonly<Record<string, ChordShape>> = {},
): ResolvedChord | null {
  const fromSong = Object.hasOwn(songChords, name) ? songChords[name] : undefined
  if (fromSong) return { shape: fromSong, source: "song" }

  const common = COMMON_CHORDS.get(name)
  if (common) return { shape: common, source: "common" }

  const fromDatabase = lookupChordShape(name)
  return fromDatabase ? { shape: fromDatabase, source: "database" } : null
}

export function resolveChordShape(
  name: string,
  songChords: Readonly<Record<string, ChordShape>> = {},
): ChordShape | null {
  return resolveChord(name, songChords)?.shape ?? null
}
