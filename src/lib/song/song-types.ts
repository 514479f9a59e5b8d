/**
 * Structured song model
 *
 * The stable contract between whatever produces a song (a parser, an editor, a JSON file) and
 * the sheet layout. Section content is ChordPro: lyrics with inline [Chord] markers.
 */

import type { ChordShape, ChordShapeInput } from "@/lib/chords/chord-shape"

/** One bar of tablature, one string per field (high e first when printed) */
export interface TabLine {
  readonly e: string
  readonly B: string
  readonly G: string
  readonly D: string
  readonly A: string
  readonly E: string
}

export interface PickingPattern {
  readonly name: string
  /** "D DU UDU" for strums, or free text */
  readonly notation: string
  readonly beatsPerBar: number
  readonly tab?: readonly TabLine[] | undefined
}

export interface SongSection {
  /** Verse, Chorus, Bridge, Intro, Outro, Solo, ... */
  readonly type: string
  readonly label?: string | undefined
  readonly content: string
  readonly tab?: readonly TabLine[] | undefined
  /** Bar notation such as "|G|G|C|C|" for instrumental parts */
  readonly barProgression?: string | undefined
  readonly patternRef?: string | undefined
  readonly repeat?: number | undefined
}

export interface Song {
  readonly title: string
  readonly artist: string
  readonly writers?: readonly string[] | undefined

  readonly key: string
  readonly capo?: number | undefined
  readonly tempo?: number | undefined
  readonly timeSignature: string
  readonly tuning: string
  readonly difficulty?: string | undefined

  /** Roadmap such as ["intro", "verse1", "chorus1"] */
  readonly structure?: readonly string[] | undefined
  readonly sections: readonly SongSection[]

  /** Voicings specific to this song, by chord name */
  readonly chords: Readonly<Record<string, ChordShape>>

  readonly patterns?: readonly PickingPattern[] | undefined
  readonly notes?: string | undefined

  readonly sourceUrl?: string | undefined
  readonly audioUrl?: string | undefined
}

export interface SongSectionInput {
  readonly type: string
  readonly label?: string | null | undefined
  readonly content?: string | null | undefined
  readonly tab?: readonly TabLine[] | null | undefined
  readonly barProgression?: string | null | undefined
  readonly patternRef?: string | null | undefined
  readonly repeat?: number | null | undefined
}

export interface PickingPatternInput {
  readonly name: string
  readonly notation: string
  readonly beatsPerBar?: number | null | undefined
  readonly tab?: readonly TabLine[] | null | undefined
}

/** Loosely-typed song as it arrives from JSON; see makeSong */
export interface SongInput {
  readonly title: string
  readonly artist: string
  readonly writers?: readonly string[] | null | undefined
  readonly key?: string | null | undefined
  readonly capo?: number | null | undefined
  readonly tempo?: number | null | undefined
  readonly timeSignature?: string | null | undefined
  readonly tuning?: string | null | undefined
  readonly difficulty?: string | null | undefined
  readonly structure?: readonly string[] | null | undefined
  readonly sections?: readonly SongSectionInput[] | null | undefined
  readonly chords?: Readonly<Record<string, ChordShapeInput>> | null | undefined
  readonly patterns?: readonly PickingPatternInput[] | null | undefined
  readonly notes?: string | null | undefined
  readonly sourceUrl?: string | null | undefined
  readonly audioUrl?: string | null | undefined
}
