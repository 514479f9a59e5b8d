/**
 * Decoding of songs stored as JSON
 */

import { type ChordShapeError, SongValidationError } from "@/lib/errors"
import { Effect, ParseResult, Schema } from "effect"
import { makeSong } from "./song"
import type { Song } from "./song-types"

const OptionalString = Schema.optional(Schema.NullOr(Schema.String))
const OptionalNumber = Schema.optional(Schema.NullOr(Schema.Number))

const TabLineSchema = Schema.Struct({
  e: Schema.String,
  B: Schema.String,
  G: Schema.String,
  D: Schema.String,
  A: Schema.String,
  E: Schema.String,
})

const ChordShapeInputSchema = Schema.Struct({
  name: Schema.String,
  frets: Schema.Array(Schema.Number),
  fingers: Schema.optional(Schema.NullOr(Schema.Array(Schema.Number))),
  barre: OptionalNumber,
  baseFret: OptionalNumber,
})

const SongSectionInputSchema = Schema.Struct({
  type: Schema.String,
  label: OptionalString,
  content: OptionalString,
  tab: Schema.optional(Schema.NullOr(Schema.Array(TabLineSchema))),
  barProgression: OptionalString,
  patternRef: OptionalString,
  repeat: OptionalNumber,
})

const PickingPatternInputSchema = Schema.Struct({
  name: Schema.String,
  notation: Schema.String,
  beatsPerBar: OptionalNumber,
  tab: Schema.optional(Schema.NullOr(Schema.Array(TabLineSchema))),
})

export const SongInputSchema = Schema.Struct({
  title: Schema.String,
  artist: Schema.String,
  writers: Schema.optional(Schema.NullOr(Schema.Array(Schema.String))),
  key: OptionalString,
  capo: OptionalNumber,
  tempo: OptionalNumber,
  timeSignature: OptionalString,
  tuning: OptionalString,
  difficulty: OptionalString,
  structure: Schema.optional(Schema.NullOr(Schema.Array(Schema.String))),
  sections: Schema.optional(Schema.NullOr(Schema.Array(SongSectionInputSchema))),
  chords: Schema.optional(
    Schema.NullOr(Schema.Record({ key: Schema.String, value: ChordShapeInputSchema })),
  ),
  patterns: Schema.optional(Schema.NullOr(Schema.Array(PickingPatternInputSchema))),
  notes: OptionalString,
  sourceUrl: OptionalString,
  audioUrl: OptionalString,
})

const decodeSongInput = Schema.decodeUnknown(Schema.parseJson(SongInputSchema))

/**
 * Parse song JSON text, check its shape, then validate it with makeSong
 */
export const parseSongJson = (
  text: string,
): Effect.Effect<Song, SongValidationError | ChordShapeError> =>
  decodeSongInput(text).pipe(
    Effect.mapError(
      error =>
        new SongValidationError({
          field: "json",
          message: ParseResult.TreeFormatter.formatErrorSync(error),
        }),
    ),
    Effect.flatMap(makeSong),
  )
