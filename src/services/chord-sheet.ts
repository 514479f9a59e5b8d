import { type AlignedLine, alignChordProLine } from "@/lib/chords/chordpro-line"
import { resolveChord } from "@/lib/chords/chord-library"
import type { ChordShape } from "@/lib/chords/chord-shape"
import { renderChordDiagram } from "@/lib/diagram/diagram-engine"
import { sceneToSvg } from "@/lib/diagram/diagram-svg"
import type { DiagramScene } from "@/lib/diagram/scene"
import { ChordNotFoundError } from "@/lib/errors"
import { logChordRenderMetrics, logSheetRenderMetrics } from "@/lib/metrics"
import { type ChordSheet, buildChordSheet } from "@/lib/song/sheet-layout"
import type { Song } from "@/lib/song/song-types"
import { Context, Effect, Layer } from "effect"
import { DiagramConfig } from "./diagram-config"

// ============================================================================
// Service Interface
// ============================================================================

export interface ChordSheetServiceShape {
  readonly renderChord: (
    name: string,
    songChords?: Readonly<Record<string, ChordShape>>,
  ) => Effect.Effect<DiagramScene, ChordNotFoundError>
  readonly renderChordSvg: (
    name: string,
    songChords?: Readonly<Record<string, ChordShape>>,
  ) => Effect.Effect<string, ChordNotFoundError>
  readonly alignLine: (line: string) => Effect.Effect<AlignedLine>
  readonly renderSong: (song: Song) => Effect.Effect<ChordSheet>
  readonly renderSongStripSvg: (song: Song) => Effect.Effect<string>
}

export class ChordSheetService extends Context.Tag("ChordSheetService")<
  ChordSheetService,
  ChordSheetServiceShape
>() {}

// ============================================================================
// Implementation
// ============================================================================

export const ChordSheetServiceLive = Layer.effect(
  ChordSheetService,
  Effect.gen(function* () {
    const config = yield* DiagramConfig

    const renderChord = (name: string, songChords: Readonly<Record<string, ChordShape>> = {}) =>
      Effect.gen(function* () {
        const resolved = resolveChord(name, songChords)
        if (!resolved) {
          logChordRenderMetrics(name, "none", 0)
          return yield* Effect.fail(new ChordNotFoundError({ name }))
        }

        const scene = renderChordDiagram(resolved.shape, { dimensions: config.dimensions })
        logChordRenderMetrics(name, resolved.source, scene.primitives.length)
        return scene
      })

    const renderSong = (song: Song) =>
      Effect.sync(() => {
        const started = performance.now()
        const sheet = buildChordSheet(song, {
          dimensions: config.dimensions,
          spacing: config.stripSpacing,
        })
        logSheetRenderMetrics(
          song.title,
          sheet.chordNames.length,
          sheet.missingChords.length,
          sheet.sections.length,
          Math.round(performance.now() - started),
        )
        return sheet
      })

    const service: ChordSheetServiceShape = {
      renderChord,
      renderChordSvg: (name, songChords) =>
        renderChord(name, songChords).pipe(Effect.map(scene => sceneToSvg(scene))),
      alignLine: line => Effect.sync(() => alignChordProLine(line)),
      renderSong,
      renderSongStripSvg: song =>
        renderSong(song).pipe(Effect.map(sheet => sceneToSvg(sheet.chordStrip))),
    }
    return service
  }),
)
