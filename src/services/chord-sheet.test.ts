import { testSongInput } from "@/lib/song/fixtures"
import { makeSong } from "@/lib/song/song"
import { ConfigError, Effect, Layer } from "effect"
import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { ChordSheetService, ChordSheetServiceLive } from "./chord-sheet"
import { makeAppConfigProvider } from "./config-provider"
import { DiagramConfig, DiagramConfigLive } from "./diagram-config"

const makeTestLayer = (overrides: Record<string, string> = {}) => {
  const config = DiagramConfigLive.pipe(
    Layer.provide(Layer.setConfigProvider(makeAppConfigProvider(overrides))),
  )
  return Layer.mergeAll(config, ChordSheetServiceLive.pipe(Layer.provide(config)))
}

const song = Effect.runSync(makeSong(testSongInput))

describe("ChordSheetService", () => {
  let logSpy: MockInstance<typeof console.log>

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {})
  })

  afterEach(() => {
    logSpy.mockRestore()
  })

  const loggedEvents = (): unknown[] => logSpy.mock.calls.map(call => JSON.parse(String(call[0])))

  it("renders a library chord and logs where it came from", async () => {
    const scene = await Effect.runPromise(
      Effect.gen(function* () {
        const service = yield* ChordSheetService
        return yield* service.renderChord("G")
      }).pipe(Effect.provide(makeTestLayer())),
    )

    expect(scene.width).toBe(60)
    expect(scene.primitives).toHaveLength(23)
    expect(loggedEvents()).toMatchObject([
      { event: "chord_render", chord: "G", source: "common", primitiveCount: 23 },
    ])
  })

  it("fails with ChordNotFoundError for unknown chords", async () => {
    const error = await Effect.runPromise(
      Effect.gen(function* () {
        const service = yield* ChordSheetService
        return yield* service.renderChord("Xyz")
      }).pipe(Effect.flip, Effect.provide(makeTestLayer())),
    )

    expect(error).toMatchObject({ _tag: "ChordNotFoundError", name: "Xyz" })
    expect(loggedEvents()).toMatchObject([{ chord: "Xyz", source: "none", primitiveCount: 0 }])
  })

  it("renders the song's own voicing before the library", async () => {
    const custom = { name: "G", frets: [3, 5, 5, 4, 3, 3], barre: 3, baseFret: 3 }
    await Effect.runPromise(
      Effect.gen(function* () {
        const service = yield* ChordSheetService
        return yield* service.renderChord("G", { G: custom })
      }).pipe(Effect.provide(makeTestLayer())),
    )

    expect(loggedEvents()).toMatchObject([{ chord: "G", source: "song" }])
  })

  it("sizes diagrams from configuration", async () => {
    const svg = await Effect.runPromise(
      Effect.gen(function* () {
        const service = yield* ChordSheetService
        return yield* service.renderChordSvg("Am")
      }).pipe(Effect.provide(makeTestLayer({ DIAGRAM_WIDTH: "100", DIAGRAM_HEIGHT: "120" }))),
    )

    expect(svg.split("\n")[0]).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="120" viewBox="0 0 100 120">',
    )
  })

  it("renders a song with the configured strip spacing", async () => {
    const sheet = await Effect.runPromise(
      Effect.gen(function* () {
        const service = yield* ChordSheetService
        return yield* service.renderSong(song)
      }).pipe(Effect.provide(makeTestLayer({ DIAGRAM_STRIP_SPACING: "20" }))),
    )

    expect(sheet.chordStrip.width).toBe(220)
    expect(sheet.missingChords).toEqual(["Xyz"])
    expect(loggedEvents()).toMatchObject([
      { event: "sheet_render", title: "Test Song", chordCount: 4, missingChords: 1, sectionCount: 3 },
    ])
  })

  it("serializes the song's chord strip as SVG", async () => {
    const svg = await Effect.runPromise(
      Effect.gen(function* () {
        const service = yield* ChordSheetService
        return yield* service.renderSongStripSvg(song)
      }).pipe(Effect.provide(makeTestLayer())),
    )

    const lines = svg.split("\n")
    expect(lines[0]).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="200" height="80" viewBox="0 0 200 80">',
    )
    expect(lines.at(-1)).toBe("</svg>")
    expect(loggedEvents()).toMatchObject([{ event: "sheet_render", chordCount: 4 }])
  })

  it("aligns a single line", async () => {
    const aligned = await Effect.runPromise(
      Effect.gen(function* () {
        const service = yield* ChordSheetService
        return yield* service.alignLine("[Am]Over [F]there")
      }).pipe(Effect.provide(makeTestLayer())),
    )

    expect(aligned).toEqual({ chordRow: "Am   F    ", lyricRow: "Over there" })
  })
})

describe("DiagramConfig", () => {
  it("uses the default geometry", async () => {
    const config = await Effect.runPromise(DiagramConfig.pipe(Effect.provide(makeTestLayer())))

    expect(config).toEqual({
      dimensions: { width: 60, height: 80, paddingTop: 18, paddingBottom: 8, paddingSide: 8 },
      stripSpacing: 10,
    })
  })

  it("rejects padding that leaves no grid", async () => {
    const error = await Effect.runPromise(
      DiagramConfig.pipe(
        Effect.provide(makeTestLayer({ DIAGRAM_PADDING_SIDE: "30" })),
        Effect.flip,
      ),
    )

    expect(ConfigError.isConfigError(error)).toBe(true)
  })
})
