import { Effect } from "effect"
import { describe, expect, it } from "vitest"
import { testSongInput } from "./fixtures"
import { parseSongJson } from "./song-schema"

describe("parseSongJson", () => {
  it("decodes and validates a song", () => {
    const song = Effect.runSync(parseSongJson(JSON.stringify(testSongInput)))
    expect(song.title).toBe("Test Song")
    expect(song.sections).toHaveLength(3)
    expect(song.timeSignature).toBe("4/4")
  })

  it("accepts null for optional fields", () => {
    const text = JSON.stringify({ title: "Tune", artist: "Someone", capo: null, sections: null })
    const song = Effect.runSync(parseSongJson(text))
    expect(song.capo).toBeUndefined()
    expect(song.sections).toEqual([])
  })

  it("reports malformed JSON as a validation error", () => {
    const error = Effect.runSync(Effect.flip(parseSongJson("{not json")))
    expect(error).toMatchObject({ _tag: "SongValidationError", field: "json" })
  })

  it("reports fields of the wrong type", () => {
    const error = Effect.runSync(
      Effect.flip(parseSongJson(JSON.stringify({ title: "Tune", artist: "Someone", capo: "two" }))),
    )
    expect(error).toMatchObject({ _tag: "SongValidationError", field: "json" })
  })

  it("runs the song rules after decoding", () => {
    const error = Effect.runSync(
      Effect.flip(parseSongJson(JSON.stringify({ title: "Tune", artist: "Someone", tempo: -5 }))),
    )
    expect(error).toMatchObject({ _tag: "SongValidationError", field: "tempo" })
  })
})
