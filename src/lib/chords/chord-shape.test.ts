import { Effect, Either } from "effect"
import { describe, expect, it } from "vitest"
import { decodeChordShape, displayRow, makeChordShape } from "./chord-shape"

const failureField = (input: Parameters<typeof decodeChordShape>[0]) =>
  Either.match(decodeChordShape(input), {
    onLeft: error => error.field,
    onRight: () => null,
  })

describe("decodeChordShape", () => {
  it("accepts a well-formed shape and defaults baseFret to 1", () => {
    const result = decodeChordShape({ name: "Am", frets: [-1, 0, 2, 2, 1, 0] })
    expect(Either.getOrNull(result)).toEqual({
      name: "Am",
      frets: [-1, 0, 2, 2, 1, 0],
      baseFret: 1,
    })
  })

  it("keeps fingers and barre when given", () => {
    const shape = Either.getOrNull(
      decodeChordShape({
        name: "F",
        frets: [1, 3, 3, 2, 1, 1],
        fingers: [1, 3, 4, 2, 1, 1],
        barre: 1,
      }),
    )
    expect(shape?.fingers).toEqual([1, 3, 4, 2, 1, 1])
    expect(shape?.barre).toBe(1)
  })

  it("drops null optional fields", () => {
    const shape = Either.getOrNull(
      decodeChordShape({ name: "E", frets: [0, 2, 2, 1, 0, 0], fingers: null, barre: null }),
    )
    expect(shape).not.toBeNull()
    expect(shape && "fingers" in shape).toBe(false)
    expect(shape && "barre" in shape).toBe(false)
  })

  it("trims the name", () => {
    const shape = Either.getOrNull(decodeChordShape({ name: " G ", frets: [3, 2, 0, 0, 0, 3] }))
    expect(shape?.name).toBe("G")
  })

  it("rejects the wrong number of strings", () => {
    expect(failureField({ name: "G", frets: [3, 2, 0, 0, 0] })).toBe("frets")
    expect(failureField({ name: "G", frets: [3, 2, 0, 0, 0, 3, 3] })).toBe("frets")
  })

  it("rejects fret values outside -1..24", () => {
    expect(failureField({ name: "G", frets: [3, 2, 0, 0, 0, 25] })).toBe("frets")
    expect(failureField({ name: "G", frets: [-2, 2, 0, 0, 0, 3] })).toBe("frets")
    expect(failureField({ name: "G", frets: [1.5, 2, 0, 0, 0, 3] })).toBe("frets")
  })

  it("rejects bad finger data", () => {
    const frets = [3, 2, 0, 0, 0, 3]
    expect(failureField({ name: "G", frets, fingers: [2, 1, 0, 0, 0] })).toBe("fingers")
    expect(failureField({ name: "G", frets, fingers: [2, 1, 0, 0, 0, 5] })).toBe("fingers")
  })

  it("rejects a barre or base fret out of range", () => {
    const frets = [1, 3, 3, 2, 1, 1]
    expect(failureField({ name: "F", frets, barre: 0 })).toBe("barre")
    expect(failureField({ name: "F", frets, baseFret: 0 })).toBe("baseFret")
  })

  it("rejects an empty name", () => {
    expect(failureField({ name: "  ", frets: [3, 2, 0, 0, 0, 3] })).toBe("name")
  })

  it("reports the chord and a message", () => {
    const error = Either.getLeft(decodeChordShape({ name: "G", frets: [3, 2, 0] }))
    expect(error._tag).toBe("Some")
    if (error._tag === "Some") {
      expect(error.value._tag).toBe("ChordShapeError")
      expect(error.value.chord).toBe("G")
      expect(error.value.message).toBe("Must have exactly 6 fret positions (one per string)")
    }
  })
})

describe("makeChordShape", () => {
  it("succeeds with the validated shape", () => {
    const shape = Effect.runSync(makeChordShape({ name: "D", frets: [-1, -1, 0, 2, 3, 2] }))
    expect(shape.baseFret).toBe(1)
  })

  it("fails with a ChordShapeError", () => {
    const error = Effect.runSync(Effect.flip(makeChordShape({ name: "D", frets: [] })))
    expect(error._tag).toBe("ChordShapeError")
    expect(error.field).toBe("frets")
  })
})

describe("displayRow", () => {
  it("counts rows from the base fret", () => {
    expect(displayRow(1, 1)).toBe(1)
    expect(displayRow(5, 3)).toBe(3)
    expect(displayRow(2, 3)).toBe(0)
  })
})
