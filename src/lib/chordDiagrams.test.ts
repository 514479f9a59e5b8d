import { describe, expect, it } from "vitest"
import {
  type ChordPosition,
  getAllChordShapes,
  isChordSupported,
  lookupChordShape,
  positionToShape,
} from "./chordDiagrams"
import { barreStrings } from "./diagram/diagram-engine"

const movedF: ChordPosition = {
  frets: [1, 3, 3, 2, 1, 1],
  fingers: [1, 3, 4, 2, 1, 1],
  barres: [1],
  baseFret: 5,
  midi: [],
}

describe("positionToShape", () => {
  it("converts relative frets to absolute frets", () => {
    expect(positionToShape("A", movedF)).toEqual({
      name: "A",
      frets: [5, 7, 7, 6, 5, 5],
      fingers: [1, 3, 4, 2, 1, 1],
      barre: 5,
      baseFret: 5,
    })
  })

  it("keeps muted and open strings as they are", () => {
    const shape = positionToShape("C", {
      frets: [-1, 3, 2, 0, 1, 0],
      fingers: [],
      barres: [],
      baseFret: 1,
      midi: [],
    })
    expect(shape).toEqual({ name: "C", frets: [-1, 3, 2, 0, 1, 0], baseFret: 1 })
  })

  it("produces a barre the diagram engine can draw in the first row", () => {
    const shape = positionToShape("A", movedF)
    expect(shape && barreStrings(shape)).toEqual([0, 4, 5])
  })

  it("rejects voicings that are not six strings", () => {
    expect(
      positionToShape("C", { frets: [0, 2, 3, 2], fingers: [], barres: [], baseFret: 1, midi: [] }),
    ).toBeNull()
  })
})

describe("lookupChordShape", () => {
  it("finds a voicing for common chord names", () => {
    const shape = lookupChordShape("G")
    expect(shape?.name).toBe("G")
    expect(shape?.frets).toHaveLength(6)
    expect(shape?.baseFret).toBeGreaterThanOrEqual(1)
  })

  it("maps alternative suffix spellings", () => {
    expect(lookupChordShape("Amin")?.frets).toEqual(lookupChordShape("Am")?.frets)
  })

  it("returns null for non-chords", () => {
    expect(lookupChordShape("Verse")).toBeNull()
    expect(isChordSupported("Verse")).toBe(false)
  })

  it("lists several positions for a chord", () => {
    expect(getAllChordShapes("C").length).toBeGreaterThan(1)
    expect(isChordSupported("C")).toBe(true)
  })
})
