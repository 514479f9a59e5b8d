import { describe, expect, it } from "vitest"
import {
  parseChordLabel,
  transposeChord,
  transposeChordLine,
  transposeChordProText,
} from "./transpose"

describe("parseChordLabel", () => {
  it("splits root, suffix and bass", () => {
    expect(parseChordLabel("Am7/G")).toEqual({ root: "A", suffix: "m7", bass: "G" })
    expect(parseChordLabel("Bbmaj7")).toEqual({ root: "Bb", suffix: "maj7" })
    expect(parseChordLabel("F#m7b5")).toEqual({ root: "F#", suffix: "m7b5" })
  })

  it("reads 6/9 as a suffix rather than a bass note", () => {
    expect(parseChordLabel("C6/9")).toEqual({ root: "C", suffix: "6/9" })
    expect(parseChordLabel("Gm6/9/D")).toEqual({ root: "G", suffix: "m6/9", bass: "D" })
  })

  it("rejects words that only start like a chord", () => {
    expect(parseChordLabel("Chorus")).toBeNull()
    expect(parseChordLabel("Bridge")).toBeNull()
    expect(parseChordLabel("x2")).toBeNull()
    expect(parseChordLabel("C/x")).toBeNull()
  })
})

describe("transposeChord", () => {
  it("shifts simple roots up", () => {
    expect(transposeChord("G", 2)).toBe("A")
    expect(transposeChord("B", 1)).toBe("C")
    expect(transposeChord("Am", 3)).toBe("Cm")
  })

  it("shifts roots down", () => {
    expect(transposeChord("A", -3)).toBe("F#")
    expect(transposeChord("C", -1)).toBe("B")
  })

  it("keeps the suffix", () => {
    expect(transposeChord("F#m7", 1)).toBe("Gm7")
    expect(transposeChord("Dsus4", 2)).toBe("Esus4")
    expect(transposeChord("Cadd9", 7)).toBe("Gadd9")
  })

  it("keeps flat spellings for flat roots", () => {
    expect(transposeChord("Bb", 2)).toBe("C")
    expect(transposeChord("Eb", -1)).toBe("D")
    expect(transposeChord("Ab", 1)).toBe("A")
    expect(transposeChord("Eb", 1)).toBe("E")
    expect(transposeChord("Db", 1)).toBe("D")
    expect(transposeChord("Bb", 1)).toBe("B")
    expect(transposeChord("Gb", 3)).toBe("A")
    expect(transposeChord("Ab", 2)).toBe("Bb")
  })

  it("transposes the bass of slash chords", () => {
    expect(transposeChord("C/G", 2)).toBe("D/A")
    expect(transposeChord("D/F#", 2)).toBe("E/G#")
  })

  it("transposes 6/9 chords", () => {
    expect(transposeChord("C6/9", 2)).toBe("D6/9")
    expect(transposeChord("Eb6/9/Bb", 2)).toBe("F6/9/C")
  })

  it("understands rare enharmonic spellings", () => {
    expect(transposeChord("Cb", 1)).toBe("C")
    expect(transposeChord("E#", 1)).toBe("F#")
  })

  it("returns the label unchanged for shifts of 0 or whole octaves", () => {
    for (const label of ["G", "Bbm", "F#m7b5", "D/F#", "Cb", "E#7"]) {
      expect(transposeChord(label, 0)).toBe(label)
      expect(transposeChord(label, 12)).toBe(label)
      expect(transposeChord(label, -24)).toBe(label)
    }
  })

  it("passes unparseable labels through", () => {
    expect(transposeChord("Chorus", 2)).toBe("Chorus")
    expect(transposeChord("N.C.", 3)).toBe("N.C.")
    expect(transposeChord("x2", 1)).toBe("x2")
    expect(transposeChord("H7", 1)).toBe("H7")
    expect(transposeChord("", 5)).toBe("")
  })
})

describe("transposeChordLine", () => {
  it("transposes every chord", () => {
    expect(transposeChordLine(["G", "C", "D"], 5)).toEqual(["C", "F", "G"])
  })
})

describe("transposeChordProText", () => {
  it("rewrites bracketed chords and leaves lyrics alone", () => {
    expect(transposeChordProText("[G]Hello [C]World", 2)).toBe("[A]Hello [D]World")
  })

  it("leaves non-chord brackets unchanged", () => {
    expect(transposeChordProText("[Intro] [G] [x2]", 2)).toBe("[Intro] [A] [x2]")
  })

  it("rewrites 6/9 chords with the rest of the line", () => {
    expect(transposeChordProText("[G6/9]Sky [D]blue", 2)).toBe("[A6/9]Sky [E]blue")
  })

  it("handles multi-line text", () => {
    expect(transposeChordProText("[Am]one\n[F]two", -2)).toBe("[Gm]one\n[D#]two")
  })
})
