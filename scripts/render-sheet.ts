#!/usr/bin/env -S npx tsx
/**
 * CLI script to print a chord sheet from a song JSON file.
 *
 * Usage:
 *   npm run render -- <song.json> [chords.svg]
 *
 * This script:
 * 1. Reads and validates the song JSON
 * 2. Lays out the sheet (diagram sizes come from DIAGRAM_* environment variables)
 * 3. Prints the aligned chord/lyric text to stdout
 * 4. Writes the chord diagram strip as SVG when an output path is given
 */

import { readFile, writeFile } from "node:fs/promises"
import { Effect } from "effect"
import { sceneToSvg } from "../src/lib/diagram/diagram-svg"
import { chordSheetToText } from "../src/lib/song/sheet-layout"
import { parseSongJson } from "../src/lib/song/song-schema"
import { ChordSheetService } from "../src/services/chord-sheet"
import { RenderLayer } from "../src/services/render-layer"

const [songPath, svgPath] = process.argv.slice(2)

if (!songPath) {
  console.error("Usage: npm run render -- <song.json> [chords.svg]")
  process.exit(1)
}

const program = Effect.gen(function* () {
  const text = yield* Effect.tryPromise(() => readFile(songPath, "utf-8"))
  const song = yield* parseSongJson(text)
  const sheets = yield* ChordSheetService
  const sheet = yield* sheets.renderSong(song)

  for (const line of chordSheetToText(sheet)) {
    console.log(line)
  }

  if (sheet.missingChords.length > 0) {
    console.error(`  ! No voicing for: ${sheet.missingChords.join(", ")}`)
  }

  if (svgPath) {
    yield* Effect.tryPromise(() => writeFile(svgPath, sceneToSvg(sheet.chordStrip)))
    console.error(`  ✓ Chord strip written to ${svgPath}`)
  }
})

Effect.runPromise(program.pipe(Effect.provide(RenderLayer))).catch((error: unknown) => {
  console.error("Failed to render sheet:", error)
  process.exit(1)
})
