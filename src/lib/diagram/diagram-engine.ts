/**
 * Chord diagram engine
 *
 * Lays out a single ChordShape as a fretboard diagram made of vector primitives. The output is
 * renderer-neutral: see diagram-svg.ts for SVG serialization.
 *
 * Layout (default 60x80):
 *
 *        name
 *   x  o          <- mute / open markers
 *   ==========    <- nut (or "Nfr" label when baseFret > 1)
 *   | | | | | |   <- 5 fret rows, 6 strings (lowest pitch on the left)
 */

import { type ChordShape, MUTED, OPEN, STRING_COUNT, displayRow } from "@/lib/chords/chord-shape"
import {
  DEFAULT_DIAGRAM_DIMENSIONS,
  DEFAULT_DIAGRAM_THEME,
  type DiagramDimensions,
  type DiagramPrimitive,
  type DiagramScene,
  type DiagramTheme,
} from "./scene"

export const NUM_FRETS = 5

const NUT_HEIGHT = 4
const MARKER_OFFSET = 8
const MARKER_SIZE = 3
const DOT_RADIUS = 4
const BARRE_HEIGHT = 6
const NAME_BASELINE = 12

export interface DiagramOptions {
  readonly dimensions?: DiagramDimensions | undefined
  readonly theme?: DiagramTheme | undefined
}

interface Grid {
  readonly dims: DiagramDimensions
  readonly theme: DiagramTheme
  readonly stringSpacing: number
  readonly fretSpacing: number
}

const stringX = (grid: Grid, string: number): number =>
  grid.dims.paddingSide + string * grid.stringSpacing

const fretY = (grid: Grid, fret: number): number => grid.dims.paddingTop + fret * grid.fretSpacing

/** Vertical centre of a display row's cell */
const rowCenterY = (grid: Grid, row: number): number => fretY(grid, row) - grid.fretSpacing / 2

const isVisibleRow = (row: number): boolean => row >= 1 && row <= NUM_FRETS

function renderName(grid: Grid, chord: ChordShape): DiagramPrimitive[] {
  return [
    {
      kind: "text",
      role: "name",
      x: grid.dims.width / 2,
      y: NAME_BASELINE,
      text: chord.name,
      fontSize: 12,
      fontWeight: "bold",
      fill: grid.theme.text,
      anchor: "middle",
    },
  ]
}

function renderGrid(grid: Grid, chord: ChordShape): DiagramPrimitive[] {
  const { dims, theme } = grid
  const primitives: DiagramPrimitive[] = []

  if (chord.baseFret === 1) {
    primitives.push({
      kind: "rect",
      role: "nut",
      x: dims.paddingSide - 1,
      y: dims.paddingTop - 3,
      width: dims.width - 2 * dims.paddingSide + 2,
      height: NUT_HEIGHT,
      fill: theme.line,
    })
  } else {
    primitives.push({
      kind: "text",
      role: "base-fret",
      x: dims.paddingSide - 6,
      y: fretY(grid, 1),
      text: `${chord.baseFret}fr`,
      fontSize: 8,
      fill: theme.text,
      anchor: "end",
      baseline: "middle",
    })
  }

  for (let fret = 0; fret <= NUM_FRETS; fret++) {
    const y = fretY(grid, fret)
    primitives.push({
      kind: "line",
      role: "fret",
      x1: dims.paddingSide,
      y1: y,
      x2: dims.width - dims.paddingSide,
      y2: y,
      stroke: theme.line,
      strokeWidth: 1,
    })
  }

  for (let string = 0; string < STRING_COUNT; string++) {
    const x = stringX(grid, string)
    primitives.push({
      kind: "line",
      role: "string",
      string,
      x1: x,
      y1: dims.paddingTop,
      x2: x,
      y2: fretY(grid, NUM_FRETS),
      stroke: theme.line,
      strokeWidth: 1,
    })
  }

  return primitives
}

function renderStringMarkers(grid: Grid, chord: ChordShape): DiagramPrimitive[] {
  const primitives: DiagramPrimitive[] = []
  const y = grid.dims.paddingTop - MARKER_OFFSET

  chord.frets.forEach((fret, string) => {
    const x = stringX(grid, string)

    if (fret === MUTED) {
      const stroke = { stroke: grid.theme.muted, strokeWidth: 1.5 }
      primitives.push(
        {
          kind: "line",
          role: "mute",
          string,
          x1: x - MARKER_SIZE,
          y1: y - MARKER_SIZE,
          x2: x + MARKER_SIZE,
          y2: y + MARKER_SIZE,
          ...stroke,
        },
        {
          kind: "line",
          role: "mute",
          string,
          x1: x - MARKER_SIZE,
          y1: y + MARKER_SIZE,
          x2: x + MARKER_SIZE,
          y2: y - MARKER_SIZE,
          ...stroke,
        },
      )
    } else if (fret === OPEN) {
      primitives.push({
        kind: "circle",
        role: "open",
        string,
        cx: x,
        cy: y,
        r: MARKER_SIZE,
        fill: "none",
        stroke: grid.theme.line,
        strokeWidth: 1,
      })
    }
  })

  return primitives
}

/**
 * Strings fretted exactly at the barre fret, or null when no bar should be drawn.
 *
 * Only exact matches count: strings fretted higher up the neck under a real barre are not part
 * of the span.
 */
export function barreStrings(chord: ChordShape): readonly number[] | null {
  if (chord.barre === undefined) return null
  if (!isVisibleRow(displayRow(chord.barre, chord.baseFret))) return null

  const strings = chord.frets.flatMap((fret, string) => (fret === chord.barre ? [string] : []))
  return strings.length >= 2 ? strings : null
}

function renderBarre(grid: Grid, chord: ChordShape): DiagramPrimitive[] {
  const strings = barreStrings(chord)
  if (!strings || chord.barre === undefined) return []

  const x1 = stringX(grid, Math.min(...strings))
  const x2 = stringX(grid, Math.max(...strings))
  const y = rowCenterY(grid, displayRow(chord.barre, chord.baseFret))

  return [
    {
      kind: "rect",
      role: "barre",
      x: x1 - DOT_RADIUS,
      y: y - BARRE_HEIGHT / 2,
      width: x2 - x1 + 2 * DOT_RADIUS,
      height: BARRE_HEIGHT,
      rx: BARRE_HEIGHT / 2,
      fill: grid.theme.barre,
    },
  ]
}

function renderFingerDots(grid: Grid, chord: ChordShape): DiagramPrimitive[] {
  const primitives: DiagramPrimitive[] = []

  chord.frets.forEach((fret, string) => {
    if (fret <= 0) return

    const row = displayRow(fret, chord.baseFret)
    if (!isVisibleRow(row)) return

    const x = stringX(grid, string)
    const y = rowCenterY(grid, row)
    primitives.push({
      kind: "circle",
      role: "dot",
      string,
      cx: x,
      cy: y,
      r: DOT_RADIUS,
      fill: grid.theme.dot,
    })

    const finger = chord.fingers?.[string] ?? 0
    if (finger > 0) {
      primitives.push({
        kind: "text",
        role: "finger",
        string,
        x,
        y: y + 1,
        text: String(finger),
        fontSize: 6,
        fill: grid.theme.fingerText,
        anchor: "middle",
        baseline: "middle",
      })
    }
  })

  return primitives
}

/**
 * Lay out one chord diagram. Positions outside the five visible rows are left out.
 */
export function renderChordDiagram(chord: ChordShape, options: DiagramOptions = {}): DiagramScene {
  const dims = options.dimensions ?? DEFAULT_DIAGRAM_DIMENSIONS
  const grid: Grid = {
    dims,
    theme: options.theme ?? DEFAULT_DIAGRAM_THEME,
    stringSpacing: (dims.width - 2 * dims.paddingSide) / (STRING_COUNT - 1),
    fretSpacing: (dims.height - dims.paddingTop - dims.paddingBottom) / NUM_FRETS,
  }

  return {
    width: dims.width,
    height: dims.height,
    primitives: [
      ...renderName(grid, chord),
      ...renderGrid(grid, chord),
      ...renderStringMarkers(grid, chord),
      ...renderBarre(grid, chord),
      ...renderFingerDots(grid, chord),
    ],
  }
}
