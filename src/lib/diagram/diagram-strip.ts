import type { ChordShape } from "@/lib/chords/chord-shape"
import { type DiagramOptions, renderChordDiagram } from "./diagram-engine"
import { DEFAULT_DIAGRAM_DIMENSIONS, type DiagramScene, translatePrimitive } from "./scene"

export const DEFAULT_STRIP_SPACING = 10

export interface StripOptions extends DiagramOptions {
  readonly spacing?: number | undefined
}

/**
 * Place diagrams left to right, each shifted by `i * (diagramWidth + spacing)`.
 */
export function composeChordStrip(
  chords: readonly ChordShape[],
  options: StripOptions = {},
): DiagramScene {
  const dims = options.dimensions ?? DEFAULT_DIAGRAM_DIMENSIONS
  const spacing = options.spacing ?? DEFAULT_STRIP_SPACING

  if (chords.length === 0) {
    return { width: 0, height: dims.height, primitives: [] }
  }

  const primitives = chords.flatMap((chord, index) => {
    const offset = index * (dims.width + spacing)
    return renderChordDiagram(chord, options).primitives.map(p => translatePrimitive(p, offset))
  })

  return {
    width: chords.length * dims.width + (chords.length - 1) * spacing,
    height: dims.height,
    primitives,
  }
}
