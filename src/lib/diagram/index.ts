// Types
export type {
  CirclePrimitive,
  DiagramDimensions,
  DiagramPrimitive,
  DiagramScene,
  DiagramTheme,
  LinePrimitive,
  PrimitiveRole,
  RectPrimitive,
  TextPrimitive,
} from "./scene"

export { DEFAULT_DIAGRAM_DIMENSIONS, DEFAULT_DIAGRAM_THEME, translatePrimitive } from "./scene"

// Engine
export { NUM_FRETS, barreStrings, renderChordDiagram, type DiagramOptions } from "./diagram-engine"
export { DEFAULT_STRIP_SPACING, composeChordStrip, type StripOptions } from "./diagram-strip"
export { escapeXml, formatNumber, sceneToSvg, type SvgOptions } from "./diagram-svg"
