/**
 * Vector scene types produced by the diagram engine
 */

export type PrimitiveRole =
  | "name"
  | "nut"
  | "base-fret"
  | "fret"
  | "string"
  | "mute"
  | "open"
  | "barre"
  | "dot"
  | "finger"

interface PrimitiveBase {
  readonly role: PrimitiveRole
  /** String index (0 = lowest pitch) for primitives that belong to one string */
  readonly string?: number | undefined
}

export interface LinePrimitive extends PrimitiveBase {
  readonly kind: "line"
  readonly x1: number
  readonly y1: number
  readonly x2: number
  readonly y2: number
  readonly stroke: string
  readonly strokeWidth: number
}

export interface RectPrimitive extends PrimitiveBase {
  readonly kind: "rect"
  readonly x: number
  readonly y: number
  readonly width: number
  readonly height: number
  readonly rx?: number | undefined
  readonly fill: string
}

export interface CirclePrimitive extends PrimitiveBase {
  readonly kind: "circle"
  readonly cx: number
  readonly cy: number
  readonly r: number
  /** "none" for hollow circles */
  readonly fill: string
  readonly stroke?: string | undefined
  readonly strokeWidth?: number | undefined
}

export interface TextPrimitive extends PrimitiveBase {
  readonly kind: "text"
  readonly x: number
  readonly y: number
  readonly text: string
  readonly fontSize: number
  readonly fontWeight?: "bold" | undefined
  readonly fill: string
  readonly anchor: "start" | "middle" | "end"
  readonly baseline?: "middle" | undefined
}

export type DiagramPrimitive = LinePrimitive | RectPrimitive | CirclePrimitive | TextPrimitive

export interface DiagramScene {
  readonly width: number
  readonly height: number
  readonly primitives: readonly DiagramPrimitive[]
}

export interface DiagramDimensions {
  readonly width: number
  readonly height: number
  /** Room above the grid for the chord name and string markers */
  readonly paddingTop: number
  readonly paddingBottom: number
  readonly paddingSide: number
}

export const DEFAULT_DIAGRAM_DIMENSIONS: DiagramDimensions = {
  width: 60,
  height: 80,
  paddingTop: 18,
  paddingBottom: 8,
  paddingSide: 8,
}

export interface DiagramTheme {
  readonly line: string
  readonly dot: string
  readonly text: string
  readonly muted: string
  readonly barre: string
  readonly fingerText: string
}

export const DEFAULT_DIAGRAM_THEME: DiagramTheme = {
  line: "#333333",
  dot: "#111111",
  text: "#111111",
  muted: "#666666",
  barre: "#222222",
  fingerText: "#ffffff",
}

export function translatePrimitive(primitive: DiagramPrimitive, dx: number): DiagramPrimitive {
  switch (primitive.kind) {
    case "line":
      return { ...primitive, x1: primitive.x1 + dx, x2: primitive.x2 + dx }
    case "rect":
      return { ...primitive, x: primitive.x + dx }
    case "circle":
      return { ...primitive, cx: primitive.cx + dx }
    case "text":
      return { ...primitive, x: primitive.x + dx }
  }
}
