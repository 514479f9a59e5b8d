/**
 * SVG serialization for diagram scenes
 */

import type { DiagramPrimitive, DiagramScene } from "./scene"

export interface SvgOptions {
  readonly fontFamily?: string | undefined
}

const DEFAULT_FONT_FAMILY = "Arial, sans-serif"

export function formatNumber(value: number): string {
  return String(Math.round(value * 100) / 100)
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
}

function attrs(values: Record<string, string | number | undefined>): string {
  return Object.entries(values)
    .flatMap(([key, value]) => {
      if (value === undefined) return []
      const formatted = typeof value === "number" ? formatNumber(value) : escapeXml(value)
      return [`${key}="${formatted}"`]
    })
    .join(" ")
}

function primitiveToSvg(primitive: DiagramPrimitive, fontFamily: string): string {
  switch (primitive.kind) {
    case "line":
      return `<line ${attrs({
        x1: primitive.x1,
        y1: primitive.y1,
        x2: primitive.x2,
        y2: primitive.y2,
        stroke: primitive.stroke,
        "stroke-width": primitive.strokeWidth,
      })}/>`
    case "rect":
      return `<rect ${attrs({
        x: primitive.x,
        y: primitive.y,
        width: primitive.width,
        height: primitive.height,
        rx: primitive.rx,
        fill: primitive.fill,
      })}/>`
    case "circle":
      return `<circle ${attrs({
        cx: primitive.cx,
        cy: primitive.cy,
        r: primitive.r,
        fill: primitive.fill,
        stroke: primitive.stroke,
        "stroke-width": primitive.strokeWidth,
      })}/>`
    case "text":
      return `<text ${attrs({
        x: primitive.x,
        y: primitive.y,
        "font-family": fontFamily,
        "font-size": primitive.fontSize,
        "font-weight": primitive.fontWeight,
        fill: primitive.fill,
        "text-anchor": primitive.anchor,
        "dominant-baseline": primitive.baseline,
      })}>${escapeXml(primitive.text)}</text>`
  }
}

/**
 * Serialize a scene as a standalone SVG document
 */
export function sceneToSvg(scene: DiagramScene, options: SvgOptions = {}): string {
  const fontFamily = options.fontFamily ?? DEFAULT_FONT_FAMILY
  const width = formatNumber(scene.width)
  const height = formatNumber(scene.height)

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    ...scene.primitives.map(p => primitiveToSvg(p, fontFamily)),
    "</svg>",
  ].join("\n")
}
