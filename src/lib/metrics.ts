/**
 * Structured metrics logging for observability
 */

interface ChordRenderMetric {
  readonly event: "chord_render"
  readonly chord: string
  readonly source: "song" | "common" | "database" | "none"
  readonly primitiveCount: number
  readonly timestamp: string
}

interface SheetRenderMetric {
  readonly event: "sheet_render"
  readonly title: string
  readonly chordCount: number
  readonly missingChords: number
  readonly sectionCount: number
  readonly latencyMs: number
  readonly timestamp: string
}

export function logChordRenderMetrics(
  chord: string,
  source: ChordRenderMetric["source"],
  primitiveCount: number,
): void {
  const metric: ChordRenderMetric = {
    event: "chord_render",
    chord,
    source,
    primitiveCount,
    timestamp: new Date().toISOString(),
  }
  console.log(JSON.stringify(metric))
}

export function logSheetRenderMetrics(
  title: string,
  chordCount: number,
  missingChords: number,
  sectionCount: number,
  latencyMs: number,
): void {
  const metric: SheetRenderMetric = {
    event: "sheet_render",
    title: title.slice(0, 50),
    chordCount,
    missingChords,
    sectionCount,
    latencyMs,
    timestamp: new Date().toISOString(),
  }
  console.log(JSON.stringify(metric))
}
