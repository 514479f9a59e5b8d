import type { DiagramDimensions } from "@/lib/diagram/scene"
import { Config, Context, Layer } from "effect"

export interface DiagramConfigValues {
  readonly dimensions: DiagramDimensions
  readonly stripSpacing: number
}

export class DiagramConfig extends Context.Tag("DiagramConfig")<
  DiagramConfig,
  DiagramConfigValues
>() {}

const diagramConfig = Config.all({
  width: Config.number("DIAGRAM_WIDTH").pipe(Config.withDefault(60)),
  height: Config.number("DIAGRAM_HEIGHT").pipe(Config.withDefault(80)),
  paddingTop: Config.number("DIAGRAM_PADDING_TOP").pipe(Config.withDefault(18)),
  paddingBottom: Config.number("DIAGRAM_PADDING_BOTTOM").pipe(Config.withDefault(8)),
  paddingSide: Config.number("DIAGRAM_PADDING_SIDE").pipe(Config.withDefault(8)),
  stripSpacing: Config.number("DIAGRAM_STRIP_SPACING").pipe(Config.withDefault(10)),
}).pipe(
  Config.validate({
    message: "Diagram padding must leave a grid area of positive width and height",
    validation: values =>
      values.width - 2 * values.paddingSide > 0 &&
      values.height - values.paddingTop - values.paddingBottom > 0 &&
      values.stripSpacing >= 0,
  }),
  Config.map(({ stripSpacing, ...dimensions }) => ({ dimensions, stripSpacing })),
)

export const DiagramConfigLive = Layer.effect(DiagramConfig, diagramConfig)
