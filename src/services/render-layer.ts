import { Layer } from "effect"
import { ChordSheetServiceLive } from "./chord-sheet"
import { AppConfigProviderLive } from "./config-provider"
import { DiagramConfigLive } from "./diagram-config"

export const ConfigLayer = DiagramConfigLive.pipe(Layer.provide(AppConfigProviderLive))

export const RenderLayer = Layer.mergeAll(
  ConfigLayer,
  ChordSheetServiceLive.pipe(Layer.provide(ConfigLayer)),
)
