export {
  ChordSheetService,
  ChordSheetServiceLive,
  type ChordSheetServiceShape,
} from "./chord-sheet"
export { AppConfigProvider, AppConfigProviderLive, makeAppConfigProvider } from "./config-provider"
export {
  DiagramConfig,
  DiagramConfigLive,
  type DiagramConfigValues,
} from "./diagram-config"
export { ConfigLayer, RenderLayer } from "./render-layer"
