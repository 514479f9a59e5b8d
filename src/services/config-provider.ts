import { ConfigProvider, Layer } from "effect"

/**
 * Config provider backed by explicit overrides first, then the process environment
 */
export const makeAppConfigProvider = (
  overrides: Readonly<Record<string, string | undefined>> = {},
): ConfigProvider.ConfigProvider => {
  const overrideMap = new Map(
    Object.entries(overrides).flatMap(([key, value]) =>
      typeof value === "string" ? [[key, value] as const] : [],
    ),
  )

  return ConfigProvider.orElse(ConfigProvider.fromMap(overrideMap), () => ConfigProvider.fromEnv())
}

export const AppConfigProvider = makeAppConfigProvider()

export const AppConfigProviderLive = Layer.setConfigProvider(AppConfigProvider)
