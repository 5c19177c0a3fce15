import { loadDiscoveryConfig } from '../../config/discovery.js'
import { loadSettings } from '../../config/settings.js'
import type { Settings } from '../../config/settings.js'
import type { DiscoveryConfig } from '../../types.js'

export interface CommandEnvironment {
  settings: Settings
  config: DiscoveryConfig
}

export async function loadCommandEnvironment(): Promise<CommandEnvironment> {
  const settings = loadSettings()
  const config = await loadDiscoveryConfig(settings.discoveryConfigPath)
  return { settings, config }
}
