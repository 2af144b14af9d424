import { HistoryConfig, getHistoryConfig } from '../config'
import { PlatformRegistry, createPlatformRegistry } from '../compute/computePlatform'
import { LocalCompute } from '../compute/localCompute'
import { NullCompute } from '../compute/nullCompute'
import { openStorage } from '../storage/engine'
import { Storage } from '../storage/interfaces'

/** Everything a history command runs against. */
export interface CommandContext {
  storage: Storage
  platforms: PlatformRegistry
  config: HistoryConfig
  // one call per output line
  print: (line: string) => void
}

/**
 * Context from the environment. Platforms that need credentials or a
 * cluster (CAIP, GKE) are registered by the caller.
 */
export async function createCommandContext(
  platforms: PlatformRegistry = createPlatformRegistry(new LocalCompute(), new NullCompute()),
  config: HistoryConfig = getHistoryConfig()
): Promise<CommandContext> {
  return {
    storage: await openStorage(config),
    platforms,
    config,
    print: (line) => console.log(line),
  }
}
