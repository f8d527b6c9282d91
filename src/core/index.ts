import { Layer, pipe } from "effect"

import { ShellServiceLive } from "./services/ShellService"
import { HdiutilDiskImageService } from "./services/DiskImageService"
import { MacOpenLauncher } from "./services/AppLauncherService"
import { FileProbeServiceLive } from "./services/FileProbeService"
import { LoggerServiceLive } from "./services/LoggerService"

export type { WorkflowConfig } from "./domain/WorkflowConfig"
export {
  loadWorkflowConfig,
  workflowConfig,
  defaultWorkflowConfig,
  configEnvVars,
  InvalidConfiguration,
} from "./domain/WorkflowConfig"
export type { DiskImageDescriptor, SystemEntity, CommandOutcome } from "./domain/DiskImage"

export type {
  DiskImageCommandFailed,
  DiskImageInfoUnavailable,
  DiskImageInfoUnreadable,
} from "./services/DiskImageService"
export type { LaunchFailed } from "./services/AppLauncherService"

export * from "./workflow"

/**
 * Every live service the commands need. Requires a CommandExecutor and a
 * FileSystem from the platform layer.
 */
export const AppLive = pipe(
  Layer.mergeAll(HdiutilDiskImageService, MacOpenLauncher),
  Layer.provide(ShellServiceLive),
  Layer.merge(FileProbeServiceLive),
  Layer.merge(LoggerServiceLive)
)
