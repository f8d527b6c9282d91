export {
  runDecryptAndLaunch,
  ensureMounted,
  queryMountPoint,
  openSecureProfile,
  openPersonalProfile,
  ejectVolume,
  resolveConfigPaths,
  ImageNotFound,
  BrowserNotFound,
  MountCommandFailed,
  MountFailed,
  MountPointUnresolved,
  BrowserLaunchFailed,
  BrowserExitedWithError,
} from "./DecryptLaunchWorkflow"
export type { WorkflowError, WorkflowOutcome, MountOutcome } from "./DecryptLaunchWorkflow"
export { showImageStatus, ejectImage, openImage, EjectFailed, OpenFailed } from "./imageCommands"
export type { ImageStatus } from "./imageCommands"
