export { AppLauncherServiceTag, MacOpenLauncher, LaunchFailed, openArguments } from "./AppLauncherService"
export type { AppLauncherService, LaunchRequest } from "./AppLauncherService"
