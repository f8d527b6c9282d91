export { ShellServiceTag, ShellServiceLive, ShellError, describeCommand } from "./ShellService"
export type { ShellService, ShellResult } from "./ShellService"
