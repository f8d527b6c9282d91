export { LoggerServiceTag, LoggerServiceLive, makeLoggerService, consoleSink } from "./LoggerService"
export type { LoggerService, OutputSink, MountPointSource } from "./LoggerService"
