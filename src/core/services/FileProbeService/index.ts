export { FileProbeServiceTag, FileProbeServiceLive, makeFileProbe } from "./FileProbeService"
export type { FileProbeService } from "./FileProbeService"
