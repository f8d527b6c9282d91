export {
  DiskImageServiceTag,
  HdiutilDiskImageService,
  DiskImageCommandFailed,
  DiskImageInfoUnavailable,
  DiskImageInfoUnreadable,
  parseHdiutilInfo,
} from "./DiskImageService"
export type { DiskImageService, DiskImageError, AttachOptions } from "./DiskImageService"
