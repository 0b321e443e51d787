export {
  TreeToolError,
  UsageError,
  InvalidFormatError,
  NotFoundError,
  NotADirectoryError,
  NotAFileError,
  IoError,
  ConfigError,
  isTreeToolError,
  isErrnoException,
  toIoError,
  type TreeToolErrorCode,
  type IndexError,
} from "./catalog.js";
