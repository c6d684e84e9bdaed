export {
  hasAvailable,
  isUint32,
  isUint8,
  viewOf,
} from "./bytes";
export { createConsoleLogger, NOOP_LOGGER } from "./logger";
export type { Logger, LogLevel } from "./logger";
export { collectLines, consoleSink } from "./sinks";
export type { LineSink } from "./sinks";
