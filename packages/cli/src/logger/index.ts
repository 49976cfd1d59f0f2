// pattern: Functional Core

export { createLogger, mapLogLevelToPinoLevel } from "./config.js";
export {
  CLI_LOGGER,
  getCliLogger,
  initializeLogger,
  setCliLogLevel,
} from "./instance.js";
export { default as createRenderer } from "./renderer.js";
export {
  isLogFormat,
  isLogLevel,
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
} from "./types.js";
