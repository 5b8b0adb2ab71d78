export * from "./model/index.ts";
export * from "./importers/index.ts";
export * from "./executor.ts";
export * from "./persistence.ts";
export * from "./settings.ts";
export * from "./workspace.ts";
export {
  Logger,
  createLogger,
  setLogLevel,
  getLogLevel,
  LOG_LEVELS,
  type LogLevel,
} from "./logger.ts";
