export { LoggerImpl } from "./logger-impl.js";
export { LOG_LEVELS, getCurrentLevel, isLogLevel, setLogLevel, type LogLevel } from "./log-level.js";
export { formatLogLine } from "./format.js";
export { ConsoleSink, FileSink, openLogSinks, type OpenedLogSinks } from "./sinks.js";
