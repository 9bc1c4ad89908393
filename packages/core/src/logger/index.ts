export { ConsoleLogger, createLogger, setLogLevel, isLogLevel, logger } from "./logger";
export type { Logger, LogLevel } from "./logger";
