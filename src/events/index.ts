export { EventLogger } from "./logger.js";
export type { EventCallback, EventLoggerOptions, LogOptions } from "./logger.js";
