export type { LogContext } from "./logger";
export { childLogger, elapsedTimer, logger, redactionPaths, requestLogger, toErrorObject } from "./logger";
