export * from "./buffer/index.ts";
export { InvalidInputError, MalformedPatchError } from "./errors.ts";
export {
  createLineLogger,
  type LineLoggerOptions,
  type Logger,
  LogLevel,
  silentLogger,
} from "./logger.ts";
export * from "./patch/index.ts";
export * from "./suggestion/index.ts";
