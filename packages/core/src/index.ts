export * from './request/index.ts';
export * from './serialization/index.ts';
export {
  InvalidArgumentError,
  RequestDescriptorError,
  SerializationError,
  UriResolutionError,
} from './errors.ts';
export { loadEnvironmentConfig, DEFAULT_LOG_LEVEL, type EnvironmentConfig } from './config.ts';
export { log, isValidLogLevel } from './log.ts';
export { toHttpMethod, type HttpMethod } from './utils.ts';
export {
  App,
  collectPair,
  createProgram,
  program,
  resolveRequest,
  type AppOptions,
  type ProgramOutput,
  type ResolveOptions,
} from './main.ts';
