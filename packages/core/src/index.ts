// Tool definitions and dispatch artifacts
export type {
  JSONSchema,
  InputSchema,
  ParameterType,
  ToolParameter,
  ToolScope,
  ToolAnnotations,
  ToolDefinition,
  ToolParams,
  InvocationRequest,
  ExecutionResult,
  ToolErrorKind,
  ToolResponse,
} from './tools.js';
export { toInputSchema } from './tools.js';

// Logging
export type { Logger, LogLevel, LogSink } from './logger.js';
export { LOG_LEVELS, isLogLevel, createConsoleLogger, silentLogger } from './logger.js';

// Configuration
export type {
  VagrantMcpConfig,
  ServerConfig,
  VagrantConfig,
  TimeoutsConfig,
  LoggingConfig,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  validateConfig,
  checkConfig,
  loadConfig,
  CONFIG_PATH_ENV,
  type ConfigValidationError,
  type ConfigValidationResult,
  type LoadConfigOptions,
} from './config-validator.js';
export { applyEnvOverrides, applyVagrantEnv } from './config-env-overlay.js';
export { ConfigError } from './errors.js';

// Utilities
export { isRecord, deepMerge, formatSeconds } from './utils.js';
