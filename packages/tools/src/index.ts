export const PACKAGE_NAME = '@vagrant-mcp/tools';

export {
  ToolRegistry,
  type ToolHandler,
  type ToolHandlerTable,
  type RegisteredTool,
} from './registry.js';
export {
  validateParameters,
  stringParam,
  requireStringParam,
  flagParam,
} from './validation.js';
export {
  ToolConflictError,
  ToolNotFoundError,
  CatalogError,
  ToolValidationError,
  PathViolationError,
  ProjectNotFoundError,
  ExecutionError,
  TimeoutError,
} from './errors.js';
export { resolveProjectDirectory, assertRealPathWithinRoot, assertProjectReady } from './path-guard.js';
export { Dispatcher, formatCommandLine, type DispatcherOptions } from './dispatcher.js';

// Child processes
export {
  ProcessInvoker,
  spawnProcess,
  MAX_OUTPUT_BYTES,
  type ProcessSpec,
  type ProcessHandle,
  type ProcessLauncher,
  type ProcessInvokerOptions,
  type OutputSnapshot,
  buildChildEnv,
  type ChildEnvOptions,
} from './process/index.js';

// Vagrant catalog
export {
  VAGRANT_CATALOG,
  VAGRANT_HANDLERS,
  NAME_PATTERN,
  SNAPSHOT_ACTIONS,
  type SnapshotAction,
  statusToolDefinition,
  upToolDefinition,
  haltToolDefinition,
  destroyToolDefinition,
  sshToolDefinition,
  provisionToolDefinition,
  reloadToolDefinition,
  snapshotToolDefinition,
  globalStatusToolDefinition,
  createVagrantRegistry,
  checkVagrantBinary,
  type HealthCheckOptions,
} from './vagrant/index.js';
