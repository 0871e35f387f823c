export {
  VAGRANT_CATALOG,
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
} from './catalog.js';
export { VAGRANT_HANDLERS } from './handlers.js';
export { createVagrantRegistry } from './register.js';
export { checkVagrantBinary, type HealthCheckOptions } from './health.js';
