export {
  ProcessInvoker,
  spawnProcess,
  MAX_OUTPUT_BYTES,
  type ProcessSpec,
  type ProcessHandle,
  type ProcessLauncher,
  type ProcessInvokerOptions,
  type OutputSnapshot,
} from './process-invoker.js';
export { buildChildEnv, type ChildEnvOptions } from './child-env.js';
