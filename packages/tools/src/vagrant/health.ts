import { ExecutionError } from '../errors.js';
import type { ProcessInvoker } from '../process/process-invoker.js';

export interface HealthCheckOptions {
  binary: string;
  cwd: string;
  env: Record<string, string>;
  timeoutMs: number;
}

/**
 * Run `vagrant --version` and return the reported version line.
 * Throws ExecutionError (or TimeoutError) when the binary is unusable, so
 * the server can refuse to start before serving any call.
 */
export async function checkVagrantBinary(
  invoker: ProcessInvoker,
  options: HealthCheckOptions,
): Promise<string> {
  const result = await invoker.execute(
    { command: options.binary, args: ['--version'], cwd: options.cwd, env: options.env },
    options.timeoutMs,
  );

  if (result.exitCode !== 0) {
    throw new ExecutionError(
      'health_check_failed',
      `${options.binary} --version exited with code ${result.exitCode}: ${result.stderr.trim() || result.stdout.trim()}`,
    );
  }

  return result.stdout.trim();
}
