import { stat } from 'node:fs/promises';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { Logger, VagrantMcpConfig } from '@vagrant-mcp/core';
import { ConfigError, createConsoleLogger, loadConfig } from '@vagrant-mcp/core';
import type { ToolRegistry } from '@vagrant-mcp/tools';
import {
  Dispatcher,
  ProcessInvoker,
  buildChildEnv,
  checkVagrantBinary,
  createVagrantRegistry,
} from '@vagrant-mcp/tools';
import { createMcpServer } from './mcp-server.js';

export interface BootstrapOptions {
  /** Defaults to a console logger at the configured level. */
  logger?: Logger;
  /** Environment to configure from; defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  /** Override the process invoker (e.g. for testing with a fake launcher). */
  invoker?: ProcessInvoker;
  /** Skip the `vagrant --version` probe. */
  skipHealthCheck?: boolean;
}

export interface AppServer {
  config: VagrantMcpConfig;
  logger: Logger;
  registry: ToolRegistry;
  dispatcher: Dispatcher;
  server: Server;
  /** Version line reported by the health check, when it ran. */
  vagrantVersion?: string;
}

/**
 * Bootstrap the server:
 * 1. Load and validate config
 * 2. Verify the projects root exists
 * 3. Probe the Vagrant binary
 * 4. Build registry, dispatcher and MCP server
 *
 * Any failure here is fatal; nothing has been served yet.
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<AppServer> {
  const env = options.env ?? process.env;

  // 1. Load config
  const result = loadConfig({ env });
  if (!result.valid || !result.config) {
    throw new ConfigError(result.errors);
  }
  const config = result.config;
  const logger = options.logger ?? createConsoleLogger(config.logging.level);

  // 2. Projects root
  const { projectsDir } = config.vagrant;
  if (!(await isDirectory(projectsDir))) {
    throw new ConfigError([
      { path: 'vagrant.projectsDir', message: `Projects directory does not exist: ${projectsDir}` },
    ]);
  }

  const childEnv = buildChildEnv(
    { vagrantHome: config.vagrant.home, passthrough: config.vagrant.passthroughEnv },
    env,
  );
  const invoker = options.invoker ?? new ProcessInvoker();

  // 3. Health check
  let vagrantVersion: string | undefined;
  if (!options.skipHealthCheck) {
    vagrantVersion = await checkVagrantBinary(invoker, {
      binary: config.vagrant.binary,
      cwd: projectsDir,
      env: childEnv,
      timeoutMs: config.vagrant.timeouts.healthCheckMs,
    });
    logger.info(`Found ${vagrantVersion}`);
  }

  // 4. Wiring
  const registry = createVagrantRegistry();
  const dispatcher = new Dispatcher({
    registry,
    invoker,
    binary: config.vagrant.binary,
    projectsDir,
    env: childEnv,
    timeouts: config.vagrant.timeouts,
    logger,
  });
  const server = createMcpServer({
    registry,
    dispatcher,
    name: config.server.name,
    version: config.server.version,
    logger,
  });

  logger.info(`${registry.size} tool(s) registered; projects root ${projectsDir}`);

  return { config, logger, registry, dispatcher, server, vagrantVersion };
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}
