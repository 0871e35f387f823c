import type { LogLevel } from './logger.js';

/** Top-level configuration schema for the Vagrant MCP server. */
export interface VagrantMcpConfig {
  server: ServerConfig;
  vagrant: VagrantConfig;
  logging: LoggingConfig;
}

export interface ServerConfig {
  /** Name announced to MCP clients during initialization. */
  name: string;
  version: string;
}

export interface VagrantConfig {
  /** Executable name or absolute path of the Vagrant CLI. */
  binary: string;
  /** Absolute base directory; every project directory must resolve inside it. */
  projectsDir: string;
  /** Value exported to the child as `VAGRANT_HOME`; Vagrant's own default when unset. */
  home?: string;
  /** Additional parent environment variables copied into the child. */
  passthroughEnv: string[];
  timeouts: TimeoutsConfig;
}

export interface TimeoutsConfig {
  defaultMs: number;
  /** Timeout for the startup `vagrant --version` probe. */
  healthCheckMs: number;
  /** Per-tool overrides keyed by tool name. */
  tools: Record<string, number>;
}

export interface LoggingConfig {
  level: LogLevel;
}

export const DEFAULT_CONFIG: VagrantMcpConfig = {
  server: {
    name: 'vagrant-mcp',
    version: '0.1.0',
  },
  vagrant: {
    binary: 'vagrant',
    projectsDir: '/vagrant-projects',
    passthroughEnv: [],
    timeouts: {
      defaultMs: 600_000,
      healthCheckMs: 10_000,
      tools: {
        up: 1_800_000,
        reload: 1_800_000,
        provision: 1_800_000,
      },
    },
  },
  logging: {
    level: 'info',
  },
};
