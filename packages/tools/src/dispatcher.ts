import type {
  InvocationRequest,
  Logger,
  ToolErrorKind,
  ToolResponse,
} from '@vagrant-mcp/core';
import { formatSeconds, silentLogger } from '@vagrant-mcp/core';
import {
  ExecutionError,
  PathViolationError,
  ProjectNotFoundError,
  TimeoutError,
  ToolNotFoundError,
  ToolValidationError,
} from './errors.js';
import { assertProjectReady, assertRealPathWithinRoot, resolveProjectDirectory } from './path-guard.js';
import type { ProcessInvoker } from './process/process-invoker.js';
import type { ToolRegistry } from './registry.js';
import { stringParam } from './validation.js';

/** Longest stderr/stdout excerpt quoted in an error message. */
const MAX_ERROR_DETAIL = 4_000;

export interface DispatcherOptions {
  registry: ToolRegistry;
  invoker: ProcessInvoker;
  /** Vagrant executable. */
  binary: string;
  projectsDir: string;
  /** Complete child environment (see buildChildEnv). */
  env: Record<string, string>;
  timeouts: {
    defaultMs: number;
    tools?: Record<string, number>;
  };
  logger?: Logger;
  /** Project readiness check; defaults to {@link assertProjectReady}. */
  checkProject?: (directory: string, requireVagrantfile: boolean) => Promise<void>;
}

/**
 * Turns one tool invocation into one Vagrant child process and exactly one
 * {@link ToolResponse}. Never rejects: every failure is reported in the
 * response, classified by `errorKind`.
 *
 * Holds no per-call state, so concurrent `handle` calls are independent.
 */
export class Dispatcher {
  private readonly logger: Logger;
  private readonly checkProject: (directory: string, requireVagrantfile: boolean) => Promise<void>;

  constructor(private readonly options: DispatcherOptions) {
    this.logger = options.logger ?? silentLogger;
    this.checkProject = options.checkProject ?? assertProjectReady;
  }

  async handle(request: InvocationRequest): Promise<ToolResponse> {
    const start = performance.now();
    const elapsed = () => Math.round(performance.now() - start);
    let commandLine = `${this.options.binary} (${request.name})`;

    try {
      const { tool, params, args } = this.options.registry.prepare(request.name, request.arguments);

      const cwd =
        tool.definition.scope === 'global'
          ? resolveProjectDirectory(this.options.projectsDir)
          : resolveProjectDirectory(this.options.projectsDir, stringParam(params, 'directory'));
      await assertRealPathWithinRoot(this.options.projectsDir, cwd);
      await this.checkProject(cwd, tool.definition.scope === 'project');

      commandLine = formatCommandLine(this.options.binary, args);
      const timeoutMs = this.timeoutFor(request.name);
      this.logger.debug(`Running ${commandLine} in ${cwd} (timeout ${formatSeconds(timeoutMs)})`);

      const result = await this.options.invoker.execute(
        { command: this.options.binary, args, cwd, env: this.options.env },
        timeoutMs,
      );

      if (result.exitCode === 0 && result.signal === null) {
        this.logger.info(`${commandLine} succeeded in ${result.durationMs}ms`);
        return { success: true, content: result.stdout, durationMs: elapsed() };
      }

      const status =
        result.signal !== null
          ? `was terminated by ${result.signal}`
          : `exited with code ${result.exitCode}`;
      const detail = excerpt(result.stderr) || excerpt(result.stdout) || '(no output)';
      this.logger.warn(`${commandLine} ${status}`);
      return {
        success: false,
        content: result.stdout,
        error: `${commandLine} ${status}: ${detail}`,
        errorKind: 'execution_error',
        durationMs: elapsed(),
      };
    } catch (err) {
      return { ...this.describeFailure(err, commandLine), durationMs: elapsed() };
    }
  }

  private timeoutFor(toolName: string): number {
    return this.options.timeouts.tools?.[toolName] ?? this.options.timeouts.defaultMs;
  }

  private describeFailure(
    err: unknown,
    commandLine: string,
  ): Omit<ToolResponse, 'durationMs'> {
    const fail = (errorKind: ToolErrorKind, error: string, content = '') => {
      this.logger.warn(`${errorKind}: ${error}`);
      return { success: false, content, error, errorKind };
    };

    if (err instanceof ToolNotFoundError) {
      return fail('tool_not_found', err.message);
    }
    if (err instanceof ToolValidationError) {
      return fail('invalid_parameters', err.message);
    }
    if (err instanceof PathViolationError) {
      return fail('path_violation', err.message);
    }
    if (err instanceof ProjectNotFoundError) {
      return fail('project_not_found', err.message);
    }
    if (err instanceof TimeoutError) {
      const partialErr = excerpt(err.stderr);
      const message = `Timed out after ${formatSeconds(err.timeoutMs)}: ${commandLine}`;
      return fail('timeout', partialErr ? `${message}\n${partialErr}` : message, err.stdout);
    }
    if (err instanceof ExecutionError) {
      return fail('execution_error', `${err.message} (${err.reason})`);
    }

    const message = err instanceof Error ? err.message : String(err);
    this.logger.error(`Unexpected failure running ${commandLine}: ${message}`);
    return { success: false, content: '', error: `Unexpected error: ${message}`, errorKind: 'execution_error' };
  }
}

/** Render an argv for messages, quoting arguments that contain whitespace or quotes. */
export function formatCommandLine(binary: string, args: readonly string[]): string {
  return [binary, ...args].map((a) => (/[\s"'\\$`]/.test(a) || a === '' ? JSON.stringify(a) : a)).join(' ');
}

/** Trimmed text, keeping the tail when it is too long to quote in full. */
function excerpt(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_ERROR_DETAIL ? `...${trimmed.slice(-MAX_ERROR_DETAIL)}` : trimmed;
}
