import { spawn } from 'node:child_process';
import type { ExecutionResult } from '@vagrant-mcp/core';
import { ExecutionError, TimeoutError } from '../errors.js';

/** Everything needed to launch one child process. */
export interface ProcessSpec {
  command: string;
  args: string[];
  cwd: string;
  /** Complete environment of the child; nothing is inherited implicitly. */
  env: Record<string, string>;
}

/** Output captured so far. */
export interface OutputSnapshot {
  stdout: string;
  stderr: string;
}

/** A launched child process. */
export interface ProcessHandle {
  /**
   * Settles once the child has exited and its streams are closed.
   * Rejects with ExecutionError when the child could not be started.
   */
  readonly completion: Promise<ExecutionResult>;
  /** Forcibly kill the child and its descendants. */
  terminate(): void;
  /** Output accumulated up to now. */
  snapshot(): OutputSnapshot;
}

export type ProcessLauncher = (spec: ProcessSpec) => ProcessHandle;

export interface ProcessInvokerOptions {
  /** How long to wait for streams to drain after a kill before giving up. */
  killGraceMs?: number;
}

/** Per-stream capture limit (10 MiB). */
export const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

const DEFAULT_KILL_GRACE_MS = 2_000;

/**
 * Runs child processes with a hard timeout.
 *
 * On success or non-zero exit the promise resolves with the captured
 * output; callers inspect `exitCode`. Launch failures reject with
 * {@link ExecutionError}. A child that outlives `timeoutMs` is terminated
 * exactly once and the promise rejects with {@link TimeoutError} carrying
 * whatever output had accumulated.
 */
export class ProcessInvoker {
  private readonly killGraceMs: number;

  constructor(
    private readonly launch: ProcessLauncher = spawnProcess,
    options: ProcessInvokerOptions = {},
  ) {
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  async execute(spec: ProcessSpec, timeoutMs: number): Promise<ExecutionResult> {
    const handle = this.launch(spec);

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    try {
      const outcome = await Promise.race([handle.completion, timedOut]);
      if (outcome !== 'timeout') {
        return outcome;
      }
    } finally {
      clearTimeout(timer);
    }

    handle.terminate();
    const partial = await this.drain(handle);
    throw new TimeoutError(timeoutMs, partial.stdout, partial.stderr);
  }

  /** Wait briefly for the killed child to flush, then take what is there. */
  private async drain(handle: ProcessHandle): Promise<OutputSnapshot> {
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<undefined>((resolve) => {
      timer = setTimeout(() => resolve(undefined), this.killGraceMs);
    });

    try {
      const settled = await Promise.race([
        handle.completion.then(
          (result): OutputSnapshot => ({ stdout: result.stdout, stderr: result.stderr }),
          () => undefined,
        ),
        grace,
      ]);
      return settled ?? handle.snapshot();
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Appends chunks up to {@link MAX_OUTPUT_BYTES}, marking truncation once. */
class OutputBuffer {
  private chunks: Buffer[] = [];
  private bytes = 0;
  private truncated = false;

  push(chunk: Buffer): void {
    const room = MAX_OUTPUT_BYTES - this.bytes;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    const slice = chunk.length > room ? chunk.subarray(0, room) : chunk;
    if (slice.length < chunk.length) this.truncated = true;
    this.chunks.push(slice);
    this.bytes += slice.length;
  }

  toString(): string {
    const text = Buffer.concat(this.chunks).toString('utf-8');
    return this.truncated ? `${text}\n[output truncated]` : text;
  }
}

/**
 * Default launcher: `child_process.spawn` without a shell.
 *
 * On POSIX the child leads its own process group so `terminate()` can
 * signal every descendant (Vagrant forks ssh and provider helpers).
 */
export const spawnProcess: ProcessLauncher = (spec) => {
  const started = performance.now();
  const stdout = new OutputBuffer();
  const stderr = new OutputBuffer();
  const groupKill = process.platform !== 'win32';

  const child = spawn(spec.command, spec.args, {
    cwd: spec.cwd,
    env: spec.env,
    stdio: ['ignore', 'pipe', 'pipe'],
    detached: groupKill,
    windowsHide: true,
  });

  child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
  child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

  const completion = new Promise<ExecutionResult>((resolve, reject) => {
    child.once('error', (err: NodeJS.ErrnoException) => {
      reject(
        new ExecutionError(
          err.code ?? 'spawn_failed',
          `Failed to launch ${spec.command}: ${err.message}`,
        ),
      );
    });

    child.once('close', (code, signal) => {
      resolve({
        exitCode: code ?? -1,
        signal,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        durationMs: Math.round(performance.now() - started),
      });
    });
  });

  return {
    completion,
    terminate(): void {
      // The group can outlive its leader (ssh forked by vagrant), so an
      // exited child is no reason to skip the kill.
      if (child.pid === undefined) {
        return;
      }
      try {
        if (groupKill) {
          process.kill(-child.pid, 'SIGKILL');
        } else {
          child.kill('SIGKILL');
        }
      } catch (err) {
        // Group already gone (ESRCH); fall back to the direct child.
        if (!(err instanceof Error && 'code' in err && err.code === 'ESRCH')) throw err;
        child.kill('SIGKILL');
      }
    },
    snapshot(): OutputSnapshot {
      return { stdout: stdout.toString(), stderr: stderr.toString() };
    },
  };
};
