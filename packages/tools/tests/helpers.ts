import { mkdtemp, mkdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi, type Mock } from 'vitest';
import type { ExecutionResult } from '@vagrant-mcp/core';
import type { ProcessHandle, ProcessLauncher, ProcessSpec } from '../src/process/process-invoker.js';

export interface FakeLauncher {
  launch: Mock<ProcessLauncher>;
  /** Specs of every launched process, in order. */
  specs: ProcessSpec[];
  terminate: Mock<() => void>;
}

/** Launcher whose children finish immediately with `result`. */
export function completingLauncher(result: Partial<ExecutionResult> = {}): FakeLauncher {
  const specs: ProcessSpec[] = [];
  const terminate = vi.fn<() => void>();
  const launch = vi.fn<ProcessLauncher>((spec: ProcessSpec): ProcessHandle => {
    specs.push(spec);
    const full: ExecutionResult = {
      exitCode: 0,
      signal: null,
      stdout: '',
      stderr: '',
      durationMs: 5,
      ...result,
    };
    return {
      completion: Promise.resolve(full),
      terminate,
      snapshot: () => ({ stdout: full.stdout, stderr: full.stderr }),
    };
  });
  return { launch, specs, terminate };
}

/**
 * Launcher whose children never exit on their own. `terminate()` makes
 * the child "die" with SIGKILL, flushing `partial`.
 */
export function hangingLauncher(partial = { stdout: '', stderr: '' }): FakeLauncher {
  const specs: ProcessSpec[] = [];
  const terminate = vi.fn<() => void>();
  const launch = vi.fn<ProcessLauncher>((spec: ProcessSpec): ProcessHandle => {
    specs.push(spec);
    let kill: () => void = () => {};
    const completion = new Promise<ExecutionResult>((resolve) => {
      kill = () =>
        resolve({ exitCode: -1, signal: 'SIGKILL', durationMs: 0, ...partial });
    });
    terminate.mockImplementation(() => kill());
    return { completion, terminate, snapshot: () => partial };
  });
  return { launch, specs, terminate };
}

/** Launcher whose children fail to start. */
export function failingLauncher(error: Error): FakeLauncher {
  const specs: ProcessSpec[] = [];
  const terminate = vi.fn<() => void>();
  const launch = vi.fn<ProcessLauncher>((spec: ProcessSpec): ProcessHandle => {
    specs.push(spec);
    return {
      completion: Promise.reject(error),
      terminate,
      snapshot: () => ({ stdout: '', stderr: '' }),
    };
  });
  return { launch, specs, terminate };
}

/**
 * Temporary projects root with a Vagrantfile at the top and in `web/`,
 * plus an `empty/` directory without one.
 */
export async function makeProjectsRoot(): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), 'vagrant-mcp-test-'));
  await writeFile(join(root, 'Vagrantfile'), 'Vagrant.configure("2") {}\n');
  await mkdir(join(root, 'web'));
  await writeFile(join(root, 'web', 'Vagrantfile'), 'Vagrant.configure("2") {}\n');
  await mkdir(join(root, 'empty'));
  return root;
}
