import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { ExecutionResult, Logger } from '@vagrant-mcp/core';
import { ProcessInvoker, type ProcessSpec } from '@vagrant-mcp/tools';

export interface FakeVagrant {
  invoker: ProcessInvoker;
  /** Every launched process, in order. */
  specs: ProcessSpec[];
}

/** Invoker whose "vagrant" answers from `respond` instead of a real binary. */
export function fakeVagrant(
  respond: (spec: ProcessSpec) => Partial<ExecutionResult> = () => ({}),
): FakeVagrant {
  const specs: ProcessSpec[] = [];
  const invoker = new ProcessInvoker((spec) => {
    specs.push(spec);
    const result: ExecutionResult = {
      exitCode: 0,
      signal: null,
      stdout: '',
      stderr: '',
      durationMs: 1,
      ...respond(spec),
    };
    return {
      completion: Promise.resolve(result),
      terminate: () => {},
      snapshot: () => ({ stdout: result.stdout, stderr: result.stderr }),
    };
  });
  return { invoker, specs };
}

export function mockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Temporary projects root holding a single Vagrantfile. */
export async function makeProjectsRoot(): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), 'vagrant-mcp-app-'));
  await writeFile(join(root, 'Vagrantfile'), 'Vagrant.configure("2") {}\n');
  return root;
}
