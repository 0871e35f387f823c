import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Logger } from '@vagrant-mcp/core';
import { Dispatcher, formatCommandLine, type DispatcherOptions } from '../src/dispatcher.js';
import { ExecutionError } from '../src/errors.js';
import { ProcessInvoker } from '../src/process/process-invoker.js';
import { createVagrantRegistry } from '../src/vagrant/index.js';
import {
  completingLauncher,
  failingLauncher,
  hangingLauncher,
  makeProjectsRoot,
  type FakeLauncher,
} from './helpers.js';

const ENV = { PATH: '/usr/bin', VAGRANT_NO_COLOR: '1' };

let root: string;
let outside: string;

beforeAll(async () => {
  root = await makeProjectsRoot();
  outside = await mkdtemp(join(tmpdir(), 'vagrant-mcp-outside-'));
  await writeFile(join(outside, 'Vagrantfile'), 'Vagrant.configure("2") {}\n');
  await symlink(outside, join(root, 'escape'));
});

afterAll(async () => {
  await rm(root, { recursive: true, force: true });
  await rm(outside, { recursive: true, force: true });
});

function makeDispatcher(fake: FakeLauncher, overrides: Partial<DispatcherOptions> = {}): Dispatcher {
  return new Dispatcher({
    registry: createVagrantRegistry(),
    invoker: new ProcessInvoker(fake.launch, { killGraceMs: 500 }),
    binary: 'vagrant',
    projectsDir: root,
    env: ENV,
    timeouts: { defaultMs: 5_000, tools: { ssh: 100 } },
    ...overrides,
  });
}

describe('Dispatcher', () => {
  describe('successful calls', () => {
    it('returns stdout as content when the command exits 0', async () => {
      const fake = completingLauncher({ stdout: 'running' });

      const response = await makeDispatcher(fake).handle({ name: 'status' });

      expect(response).toMatchObject({ success: true, content: 'running' });
      expect(response.error).toBeUndefined();
      expect(response.errorKind).toBeUndefined();
      expect(response.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('launches the binary in the projects root with the configured environment', async () => {
      const fake = completingLauncher();

      await makeDispatcher(fake).handle({ name: 'status', arguments: { machine: 'web' } });

      expect(fake.specs).toEqual([{ command: 'vagrant', args: ['status', 'web'], cwd: root, env: ENV }]);
    });

    it('runs in the requested project subdirectory', async () => {
      const fake = completingLauncher();

      await makeDispatcher(fake).handle({ name: 'up', arguments: { directory: 'web' } });

      expect(fake.specs[0]?.cwd).toBe(join(root, 'web'));
      expect(fake.specs[0]?.args).toEqual(['up']);
    });

    it('runs global tools in the projects root', async () => {
      const fake = completingLauncher({ stdout: 'id  name  provider  state' });

      const response = await makeDispatcher(fake).handle({ name: 'global_status', arguments: { prune: true } });

      expect(response.success).toBe(true);
      expect(fake.specs).toEqual([{ command: 'vagrant', args: ['global-status', '--prune'], cwd: root, env: ENV }]);
    });

    it('launches destroy with --force once confirmed', async () => {
      const fake = completingLauncher();

      const response = await makeDispatcher(fake).handle({
        name: 'destroy',
        arguments: { machine: 'web', force: true },
      });

      expect(response.success).toBe(true);
      expect(fake.specs[0]?.args).toEqual(['destroy', 'web', '--force']);
    });
  });

  describe('rejections before launch', () => {
    it('reports unknown tools', async () => {
      const fake = completingLauncher();

      const response = await makeDispatcher(fake).handle({ name: 'package' });

      expect(response).toMatchObject({
        success: false,
        content: '',
        error: 'Tool not found: package',
        errorKind: 'tool_not_found',
      });
      expect(fake.launch).not.toHaveBeenCalled();
    });

    it('reports missing required parameters', async () => {
      const fake = completingLauncher();

      const response = await makeDispatcher(fake).handle({ name: 'ssh', arguments: { machine: 'db' } });

      expect(response).toMatchObject({
        success: false,
        error: 'Invalid parameter "command": Missing required parameter',
        errorKind: 'invalid_parameters',
      });
      expect(fake.launch).not.toHaveBeenCalled();
    });

    it('refuses destroy without confirmation', async () => {
      const fake = completingLauncher();

      const response = await makeDispatcher(fake).handle({ name: 'destroy', arguments: { force: false } });

      expect(response).toMatchObject({
        success: false,
        error: 'Invalid parameter "force": Destroy is irreversible; set force=true to confirm',
        errorKind: 'invalid_parameters',
      });
      expect(fake.launch).not.toHaveBeenCalled();
    });

    it('rejects directories that escape the projects root', async () => {
      const fake = completingLauncher();

      const response = await makeDispatcher(fake).handle({
        name: 'status',
        arguments: { directory: '../etc' },
      });

      expect(response).toMatchObject({
        success: false,
        error: 'Path violation for "../etc": parent-directory segments are not allowed',
        errorKind: 'path_violation',
      });
      expect(fake.launch).not.toHaveBeenCalled();
    });

    it('rejects a project symlink that leads outside the projects root', async () => {
      const fake = completingLauncher();

      const response = await makeDispatcher(fake).handle({
        name: 'destroy',
        arguments: { directory: 'escape', force: true },
      });

      expect(response).toMatchObject({ success: false, errorKind: 'path_violation' });
      expect(response.error).toContain(`Path violation for "${join(root, 'escape')}"`);
      expect(fake.launch).not.toHaveBeenCalled();
    });

    it('reports a project directory without a Vagrantfile', async () => {
      const fake = completingLauncher();

      const response = await makeDispatcher(fake).handle({ name: 'status', arguments: { directory: 'empty' } });

      expect(response).toMatchObject({
        success: false,
        error: `No Vagrantfile found in: ${join(root, 'empty')}`,
        errorKind: 'project_not_found',
      });
      expect(fake.launch).not.toHaveBeenCalled();
    });

    it('reports a missing project directory', async () => {
      const fake = completingLauncher();

      const response = await makeDispatcher(fake).handle({ name: 'halt', arguments: { directory: 'db' } });

      expect(response).toMatchObject({
        success: false,
        error: `Directory does not exist: ${join(root, 'db')}`,
        errorKind: 'project_not_found',
      });
      expect(fake.launch).not.toHaveBeenCalled();
    });
  });

  describe('failed executions', () => {
    it('reports a non-zero exit with stderr', async () => {
      const fake = completingLauncher({ exitCode: 1, stderr: 'machine not found\n' });

      const response = await makeDispatcher(fake).handle({ name: 'halt', arguments: { machine: 'web' } });

      expect(response).toMatchObject({
        success: false,
        content: '',
        error: 'vagrant halt web exited with code 1: machine not found',
        errorKind: 'execution_error',
      });
    });

    it('falls back to stdout when stderr is empty', async () => {
      const fake = completingLauncher({ exitCode: 2, stdout: 'Bringing machine up...\nfailed' });

      const response = await makeDispatcher(fake).handle({ name: 'up' });

      expect(response.error).toBe('vagrant up exited with code 2: Bringing machine up...\nfailed');
      expect(response.content).toBe('Bringing machine up...\nfailed');
    });

    it('reports a child killed by a signal', async () => {
      const fake = completingLauncher({ exitCode: -1, signal: 'SIGTERM' });

      const response = await makeDispatcher(fake).handle({ name: 'status' });

      expect(response).toMatchObject({
        success: false,
        error: 'vagrant status was terminated by SIGTERM: (no output)',
        errorKind: 'execution_error',
      });
    });

    it('times out, terminates the child once and keeps partial output', async () => {
      const fake = hangingLauncher({ stdout: 'Connection to 127.0.0.1', stderr: '' });

      const response = await makeDispatcher(fake).handle({
        name: 'ssh',
        arguments: { machine: 'db', command: 'ls' },
      });

      expect(response).toMatchObject({
        success: false,
        content: 'Connection to 127.0.0.1',
        error: 'Timed out after 0.1s: vagrant ssh db -c ls',
        errorKind: 'timeout',
      });
      expect(fake.terminate).toHaveBeenCalledTimes(1);
    });

    it('appends partial stderr to the timeout message', async () => {
      const fake = hangingLauncher({ stdout: '', stderr: 'waiting for ssh\n' });

      const response = await makeDispatcher(fake).handle({
        name: 'ssh',
        arguments: { machine: 'db', command: 'uptime' },
      });

      expect(response.error).toBe('Timed out after 0.1s: vagrant ssh db -c uptime\nwaiting for ssh');
    });

    it('reports launch failures', async () => {
      const fake = failingLauncher(new ExecutionError('ENOENT', 'Failed to launch vagrant: spawn vagrant ENOENT'));

      const response = await makeDispatcher(fake).handle({ name: 'status' });

      expect(response).toMatchObject({
        success: false,
        error: 'Failed to launch vagrant: spawn vagrant ENOENT (ENOENT)',
        errorKind: 'execution_error',
      });
    });

    it('never rejects on unexpected errors', async () => {
      const fake = completingLauncher();
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const dispatcher = makeDispatcher(fake, {
        logger,
        checkProject: () => Promise.reject(new Error('disk on fire')),
      });

      const response = await dispatcher.handle({ name: 'status' });

      expect(response).toMatchObject({
        success: false,
        error: 'Unexpected error: disk on fire',
        errorKind: 'execution_error',
      });
      expect(logger.error).toHaveBeenCalledWith('Unexpected failure running vagrant (status): disk on fire');
    });
  });

  describe('timeouts', () => {
    it('uses the per-tool timeout and falls back to the default', async () => {
      const fake = completingLauncher();
      const invoker = new ProcessInvoker(fake.launch);
      const execute = vi.spyOn(invoker, 'execute');
      const dispatcher = makeDispatcher(fake, {
        invoker,
        timeouts: { defaultMs: 600_000, tools: { up: 1_800_000 } },
      });

      await dispatcher.handle({ name: 'up' });
      await dispatcher.handle({ name: 'status' });

      expect(execute.mock.calls.map(([, timeoutMs]) => timeoutMs)).toEqual([1_800_000, 600_000]);
    });
  });

  it('handles concurrent calls independently', async () => {
    const fake = completingLauncher({ stdout: 'ok' });
    const dispatcher = makeDispatcher(fake);

    const responses = await Promise.all([
      dispatcher.handle({ name: 'status', arguments: { machine: 'web' } }),
      dispatcher.handle({ name: 'nope' }),
      dispatcher.handle({ name: 'reload', arguments: { provision: true } }),
    ]);

    expect(responses.map((r) => r.errorKind ?? 'ok')).toEqual(['ok', 'tool_not_found', 'ok']);
    expect(fake.specs).toHaveLength(2);
    expect(fake.specs.map((s) => s.args)).toEqual(
      expect.arrayContaining([['status', 'web'], ['reload', '--provision']]),
    );
  });
});

describe('formatCommandLine', () => {
  it('leaves plain arguments unquoted', () => {
    expect(formatCommandLine('vagrant', ['snapshot', 'save', 'web', 'before-upgrade'])).toBe(
      'vagrant snapshot save web before-upgrade',
    );
  });

  it('quotes arguments with whitespace, quotes or empty values', () => {
    expect(formatCommandLine('vagrant', ['ssh', 'db', '-c', 'ls -la', ''])).toBe(
      'vagrant ssh db -c "ls -la" ""',
    );
  });
});
