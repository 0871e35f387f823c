import type { ToolHandler, ToolHandlerTable } from '../registry.js';
import { ToolValidationError } from '../errors.js';
import { flagParam, requireStringParam, stringParam } from '../validation.js';
import type { SnapshotAction } from './catalog.js';

function withMachine(args: string[], machine: string | undefined): string[] {
  return machine ? [...args, machine] : args;
}

export const statusHandler: ToolHandler = {
  buildArgs: (params) => withMachine(['status'], stringParam(params, 'machine')),
};

export const upHandler: ToolHandler = {
  buildArgs(params) {
    const args = withMachine(['up'], stringParam(params, 'machine'));
    const provider = stringParam(params, 'provider');
    if (provider) args.push('--provider', provider);
    if (params['provision'] === false) args.push('--no-provision');
    return args;
  },
};

export const haltHandler: ToolHandler = {
  buildArgs(params) {
    const args = withMachine(['halt'], stringParam(params, 'machine'));
    if (flagParam(params, 'force')) args.push('--force');
    return args;
  },
};

/**
 * Destroy never reaches Vagrant's interactive prompt: the caller must
 * confirm with `force: true`, which is then passed through as `--force`.
 */
export const destroyHandler: ToolHandler = {
  refine(params) {
    if (!flagParam(params, 'force')) {
      throw new ToolValidationError('force', 'Destroy is irreversible; set force=true to confirm');
    }
  },
  buildArgs: (params) => [...withMachine(['destroy'], stringParam(params, 'machine')), '--force'],
};

export const sshHandler: ToolHandler = {
  buildArgs: (params) => [
    'ssh',
    requireStringParam(params, 'machine'),
    '-c',
    requireStringParam(params, 'command'),
  ],
};

export const provisionHandler: ToolHandler = {
  buildArgs(params) {
    const args = withMachine(['provision'], stringParam(params, 'machine'));
    const provisioner = stringParam(params, 'provisioner');
    if (provisioner) args.push('--provision-with', provisioner);
    return args;
  },
};

export const reloadHandler: ToolHandler = {
  buildArgs(params) {
    const args = withMachine(['reload'], stringParam(params, 'machine'));
    if (flagParam(params, 'provision')) args.push('--provision');
    return args;
  },
};

const NAMED_SNAPSHOT_ACTIONS: ReadonlySet<string> = new Set<SnapshotAction>(['save', 'restore', 'delete']);

/** `vagrant snapshot <action> [machine] [name]`; `list` takes no name. */
export const snapshotHandler: ToolHandler = {
  refine(params) {
    const action = requireStringParam(params, 'action');
    const name = stringParam(params, 'name');
    if (NAMED_SNAPSHOT_ACTIONS.has(action) && !name) {
      throw new ToolValidationError('name', `Snapshot name is required for the ${action} action`);
    }
    if (action === 'list' && name) {
      throw new ToolValidationError('name', 'The list action does not take a snapshot name');
    }
  },
  buildArgs(params) {
    const args = withMachine(
      ['snapshot', requireStringParam(params, 'action')],
      stringParam(params, 'machine'),
    );
    const name = stringParam(params, 'name');
    if (name) args.push(name);
    return args;
  },
};

export const globalStatusHandler: ToolHandler = {
  buildArgs: (params) => (flagParam(params, 'prune') ? ['global-status', '--prune'] : ['global-status']),
};

/** Handler table for {@link VAGRANT_CATALOG}, keyed by tool name. */
export const VAGRANT_HANDLERS: ToolHandlerTable = Object.freeze({
  status: statusHandler,
  up: upHandler,
  halt: haltHandler,
  destroy: destroyHandler,
  ssh: sshHandler,
  provision: provisionHandler,
  reload: reloadHandler,
  snapshot: snapshotHandler,
  global_status: globalStatusHandler,
});
