import type { ToolDefinition, ToolParameter } from '@vagrant-mcp/core';

/**
 * Names of machines, providers, provisioners and snapshots. Must not start
 * with a dash so a value can never be parsed as a flag.
 */
export const NAME_PATTERN = '^[A-Za-z0-9][A-Za-z0-9._-]*$';

export const SNAPSHOT_ACTIONS = ['save', 'restore', 'list', 'delete'] as const;
export type SnapshotAction = (typeof SNAPSHOT_ACTIONS)[number];

const directory: ToolParameter = {
  name: 'directory',
  type: 'string',
  description:
    'Project directory containing the Vagrantfile, relative to the projects root. Defaults to the root itself.',
};

function machine(required = false, description = 'Name of a specific machine (optional).'): ToolParameter {
  return { name: 'machine', type: 'string', description, required, pattern: NAME_PATTERN };
}

export const statusToolDefinition: ToolDefinition = {
  name: 'status',
  description: 'Report the state of the Vagrant machines in a project directory.',
  parameters: [machine(), directory],
  scope: 'project',
  annotations: { readOnly: true, idempotent: true },
};

export const upToolDefinition: ToolDefinition = {
  name: 'up',
  description: 'Start and, unless disabled, provision Vagrant machines.',
  parameters: [
    machine(false, 'Name of a specific machine to start (optional).'),
    {
      name: 'provider',
      type: 'string',
      description: 'Provider to use, e.g. virtualbox or libvirt.',
      pattern: NAME_PATTERN,
    },
    {
      name: 'provision',
      type: 'boolean',
      description: 'Run provisioners while starting.',
      default: true,
    },
    directory,
  ],
  scope: 'project',
  annotations: { readOnly: false, idempotent: true },
};

export const haltToolDefinition: ToolDefinition = {
  name: 'halt',
  description: 'Stop Vagrant machines gracefully.',
  parameters: [
    machine(false, 'Name of a specific machine to stop (optional).'),
    {
      name: 'force',
      type: 'boolean',
      description: 'Power the machine off instead of a graceful shutdown.',
      default: false,
    },
    directory,
  ],
  scope: 'project',
  annotations: { readOnly: false, idempotent: true },
};

export const destroyToolDefinition: ToolDefinition = {
  name: 'destroy',
  description:
    'Destroy Vagrant machines and every resource created for them. Irreversible; requires force=true as confirmation.',
  parameters: [
    machine(false, 'Name of a specific machine to destroy (optional; all machines when omitted).'),
    {
      name: 'force',
      type: 'boolean',
      description: 'Confirmation flag. Must be true, otherwise the call is refused.',
      required: true,
    },
    directory,
  ],
  scope: 'project',
  annotations: { readOnly: false, destructive: true },
};

export const sshToolDefinition: ToolDefinition = {
  name: 'ssh',
  description: 'Run a shell command inside a guest machine over SSH and return its output.',
  parameters: [
    machine(true, 'Name of the machine to run the command on.'),
    {
      name: 'command',
      type: 'string',
      description: 'Command line executed by the guest shell.',
      required: true,
    },
    directory,
  ],
  scope: 'project',
  annotations: { readOnly: false },
};

export const provisionToolDefinition: ToolDefinition = {
  name: 'provision',
  description: 'Re-run the configured provisioners against running machines.',
  parameters: [
    machine(false, 'Name of a specific machine to provision (optional).'),
    {
      name: 'provisioner',
      type: 'string',
      description: 'Run only the provisioner with this name or type.',
      pattern: NAME_PATTERN,
    },
    directory,
  ],
  scope: 'project',
  annotations: { readOnly: false },
};

export const reloadToolDefinition: ToolDefinition = {
  name: 'reload',
  description: 'Restart machines so Vagrantfile changes take effect.',
  parameters: [
    machine(false, 'Name of a specific machine to reload (optional).'),
    {
      name: 'provision',
      type: 'boolean',
      description: 'Run provisioners after the restart.',
      default: false,
    },
    directory,
  ],
  scope: 'project',
  annotations: { readOnly: false },
};

export const snapshotToolDefinition: ToolDefinition = {
  name: 'snapshot',
  description: 'Save, restore, list or delete machine snapshots.',
  parameters: [
    {
      name: 'action',
      type: 'string',
      description: 'Snapshot action to perform.',
      required: true,
      enum: SNAPSHOT_ACTIONS,
    },
    {
      name: 'name',
      type: 'string',
      description: 'Snapshot name (required for save, restore and delete).',
      pattern: NAME_PATTERN,
    },
    machine(false, 'Machine the snapshot belongs to (optional).'),
    directory,
  ],
  scope: 'project',
  annotations: { readOnly: false },
};

export const globalStatusToolDefinition: ToolDefinition = {
  name: 'global_status',
  description: 'Report every Vagrant environment known to this host, independent of project directory.',
  parameters: [
    {
      name: 'prune',
      type: 'boolean',
      description: 'Remove stale entries from the machine index first.',
      default: false,
    },
  ],
  scope: 'global',
  annotations: { readOnly: true, idempotent: true },
};

/** The static tool catalog, in published order. */
export const VAGRANT_CATALOG: readonly ToolDefinition[] = Object.freeze([
  statusToolDefinition,
  upToolDefinition,
  haltToolDefinition,
  destroyToolDefinition,
  sshToolDefinition,
  provisionToolDefinition,
  reloadToolDefinition,
  snapshotToolDefinition,
  globalStatusToolDefinition,
]);
