/** Thrown when registering a tool with a name that already exists. */
export class ToolConflictError extends Error {
  constructor(name: string) {
    super(`Tool already registered: ${name}`);
    this.name = 'ToolConflictError';
  }
}

/** Thrown when a requested tool is not found in the registry. */
export class ToolNotFoundError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool not found: ${toolName}`);
    this.name = 'ToolNotFoundError';
  }
}

/** Thrown at startup when the catalog and its handler table disagree. */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

/** Thrown when caller-supplied parameters fail validation. */
export class ToolValidationError extends Error {
  constructor(
    public readonly field: string,
    public readonly detail: string,
  ) {
    super(`Invalid parameter "${field}": ${detail}`);
    this.name = 'ToolValidationError';
  }
}

/** Thrown when a requested directory resolves outside the projects root. */
export class PathViolationError extends Error {
  constructor(
    public readonly requested: string,
    reason: string,
  ) {
    super(`Path violation for "${requested}": ${reason}`);
    this.name = 'PathViolationError';
  }
}

/** Thrown when a project directory is missing or has no Vagrantfile. */
export class ProjectNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProjectNotFoundError';
  }
}

/** Thrown when the child process cannot be launched. */
export class ExecutionError extends Error {
  constructor(
    public readonly reason: string,
    message: string,
  ) {
    super(message);
    this.name = 'ExecutionError';
  }
}

/** Thrown when the child process exceeds its time budget. */
export class TimeoutError extends Error {
  constructor(
    public readonly timeoutMs: number,
    public readonly stdout: string,
    public readonly stderr: string,
  ) {
    super(`Process timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}
