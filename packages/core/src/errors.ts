import type { ConfigValidationError } from './config-validator.js';

/** Thrown when the startup configuration cannot be loaded or is invalid. */
export class ConfigError extends Error {
  constructor(public readonly errors: ConfigValidationError[]) {
    super(
      `Invalid configuration: ${errors
        .map((e) => (e.path ? `${e.path}: ${e.message}` : e.message))
        .join('; ')}`,
    );
    this.name = 'ConfigError';
  }
}
