import type { ToolDefinition, ToolParameter, ToolParams } from '@vagrant-mcp/core';
import { isRecord } from '@vagrant-mcp/core';
import { ToolValidationError } from './errors.js';

/**
 * Validate raw caller arguments against a tool's parameter list.
 *
 * Pure: rejects non-object input, unknown fields, missing required
 * fields, wrong types, values outside an enum and values not matching a
 * pattern. Defaults are applied for omitted optional parameters. The
 * first offending field is reported through {@link ToolValidationError}.
 */
export function validateParameters(definition: ToolDefinition, raw: unknown): ToolParams {
  const args = raw === undefined || raw === null ? {} : raw;
  if (!isRecord(args)) {
    throw new ToolValidationError('arguments', 'Expected an object of named parameters');
  }

  const known = new Map(definition.parameters.map((p) => [p.name, p]));
  for (const key of Object.keys(args)) {
    if (!known.has(key)) {
      throw new ToolValidationError(key, `Unknown parameter for tool "${definition.name}"`);
    }
  }

  const params: Record<string, string | boolean | undefined> = {};
  for (const param of definition.parameters) {
    params[param.name] = readParameter(param, args[param.name]);
  }

  return Object.freeze(params);
}

function readParameter(param: ToolParameter, value: unknown): string | boolean | undefined {
  if (value === undefined || value === null) {
    if (param.required) {
      throw new ToolValidationError(param.name, 'Missing required parameter');
    }
    return param.default;
  }

  switch (param.type) {
    case 'boolean':
      if (typeof value !== 'boolean') {
        throw new ToolValidationError(param.name, `Expected boolean, got ${describe(value)}`);
      }
      return value;

    case 'string': {
      if (typeof value !== 'string') {
        throw new ToolValidationError(param.name, `Expected string, got ${describe(value)}`);
      }
      if (value.trim() === '') {
        if (param.required) {
          throw new ToolValidationError(param.name, 'Must not be empty');
        }
        return param.default;
      }
      if (param.enum && !param.enum.includes(value)) {
        throw new ToolValidationError(
          param.name,
          `Expected one of ${param.enum.join(', ')}, got "${value}"`,
        );
      }
      if (param.pattern && !new RegExp(param.pattern).test(value)) {
        throw new ToolValidationError(param.name, `Value "${value}" does not match ${param.pattern}`);
      }
      return value;
    }
  }
}

function describe(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

/** Read an optional string parameter from a validated set. */
export function stringParam(params: ToolParams, name: string): string | undefined {
  const value = params[name];
  return typeof value === 'string' ? value : undefined;
}

/** Read a required string parameter from a validated set. */
export function requireStringParam(params: ToolParams, name: string): string {
  const value = stringParam(params, name);
  if (value === undefined) {
    throw new ToolValidationError(name, 'Missing required parameter');
  }
  return value;
}

/** Read a boolean parameter; absent reads as `false`. */
export function flagParam(params: ToolParams, name: string): boolean {
  return params[name] === true;
}
