import type { ToolDefinition, ToolParams } from '@vagrant-mcp/core';
import { CatalogError, ToolConflictError, ToolNotFoundError } from './errors.js';
import { validateParameters } from './validation.js';

/**
 * Pure per-tool logic: cross-field checks and the CLI argument vector
 * (subcommand and flags, without the binary).
 */
export interface ToolHandler {
  /** Cross-field validation beyond the per-parameter schema. Throws ToolValidationError. */
  refine?(params: ToolParams): void;
  buildArgs(params: ToolParams): string[];
}

/** Name → handler table checked against the catalog at startup. */
export type ToolHandlerTable = Readonly<Record<string, ToolHandler>>;

/** A catalog entry bound to its handler. */
export interface RegisteredTool {
  readonly definition: ToolDefinition;
  readonly handler: ToolHandler;
}

/**
 * Immutable tool registry built once from a static catalog.
 * Single source of truth for tool lookup, validation and argument building.
 */
export class ToolRegistry {
  private readonly entries = new Map<string, RegisteredTool>();

  private constructor(tools: RegisteredTool[]) {
    for (const tool of tools) {
      if (this.entries.has(tool.definition.name)) {
        throw new ToolConflictError(tool.definition.name);
      }
      this.entries.set(tool.definition.name, Object.freeze(tool));
    }
  }

  /**
   * Bind every catalog definition to its handler. Throws CatalogError when a
   * definition has no handler or a handler has no definition.
   */
  static fromCatalog(
    definitions: readonly ToolDefinition[],
    handlers: ToolHandlerTable,
  ): ToolRegistry {
    const names = new Set(definitions.map((d) => d.name));

    const missing = definitions.filter((d) => !Object.hasOwn(handlers, d.name)).map((d) => d.name);
    if (missing.length > 0) {
      throw new CatalogError(`No handler for catalog entries: ${missing.join(', ')}`);
    }

    const orphaned = Object.keys(handlers).filter((name) => !names.has(name));
    if (orphaned.length > 0) {
      throw new CatalogError(`Handlers without catalog entries: ${orphaned.join(', ')}`);
    }

    return new ToolRegistry(
      definitions.map((definition) => {
        const handler = handlers[definition.name];
        if (!handler) {
          throw new CatalogError(`No handler for catalog entry: ${definition.name}`);
        }
        return { definition, handler };
      }),
    );
  }

  /** Get a registered tool by name, or undefined. */
  lookup(name: string): RegisteredTool | undefined {
    return this.entries.get(name);
  }

  /** Get a registered tool by name. Throws ToolNotFoundError. */
  get(name: string): RegisteredTool {
    const tool = this.entries.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }
    return tool;
  }

  /** Check if a tool is registered. */
  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** All definitions, in catalog order. */
  definitions(): ToolDefinition[] {
    return [...this.entries.values()].map((e) => e.definition);
  }

  /**
   * Validate raw arguments for `name` and build the argument vector.
   * Pure; throws ToolNotFoundError or ToolValidationError.
   */
  prepare(name: string, rawArgs: unknown): { tool: RegisteredTool; params: ToolParams; args: string[] } {
    const tool = this.get(name);
    const params = validateParameters(tool.definition, rawArgs);
    tool.handler.refine?.(params);
    return { tool, params, args: tool.handler.buildArgs(params) };
  }

  /** Number of registered tools. */
  get size(): number {
    return this.entries.size;
  }
}
