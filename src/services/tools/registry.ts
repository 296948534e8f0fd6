// Tool Registry - Central registry for all available tools
// Populated at startup, then sealed; reads are safe from any request

import { RegistryErrorCode, ToolRegistryError } from './errors.js';
import type { Tool, ToolSchema } from './types.js';
import { assertValidSchema } from './validation.js';

export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();
  private sealed = false;

  register(tool: Tool | null | undefined): void {
    this.assertWritable();

    if (!tool) {
      throw new ToolRegistryError(RegistryErrorCode.NIL_TOOL, 'tool cannot be nil');
    }

    const name = tool.name();
    if (!name || !name.trim()) {
      throw new ToolRegistryError(RegistryErrorCode.EMPTY_TOOL_NAME, 'tool name cannot be empty');
    }

    if (this.tools.has(name)) {
      throw new ToolRegistryError(RegistryErrorCode.TOOL_ALREADY_EXISTS, `tool '${name}' already registered`);
    }

    const schema = tool.schema();
    if (schema.name !== name) {
      throw new ToolRegistryError(
        RegistryErrorCode.INVALID_SCHEMA,
        `tool '${name}' reports schema name '${schema.name}'`
      );
    }
    assertValidSchema(schema);

    this.tools.set(name, tool);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  // Insertion order
  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  remove(name: string): boolean {
    this.assertWritable();
    return this.tools.delete(name);
  }

  clear(): void {
    this.assertWritable();
    this.tools.clear();
  }

  count(): number {
    return this.tools.size;
  }

  /**
   * Schemas of the named tools, in the order given, skipping unknown names.
   * Without `names`, every registered schema.
   */
  getSchemas(names?: string[]): ToolSchema[] {
    if (!names) {
      return this.list().map(tool => tool.schema());
    }
    const schemas: ToolSchema[] = [];
    for (const name of names) {
      const tool = this.tools.get(name);
      if (tool) schemas.push(tool.schema());
    }
    return schemas;
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  private assertWritable(): void {
    if (this.sealed) {
      throw new ToolRegistryError(RegistryErrorCode.REGISTRY_SEALED, 'tool registry is sealed');
    }
  }
}
