import type { PermissionTier, ToolDefinition } from './types';

export interface ToolSummary {
  name: string;
  description: string;
  permissionTier: PermissionTier;
  isDestructive: boolean;
}

/**
 * Name-keyed set of tool definitions, in registration order
 */
export class ToolRegistry {
  private readonly tools: Map<string, ToolDefinition> = new Map();

  constructor(tools: readonly ToolDefinition[] = []) {
    for (const tool of tools) this.register(tool);
  }

  /**
   * @throws {Error} If a tool with the same name is already registered
   */
  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`ToolRegistry: tool '${tool.name}' is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  getNames(): string[] {
    return Array.from(this.tools.keys());
  }

  describe(): ToolSummary[] {
    return this.getAll().map(tool => ({
      name: tool.name,
      description: tool.description,
      permissionTier: tool.permissionTier,
      isDestructive: tool.isDestructive,
    }));
  }
}
