import { Tool } from './base';
import { DuplicateToolError } from './errors';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Tools' });

/**
 * Name → tool map. Filled once at startup; lookups only afterwards.
 */
export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }
    this.tools.set(tool.name, tool);
    log.debug(`Registered tool ${tool.name}`);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getDefinitions(): Record<string, unknown>[] {
    return Array.from(this.tools.values()).map((tool) => tool.toSchema());
  }

  get toolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }
}
