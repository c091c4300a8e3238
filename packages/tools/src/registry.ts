import { LookupError, scoped, type Logger } from '@postcraft/shared';
import type { Tool, ToolField } from './tool.js';
import type { ToolContext } from './tools/context.js';
import { draftTools } from './tools/drafts.js';
import { componentTools } from './tools/components.js';
import { themeTools } from './tools/themes.js';
import { publishingTools } from './tools/publishing.js';

export interface ToolDescription {
  name: string;
  description: string;
  fields: ToolField[];
}

/** Named tools in registration order. Tools hold no logic of their own:
 * each validates its arguments and calls one service method. */
export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();
  private readonly logger: Logger;

  constructor(tools: Tool[], logger: Logger) {
    this.logger = scoped(logger, 'tool-registry');
    for (const tool of tools) {
      if (this.tools.has(tool.name)) throw new Error(`Duplicate tool: ${tool.name}`);
      this.tools.set(tool.name, tool);
    }
  }

  get size(): number {
    return this.tools.size;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) throw new LookupError('tool', name);
    return tool;
  }

  list(): ToolDescription[] {
    return [...this.tools.values()].map(({ name, description, fields }) => ({ name, description, fields }));
  }

  async invoke(name: string, args: unknown): Promise<unknown> {
    const tool = this.get(name);
    this.logger.debug({ tool: name }, 'Invoking tool');
    return tool.invoke(args);
  }
}

export function createToolRegistry(context: ToolContext, logger: Logger): ToolRegistry {
  return new ToolRegistry(
    [...draftTools(context), ...componentTools(context), ...themeTools(context), ...publishingTools(context)],
    logger,
  );
}
