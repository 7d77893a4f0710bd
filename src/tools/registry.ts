import type { ToolDescriptor, ToolExecutionContext, ToolModule, ToolRunResult } from "./types.js";
import { assistantModule } from "./assistant.js";
import { ragModule } from "./rag.js";
import { screenshotsModule } from "./screenshots.js";

interface RegisteredTool {
  readonly module: ToolModule;
  readonly descriptor: ToolDescriptor;
}

export interface ToolModuleDescriptor {
  readonly domain: string;
  readonly summary: string;
  readonly tools: readonly ToolDescriptor[];
}

const toolModules: readonly ToolModule[] = [assistantModule, ragModule, screenshotsModule];

const toolMap: Map<string, RegisteredTool> = new Map();

for (const module of toolModules) {
  for (const descriptor of module.describeTools()) {
    if (toolMap.has(descriptor.name)) {
      throw new Error(`Duplicate tool name detected while registering modules: ${descriptor.name}`);
    }
    toolMap.set(descriptor.name, { module, descriptor });
  }
}

export const toolRegistry = {
  list(): readonly ToolDescriptor[] {
    return Array.from(toolMap.values(), (entry) => entry.descriptor);
  },

  async invoke(name: string, args: unknown, ctx: ToolExecutionContext): Promise<ToolRunResult> {
    const entry = toolMap.get(name);
    if (!entry) {
      throw new Error(`Unknown tool: ${name}`);
    }
    return entry.module.invoke(name, args, ctx);
  },
};

export function describeToolModules(): readonly ToolModuleDescriptor[] {
  return toolModules.map((module) => ({
    domain: module.domain,
    summary: module.summary,
    tools: module.describeTools(),
  }));
}
