import type { AppServices } from "../context.js";
import type { Logger } from "../logger.js";

export type JsonSchema = {
  readonly type?: string | readonly string[];
  readonly description?: string;
  readonly properties?: Record<string, JsonSchema>;
  readonly required?: readonly string[];
  readonly enum?: readonly (string | number | boolean)[];
  readonly items?: JsonSchema | readonly JsonSchema[];
  readonly additionalProperties?: boolean | JsonSchema;
  readonly default?: unknown;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: string;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly minItems?: number;
  readonly maxItems?: number;
};

export interface ToolExample {
  readonly name: string;
  readonly description: string;
  readonly arguments: Record<string, unknown>;
}

export type ToolServices = Pick<AppServices, "chat" | "search" | "vectors" | "detector" | "screenshots">;

export interface ToolExecutionContext {
  readonly services: ToolServices;
  readonly logger: Logger;
}

export interface ToolResponseContentText {
  readonly type: "text";
  readonly text: string;
}

export interface ToolRunResult {
  readonly content: readonly ToolResponseContentText[];
  readonly structuredContent?: {
    readonly type: "json";
    readonly data: unknown;
  };
  readonly metadata?: Record<string, unknown>;
  readonly isError?: boolean;
}

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly inputSchema?: JsonSchema;
  readonly examples?: readonly ToolExample[];
  readonly tags?: readonly string[];
  readonly execute: (args: unknown, ctx: ToolExecutionContext) => Promise<ToolRunResult>;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JsonSchema;
  readonly metadata: {
    readonly domain: string;
    readonly summary: string;
    readonly examples?: readonly ToolExample[];
    readonly tags: readonly string[];
  };
}

export interface ToolModuleConfig {
  readonly domain: string;
  readonly summary: string;
  readonly defaultTags?: readonly string[];
  readonly tools: readonly ToolDefinition[];
}

export interface ToolModule {
  readonly domain: string;
  readonly summary: string;
  describeTools(): readonly ToolDescriptor[];
  invoke(name: string, args: unknown, ctx: ToolExecutionContext): Promise<ToolRunResult>;
}

const EMPTY_OBJECT_SCHEMA: JsonSchema = Object.freeze({ type: "object", properties: {}, additionalProperties: false });

export function defineToolModule(config: ToolModuleConfig): ToolModule {
  const defaultTags = config.defaultTags ?? [];
  const toolMap = new Map(config.tools.map((tool) => [tool.name, tool]));

  return {
    domain: config.domain,
    summary: config.summary,
    describeTools(): readonly ToolDescriptor[] {
      return config.tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema ?? EMPTY_OBJECT_SCHEMA,
        metadata: {
          domain: config.domain,
          summary: config.summary,
          ...(tool.examples ? { examples: tool.examples } : {}),
          tags: Array.from(new Set([...defaultTags, ...(tool.tags ?? [])])),
        },
      }));
    },
    async invoke(name, args, ctx) {
      const tool = toolMap.get(name);
      if (!tool) {
        throw new Error(`Unknown tool: ${name}`);
      }
      return tool.execute(args, ctx);
    },
  };
}
