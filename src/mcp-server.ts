import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { AppServices } from "./context.js";
import { toolRegistry } from "./tools/registry.js";
import { errorResult } from "./tools/responses.js";
import type { ToolRunResult } from "./tools/types.js";
import { loggerFor, payloadByteLength, formatPayloadForDebug, formatErrorMessage } from "./logger.js";

export const SERVER_NAME = "game-sage";
export const SERVER_VERSION = "0.1.0";

const toolLogger = loggerFor("tool");

export type CallToolResponse = {
  content: ToolRunResult["content"];
  structuredContent?: ToolRunResult["structuredContent"];
  metadata?: ToolRunResult["metadata"];
  isError?: boolean;
};

/** Runs one tool call and logs it; never rejects. */
export async function handleToolCall(services: AppServices, name: string, args: unknown): Promise<CallToolResponse> {
  const startedAt = Date.now();
  if (toolLogger.isDebugEnabled()) {
    toolLogger.debug("tool request", { name, arguments: formatPayloadForDebug(args) });
  }

  try {
    const result = await toolRegistry.invoke(name, args, { services, logger: toolLogger });
    const response = toCallToolResult(result);
    const latency = Date.now() - startedAt;
    const bytes = payloadByteLength(response);
    const status = result.isError ? "error" : "ok";

    toolLogger.info(`call tool name=${name} status=${status} bytes=${bytes} latencyMs=${latency}`);

    if (toolLogger.isDebugEnabled()) {
      toolLogger.debug("tool response", { name, response: formatPayloadForDebug(response) });
    }

    return response;
  } catch (error) {
    const latency = Date.now() - startedAt;
    const response = toCallToolResult(errorResult(error));
    const bytes = payloadByteLength(response);

    toolLogger.error(
      `call tool name=${name} status=error bytes=${bytes} latencyMs=${latency} error=${formatErrorMessage(error)}`,
    );

    return response;
  }
}

export function createMcpServer(services: AppServices): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const startedAt = Date.now();
    const response = { tools: toolRegistry.list() };
    const latency = Date.now() - startedAt;
    toolLogger.info(
      `list tools count=${response.tools.length} bytes=${payloadByteLength(response)} latencyMs=${latency}`,
    );
    return response;
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name } = request.params;
    return handleToolCall(services, name, request.params.arguments ?? {});
  });

  return server;
}

export async function runMcpServer(services: AppServices): Promise<void> {
  console.error(`Starting ${SERVER_NAME} MCP server...`);
  const server = createMcpServer(services);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${SERVER_NAME} MCP server running on stdio`);
}

function toCallToolResult(result: ToolRunResult): CallToolResponse {
  const base: CallToolResponse = { content: result.content };

  if (result.structuredContent !== undefined) {
    base.structuredContent = result.structuredContent;
  }
  if (result.metadata !== undefined) {
    base.metadata = result.metadata;
  }
  if (result.isError) {
    base.isError = true;
  }

  return base;
}
