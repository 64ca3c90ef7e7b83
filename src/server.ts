import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import type { ToolResult } from "./types/tool.js";
import type { ToolRegistry } from "./tools/registry.js";
import type { Dispatcher } from "./tools/dispatcher.js";
import { toInputSchema } from "./tools/schema.js";
import { buildHelpText, HELP_PROMPT_DESCRIPTION, HELP_PROMPT_NAME } from "./prompts/help.js";
import { ProcessError, ToolError } from "./shared/errors.js";
import { logger } from "./logger.js";

export const SERVER_NAME = "phalcon-dev-mcp";
export const SERVER_VERSION = "0.1.0";

/** Tool-level outcome -> CallToolResult. A nonzero exit is isError, not a JSON-RPC fault. */
export function renderResult(result: ToolResult): CallToolResult {
  if (result.success) {
    return { content: [{ type: "text", text: result.output }] };
  }
  const header = `Command failed with exit code ${result.exitCode ?? "unknown"}: ${result.command}`;
  return {
    content: [{ type: "text", text: result.output ? `${header}\n\n${result.output}` : header }],
    isError: true,
  };
}

/**
 * Validation failures become InvalidParams; launch failures and timeouts
 * InternalError. Both carry { kind, ... } in data so callers can branch on it.
 */
function toMcpError(err: unknown, tool: string): unknown {
  if (err instanceof ToolError) {
    return new McpError(ErrorCode.InvalidParams, err.message, { kind: err.code, tool: err.tool, ...err.context });
  }
  if (err instanceof ProcessError) {
    logger.error({ tool, code: err.code, context: err.context }, "Tool process error");
    return new McpError(ErrorCode.InternalError, err.message, { kind: err.code, tool, ...err.context });
  }
  logger.error({ tool, error: err instanceof Error ? err.message : String(err) }, "Tool execution error");
  return err;
}

export function createServer(registry: ToolRegistry, dispatcher: Dispatcher): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {}, prompts: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.getAll().map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: toInputSchema(t.params),
      annotations: { title: t.title, ...t.annotations },
    })),
  }));

  // Each call runs on its own promise; a slow CLI never blocks reading the next request.
  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    try {
      const result = await dispatcher.dispatch(name, args ?? {});
      return renderResult(result);
    } catch (err) {
      throw toMcpError(err, name);
    }
  });

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({
    prompts: [{ name: HELP_PROMPT_NAME, description: HELP_PROMPT_DESCRIPTION }],
  }));

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    if (request.params.name !== HELP_PROMPT_NAME) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown prompt: ${request.params.name}`);
    }
    return {
      description: HELP_PROMPT_DESCRIPTION,
      messages: [{ role: "user" as const, content: { type: "text" as const, text: buildHelpText(registry) } }],
    };
  });

  return server;
}
