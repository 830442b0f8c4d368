import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { isRecord } from "../agent/normalizer.js";
import { logEvent, toErrorMessage } from "../telemetry.js";

function textContent(result: unknown): string {
  if (!isRecord(result) || !Array.isArray(result.content)) return "";
  return result.content
    .filter((item): item is Record<string, unknown> => isRecord(item) && item.type === "text")
    .map((item) => (typeof item.text === "string" ? item.text : ""))
    .join("\n");
}

/** One-shot tool calls against a streamable-HTTP MCP server. */
export class McpClient {
  constructor(private readonly endpoint: string) {}

  async callToolRaw(
    toolName: string,
    args: Record<string, unknown>,
    timeoutMs = 12_000,
  ): Promise<string> {
    const abortController = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      abortController.abort(new Error(`MCP tool timeout (${toolName}) after ${timeoutMs}ms`));
    }, timeoutMs);

    const transport = new StreamableHTTPClientTransport(new URL(this.endpoint), {
      requestInit: { signal: abortController.signal },
    });
    const client = new Client({ name: "diagnostic-pathway", version: "0.1.0" }, { capabilities: {} });

    try {
      await client.connect(transport);
      const result = await client.callTool(
        { name: toolName, arguments: args },
        CallToolResultSchema,
      );
      return textContent(result);
    } catch (error) {
      if (timedOut || abortController.signal.aborted) {
        throw new Error(`MCP tool timeout (${toolName}) after ${timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      await client.close().catch((error: unknown) => {
        logEvent("warn", "mcp.close_failed", { message: toErrorMessage(error) });
      });
    }
  }

  async callTool(
    toolName: string,
    args: Record<string, unknown>,
    timeoutMs = 12_000,
  ): Promise<unknown> {
    return parsePossibleJson(await this.callToolRaw(toolName, args, timeoutMs));
  }
}

/** Whole payload as JSON, else a trailing object or array; throws when neither parses. */
export function parsePossibleJson(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) return {};

  const candidates = [
    trimmed,
    trimmed.match(/\{[\s\S]*\}$/)?.[0],
    trimmed.match(/\[[\s\S]*\]$/)?.[0],
  ];
  for (const candidate of candidates) {
    if (!candidate) continue;
    try {
      return JSON.parse(candidate) as unknown;
    } catch {
      continue;
    }
  }
  throw new Error(`Unable to parse MCP JSON payload: ${trimmed.slice(0, 160)}`);
}
