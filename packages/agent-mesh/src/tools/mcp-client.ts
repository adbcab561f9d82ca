/**
 * Tool server connections for agents.
 *
 * An agent talks to an MCP tool server either over Streamable HTTP (a
 * separately running `agent-mesh mcp`) or in-process through a linked
 * in-memory transport.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

export interface ToolConnection {
  /** Call a tool; resolves to its text output, throws when the tool reports an error */
  call(tool: string, args: Record<string, unknown>): Promise<string>;
  listTools(): Promise<string[]>;
  /** Text of a resource; binary parts are skipped */
  readResource(uri: string): Promise<string>;
  close(): Promise<void>;
}

const toolResultSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }))
    .default([]),
  isError: z.boolean().optional(),
});

function wrap(client: Client, label: string): ToolConnection {
  return {
    async call(tool, args) {
      const raw = await client.callTool({ name: tool, arguments: args });
      const result = toolResultSchema.parse(raw);
      const text = result.content
        .map((block) => (block.type === "text" ? (block.text ?? "") : ""))
        .join("");
      if (result.isError) throw new Error(text || `Tool ${tool} failed on ${label}`);
      return text;
    },
    async listTools() {
      const { tools } = await client.listTools();
      return tools.map((t) => t.name);
    },
    async readResource(uri) {
      const { contents } = await client.readResource({ uri });
      let text = "";
      for (const item of contents) {
        if ("text" in item && typeof item.text === "string") text += item.text;
      }
      return text;
    },
    close: () => client.close(),
  };
}

export async function connectHttp(url: string, clientName = "agent-mesh"): Promise<ToolConnection> {
  const client = new Client({ name: clientName, version: "1.0.0" });
  await client.connect(new StreamableHTTPClientTransport(new URL(url)));
  return wrap(client, url);
}

export async function connectInProcess(
  server: McpServer,
  clientName = "agent-mesh",
): Promise<ToolConnection> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: clientName, version: "1.0.0" });
  await client.connect(clientTransport);
  return wrap(client, "in-process");
}
