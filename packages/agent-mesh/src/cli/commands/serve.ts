import type { Command } from "commander";
import { HttpAgentClient } from "../../agent/client.ts";
import { BUILTIN_AGENTS, createBuiltinAgent, isBuiltinAgent } from "../../agents/index.ts";
import { mergeEndpoints, parseEndpointSpecs } from "../../config.ts";
import { registerAgent, unregisterAgent } from "../../daemon/registry.ts";
import { startAgentServer } from "../../daemon/server.ts";
import { createLogger } from "../../logger.ts";
import { serveMcpHttp } from "../../tools/http.ts";
import { isToolServer, TOOL_SERVER_NAMES, TOOL_SERVERS, type ToolServerName } from "../../tools/index.ts";
import { exitError } from "../output.ts";
import { addCommonOptions, loadConfigOrExit, registeredEndpoints, type CommonOptions } from "../setup.ts";

interface ServeOptions extends CommonOptions {
  port: string;
  host: string;
  name?: string;
  connect?: string[];
  tools?: string[];
}

interface McpOptions extends CommonOptions {
  port?: string;
  host: string;
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) exitError(`Invalid port: ${value}`);
  return port;
}

/** "travel=http://127.0.0.1:5003/mcp" specs, restricted to known tool servers */
function parseToolSpecs(specs: readonly string[] | undefined): Partial<Record<ToolServerName, string>> {
  const urls: Partial<Record<ToolServerName, string>> = {};
  for (const [server, url] of Object.entries(parseEndpointSpecs(specs))) {
    if (!isToolServer(server)) {
      throw new Error(`Unknown tool server '${server}'. Tool servers: ${TOOL_SERVER_NAMES.join(", ")}`);
    }
    urls[server] = url;
  }
  return urls;
}

/** Run until SIGINT/SIGTERM, then clean up once */
function onShutdown(cleanup: () => Promise<void>): void {
  let stopping = false;
  const stop = () => {
    if (stopping) return;
    stopping = true;
    cleanup().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);
}

export function registerServeCommands(program: Command) {
  addCommonOptions(
    program
      .command("serve <agent>")
      .description(`Run a built-in agent server (${BUILTIN_AGENTS.join(", ")})`)
      .option("-p, --port <port>", "Port (0 = random)", "0")
      .option("--host <host>", "Bind address", "127.0.0.1")
      .option("-n, --name <name>", "Registry name (default: the agent kind)")
      .option("--connect <spec...>", "Agents this one may call, as name=url")
      .option("--tools <spec...>", "Running tool servers, as server=url (default: in-process)"),
  )
    .addHelpText(
      "after",
      `
Examples:
  $ agent-mesh serve math --port 5000
  $ agent-mesh serve weather --tools weather=http://127.0.0.1:5001/mcp
  $ agent-mesh serve travel --connect weather=http://127.0.0.1:5010 --tools travel=http://127.0.0.1:5003/mcp
    `,
    )
    .action(async (kind: string, options: ServeOptions) => {
      if (!isBuiltinAgent(kind)) {
        exitError(`Unknown agent '${kind}'. Built-in agents: ${BUILTIN_AGENTS.join(", ")}`);
      }
      const config = loadConfigOrExit(options);
      const name = options.name ?? kind;
      const logger = createLogger({ debug: options.debug, prefix: name });

      let flags: Record<string, string>;
      let toolFlags: Partial<Record<ToolServerName, string>>;
      try {
        flags = parseEndpointSpecs(options.connect);
        toolFlags = parseToolSpecs(options.tools);
      } catch (error) {
        exitError(error instanceof Error ? error.message : String(error));
      }
      const endpoints = mergeEndpoints(registeredEndpoints(), config.agents, flags);
      const connections = Object.fromEntries(
        Object.entries(endpoints)
          .filter(([peer]) => peer !== name)
          .map(([peer, url]) => [peer, new HttpAgentClient(peer, url, { timeoutMs: config.timeoutMs })]),
      );

      const handler = await createBuiltinAgent(kind, {
        logger,
        connections,
        toolUrls: { ...config.tools, ...toolFlags },
      });
      const running = await startAgentServer({
        handler,
        port: parsePort(options.port),
        host: options.host,
        logger,
      });

      registerAgent({
        name,
        url: running.url,
        displayName: handler.card.name,
        pid: process.pid,
        startedAt: new Date().toISOString(),
      });
      console.log(`${handler.card.name} running at ${running.url} (registered as '${name}')`);

      onShutdown(async () => {
        unregisterAgent(name);
        await running.close();
      });
    });

  addCommonOptions(
    program
      .command("mcp [server]")
      .description(`Run a tool server over Streamable HTTP (${TOOL_SERVER_NAMES.join(", ")})`)
      .option("-p, --port <port>", "Port (0 = random; default depends on the server)")
      .option("--host <host>", "Bind address", "127.0.0.1"),
  )
    .addHelpText(
      "after",
      `
Default ports: ${TOOL_SERVER_NAMES.map((name) => `${name} ${TOOL_SERVERS[name].defaultPort}`).join(", ")}

Examples:
  $ agent-mesh mcp
  $ agent-mesh mcp travel --port 6003
    `,
    )
    .action(async (server: string | undefined, options: McpOptions) => {
      const name = server ?? "weather";
      if (!isToolServer(name)) {
        exitError(`Unknown tool server '${name}'. Tool servers: ${TOOL_SERVER_NAMES.join(", ")}`);
      }
      const entry = TOOL_SERVERS[name];
      const logger = createLogger({ debug: options.debug, prefix: `mcp:${name}` });
      const running = await serveMcpHttp({
        createServerInstance: entry.prepare({ logger }),
        port: options.port === undefined ? entry.defaultPort : parsePort(options.port),
        host: options.host,
        logger,
      });
      console.log(`${name} tools available at ${running.url}`);
      onShutdown(() => running.close());
    });
}
