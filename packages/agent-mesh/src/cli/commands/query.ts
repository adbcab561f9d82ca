import type { Command } from "commander";
import { c, formatAgentStatus, outputJson } from "../output.ts";
import {
  addCommonOptions,
  buildNetwork,
  createClientLogger,
  loadConfigOrExit,
  parseRouterType,
  type CommonOptions,
} from "../setup.ts";

interface QueryOptions extends CommonOptions {
  agent?: string;
  router?: string;
  endpoint?: string[];
  json?: boolean;
}

export function registerQueryCommands(program: Command) {
  addCommonOptions(
    program
      .command("agents")
      .description("List known agents and whether they are reachable")
      .option("--endpoint <spec...>", "Extra agents, as name=url")
      .option("--json", "Output as JSON"),
  ).action(async (options: QueryOptions) => {
    const config = loadConfigOrExit(options);
    const logger = createClientLogger(options.debug);
    const network = await buildNetwork({ config, endpointSpecs: options.endpoint, logger });
    const agents = await network.listAgents();

    if (options.json) {
      outputJson(agents);
      return;
    }
    if (agents.length === 0) {
      console.log(c.dim("No agents. Start one with: agent-mesh serve <agent>"));
      return;
    }
    console.log("Agents:\n");
    for (const status of agents) console.log(formatAgentStatus(status));
  });

  addCommonOptions(
    program
      .command("query <text>")
      .description("Route a query to the best agent and print its answer")
      .option("-a, --agent <name>", "Send to this agent instead of routing")
      .option("-r, --router <type>", "Routing strategy: keyword | ai")
      .option("--endpoint <spec...>", "Extra agents, as name=url")
      .option("--json", "Output as JSON"),
  )
    .addHelpText(
      "after",
      `
Examples:
  $ agent-mesh query "What is 12 * 4?"
  $ agent-mesh query "capital of France" --agent knowledge
  $ agent-mesh query "Plan a trip to Paris" --router ai --json
    `,
    )
    .action(async (text: string, options: QueryOptions) => {
      const config = loadConfigOrExit(options);
      const logger = createClientLogger(options.debug);
      const router = parseRouterType(options.router, config.router);
      const network = await buildNetwork({ config, endpointSpecs: options.endpoint, router, logger });

      let agent = options.agent ?? null;
      let confidence = options.agent ? 1 : 0;
      if (!options.agent && network.directory.size > 0) {
        const decision = await network.routeQuery(text);
        agent = decision.agent;
        confidence = decision.confidence;
      }

      // A routed query is dispatched to the decided agent so the answer matches what is shown
      const response = await network.processQuery(text, agent ?? undefined);

      if (options.json) {
        outputJson({ query: text, agent, confidence, router: network.router.type, response });
        return;
      }
      if (agent && !options.agent) {
        console.error(c.dim(`→ ${agent} (confidence: ${confidence.toFixed(2)})`));
      }
      console.log(response);
    });
}
