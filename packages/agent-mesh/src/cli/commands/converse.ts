import type { Command } from "commander";
import { exitError, formatTranscript, outputJson } from "../output.ts";
import { addCommonOptions, buildNetwork, createClientLogger, loadConfigOrExit, type CommonOptions } from "../setup.ts";

interface ConverseOptions extends CommonOptions {
  workflow: string;
  endpoint?: string[];
  json?: boolean;
}

/** "weather, travel" → ["weather", "travel"] */
export function parseWorkflow(value: string): string[] {
  return value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export function registerConverseCommands(program: Command) {
  addCommonOptions(
    program
      .command("converse <text>")
      .description("Pass a query through a sequence of agents, each answering the previous reply")
      .requiredOption("-w, --workflow <agents>", "Comma-separated agent names, in order")
      .option("--endpoint <spec...>", "Extra agents, as name=url")
      .option("--json", "Output as JSON"),
  )
    .addHelpText(
      "after",
      `
Examples:
  $ agent-mesh converse "Plan a 3-day trip to Paris" --workflow travel,knowledge
  $ agent-mesh converse "What is 6 * 7?" -w math,knowledge --json
    `,
    )
    .action(async (text: string, options: ConverseOptions) => {
      const config = loadConfigOrExit(options);
      const logger = createClientLogger(options.debug);
      const network = await buildNetwork({ config, endpointSpecs: options.endpoint, logger });

      const workflow = parseWorkflow(options.workflow);
      const check = await network.validateWorkflow(workflow);
      if (!check.valid) exitError(check.error ?? "Invalid workflow");

      const conversation = await network.startConversation(text, workflow);

      if (options.json) {
        outputJson(conversation);
        return;
      }
      console.log(formatTranscript(conversation));
    });
}
