#!/usr/bin/env node
import { Command } from "commander";
import { registerConverseCommands } from "./commands/converse.ts";
import { registerQueryCommands } from "./commands/query.ts";
import { registerServeCommands } from "./commands/serve.ts";

const program = new Command();

program
  .name("agent-mesh")
  .description("Run agents, route queries between them, and chain them into conversations")
  .version("0.1.0");

registerServeCommands(program);
registerQueryCommands(program);
registerConverseCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
