import { Command } from "commander";
import { announceConfig, setupGlobalOptions } from "../context.js";
import { formatEnvironments } from "../formatters/index.js";
import type { CliDependencies } from "../types.js";
import { json } from "../utils/logger.js";

/**
 * Print the environments configured in chartcheck.yaml
 */
export async function listEnvironments(command: Command, deps: CliDependencies): Promise<void> {
  const context = await setupGlobalOptions(command, deps);
  const { environments } = context.loaded.config;

  if (context.globalOptions.json) {
    json(environments);
    return;
  }

  announceConfig(context.loaded);
  console.log(formatEnvironments(environments));
}

export function createEnvironmentsCommand(deps: CliDependencies): Command {
  return new Command("environments")
    .description("List the environments configured in chartcheck.yaml")
    .action(async (_options: unknown, command: Command) => {
      await listEnvironments(command, deps);
    });
}
