/**
 * Main CLI setup using Commander.js
 *
 * Creates the program with its global options and registers every command.
 */
import { Command, CommanderError, Option } from "commander";
import {
  createEnvironmentsCommand,
  createScanCommand,
  createTemplateCommand,
  createVersionCommand,
  listEnvironments,
} from "./commands/index.js";
import { CLI_NAME, CLI_VERSION, EXIT_CODES } from "./constants.js";
import type { GlobalOptions } from "./context.js";
import { createDefaultDependencies } from "./dependencies.js";
import { formatCliError, toCliError } from "./errors.js";
import type { CliDependencies } from "./types.js";
import { getLoggerOptions } from "./utils/logger.js";

export { CLI_NAME, CLI_VERSION, EXIT_CODES };

/**
 * Create the main CLI program
 */
export function createProgram(deps: CliDependencies = createDefaultDependencies()): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Check Helm charts for value references their values never define")
    .version(CLI_VERSION, "-V, --version", "Output the version number")
    .helpOption("-h, --help", "Display help for command")
    .addHelpText(
      "after",
      `
Examples:
  $ chartcheck scan charts/                  Scan every chart under charts/
  $ chartcheck scan web -f prod.yaml         Scan with an extra values file
  $ chartcheck scan charts/ -e staging       Use the staging environment's values
  $ chartcheck scan charts/ -o junit         Write a JUnit report
  $ chartcheck template web -o out.yaml      Render a chart into out.yaml`
    );

  program
    .addOption(new Option("-v, --verbose", "Enable verbose output").default(false))
    .addOption(new Option("-q, --quiet", "Minimize output (only errors)").default(false))
    .addOption(new Option("-c, --config <path>", "Configuration file path"))
    .addOption(new Option("--no-color", "Disable color output"))
    .addOption(new Option("--json", "Output logs in JSON format").default(false))
    .addOption(
      new Option("-l, --list-environments", "List the environments configured in chartcheck.yaml").default(false)
    );

  program.addCommand(createScanCommand(deps));
  program.addCommand(createTemplateCommand(deps));
  program.addCommand(createEnvironmentsCommand(deps));
  program.addCommand(createVersionCommand());

  program.action(async (options: GlobalOptions, command: Command) => {
    if (options.listEnvironments) {
      await listEnvironments(command, deps);
      return;
    }
    command.outputHelp();
  });

  return program;
}

function applyExitOverride(command: Command): void {
  command.exitOverride();
  for (const subcommand of command.commands) {
    applyExitOverride(subcommand);
  }
}

/**
 * Run the CLI program and set process.exitCode
 */
export async function run(args: string[] = process.argv, deps?: CliDependencies): Promise<void> {
  const program = createProgram(deps);
  applyExitOverride(program);

  try {
    await program.parseAsync(args);
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander has already printed help, the version or its own message
      process.exitCode = err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID_ARGUMENT;
      return;
    }

    const cliError = toCliError(err);
    console.error(formatCliError(cliError, getLoggerOptions().json === true));
    process.exitCode = cliError.exitCode;
  }
}
