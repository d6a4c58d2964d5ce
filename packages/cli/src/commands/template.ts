/**
 * chartcheck template command
 *
 * Renders each chart with `helm template`, to stdout or appended to a file.
 */

import { appendFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Command } from "commander";
import ora, { type Ora } from "ora";
import { renderChart } from "@chartcheck/core";
import { EXIT_CODES } from "../constants.js";
import { announceConfig, collectFiles, setupGlobalOptions } from "../context.js";
import { CliError, toCliError } from "../errors.js";
import type { CliDependencies } from "../types.js";
import { resolveSettings } from "../utils/config.js";
import { debug } from "../utils/logger.js";

export interface TemplateOptions {
  values: string[];
  output?: string;
  environment?: string;
}

async function executeTemplate(
  paths: string[],
  options: TemplateOptions,
  command: Command,
  deps: CliDependencies
): Promise<void> {
  const context = await setupGlobalOptions(command, deps);
  const settings = resolveSettings(context.loaded, {
    environment: options.environment,
    values: options.values,
    cwd: deps.cwd,
    env: deps.env,
  });
  const outputFile = options.output ? resolve(deps.cwd, options.output) : undefined;
  // rendered manifests own stdout unless they go to a file
  if (outputFile) {
    announceConfig(context.loaded);
  }

  const helm = deps.createHelm(settings.helmBinary);
  let spinner: Ora | undefined;
  if (deps.interactive && !context.globalOptions.quiet && !context.globalOptions.json) {
    spinner = ora().start();
  }

  try {
    for (const chartPath of paths) {
      if (spinner) {
        spinner.text = `Templating: ${chartPath}`;
      }
      debug(`Rendering ${chartPath}`, { valuesFiles: settings.valuesFiles });

      let manifests: string;
      try {
        manifests = await renderChart(chartPath, settings.valuesFiles, { helm, cwd: deps.cwd });
      } catch (err) {
        const cause = toCliError(err);
        throw new CliError({
          code: cause.code,
          message: `Error rendering chart ${chartPath}: ${cause.message}`,
          suggestion: cause.suggestion,
          exitCode: cause.exitCode,
        });
      }

      if (outputFile) {
        await appendFile(outputFile, `${manifests}\n`, "utf-8");
      } else {
        spinner?.clear();
        console.log(manifests);
      }
    }
  } finally {
    spinner?.stop();
  }

  process.exitCode = EXIT_CODES.SUCCESS;
}

export function createTemplateCommand(deps: CliDependencies): Command {
  return new Command("template")
    .description("Render Helm charts with helm template")
    .argument("<paths...>", "Chart directories to render")
    .option("-f, --values <files>", "Values files passed to helm template (repeatable)", collectFiles, [])
    .option("-o, --output <file>", "Append the rendered manifests to this file")
    .option("-e, --environment <name>", "Use the values files of an environment from chartcheck.yaml")
    .action(async (paths: string[], options: TemplateOptions, command: Command) => {
      await executeTemplate(paths, options, command, deps);
    });
}
