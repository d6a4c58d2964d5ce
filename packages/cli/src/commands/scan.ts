/**
 * chartcheck scan command
 *
 * Finds every chart under the given paths, scans them concurrently and prints
 * the report. Exits with CHARTS_FAILED when any chart has diagnostics.
 */

import { Command, Option } from "commander";
import ora, { type Ora } from "ora";
import { ChartProcessor, findChartDirs, type ScanReport } from "@chartcheck/core";
import { EXIT_CODES } from "../constants.js";
import { announceConfig, collectFiles, setupGlobalOptions } from "../context.js";
import { formatReport } from "../formatters/index.js";
import { OUTPUT_FORMATS, type CliDependencies, type OutputFormat } from "../types.js";
import { resolveSettings } from "../utils/config.js";
import { logger, warn } from "../utils/logger.js";

export interface ScanOptions {
  values: string[];
  outputFormat?: OutputFormat;
  environment?: string;
}

/**
 * Chart directories under every path, in argument order
 */
export async function discoverCharts(paths: readonly string[]): Promise<string[]> {
  const chartDirs: string[] = [];
  for (const searchPath of paths) {
    chartDirs.push(...(await findChartDirs(searchPath)));
  }
  return chartDirs;
}

async function executeScan(
  paths: string[],
  options: ScanOptions,
  command: Command,
  deps: CliDependencies
): Promise<void> {
  const context = await setupGlobalOptions(command, deps);
  const settings = resolveSettings(context.loaded, {
    environment: options.environment,
    values: options.values,
    format: options.outputFormat,
    cwd: deps.cwd,
    env: deps.env,
  });
  announceConfig(context.loaded, settings.format);

  const chartDirs = await discoverCharts(paths);
  if (chartDirs.length === 0) {
    warn(`No charts found under ${paths.join(", ")}`);
  }

  const { quiet, json } = context.globalOptions;
  let spinner: Ora | undefined;
  if (deps.interactive && settings.format === "pretty" && !quiet && !json) {
    spinner = ora(`Scanning ${chartDirs.length} chart(s)`).start();
  }

  let finished = 0;
  const processor = new ChartProcessor({
    helm: deps.createHelm(settings.helmBinary),
    logger,
    onStage: (_chartPath, stage) => {
      if (stage === "done" && spinner) {
        finished += 1;
        spinner.text = `Scanning charts (${finished}/${chartDirs.length})`;
      }
    },
  });

  let report: ScanReport;
  try {
    report = await processor.scanCharts(chartDirs, settings.valuesFiles);
  } finally {
    spinner?.stop();
  }

  console.log(formatReport(report, settings.format, { color: context.color }));

  process.exitCode = report.invalidCharts > 0 ? EXIT_CODES.CHARTS_FAILED : EXIT_CODES.SUCCESS;
}

export function createScanCommand(deps: CliDependencies): Command {
  return new Command("scan")
    .description("Scan Helm charts for value references their values never define")
    .argument("<paths...>", "Chart directories, or directories containing charts")
    .option("-f, --values <files>", "Values files merged over each chart's values.yaml (repeatable)", collectFiles, [])
    .addOption(
      new Option("-o, --output-format <format>", "Output format").choices(OUTPUT_FORMATS)
    )
    .option("-e, --environment <name>", "Use the values files of an environment from chartcheck.yaml")
    .action(async (paths: string[], options: ScanOptions, command: Command) => {
      await executeScan(paths, options, command, deps);
    });
}
