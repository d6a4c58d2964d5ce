import { vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { HelmClient, ToolRunResult } from "@chartcheck/core";
import type { CliDependencies } from "../src/types.js";

export function toolResult(exitCode = 0, output = ""): ToolRunResult {
  return { success: exitCode === 0, exitCode, output, stdout: output };
}

/**
 * HelmClient that never leaves the process
 */
export class StubHelm implements HelmClient {
  readonly linted: Array<{ chartPath: string; valuesFiles: readonly string[] }> = [];
  readonly rendered: Array<{ releaseName: string; chartPath: string; valuesFiles: readonly string[] }> = [];
  lintResults = new Map<string, ToolRunResult>();
  renderOutput = (releaseName: string): string => `# release ${releaseName}\nkind: ConfigMap`;

  async updateDependencies(): Promise<ToolRunResult> {
    return toolResult();
  }

  async lint(chartPath: string, valuesFiles: readonly string[]): Promise<ToolRunResult> {
    this.linted.push({ chartPath, valuesFiles });
    return this.lintResults.get(chartPath) ?? toolResult();
  }

  async template(releaseName: string, chartPath: string, valuesFiles: readonly string[]): Promise<ToolRunResult> {
    this.rendered.push({ releaseName, chartPath, valuesFiles });
    return toolResult(0, this.renderOutput(releaseName));
  }
}

export interface TestDependencies extends CliDependencies {
  helm: StubHelm;
  helmBinaries: Array<string | undefined>;
}

export function createTestDependencies(
  cwd: string,
  overrides: { env?: NodeJS.ProcessEnv; repositoryRoot?: string } = {}
): TestDependencies {
  const helm = new StubHelm();
  const helmBinaries: Array<string | undefined> = [];
  return {
    cwd,
    env: overrides.env ?? {},
    helm,
    helmBinaries,
    createHelm: (binary) => {
      helmBinaries.push(binary);
      return helm;
    },
    findRepositoryRoot: async () => overrides.repositoryRoot,
    interactive: false,
  };
}

export function makeTempDir(): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "chartcheck-cli-test-")));
}

export function writeFile(root: string, relative: string, content: string): string {
  const filePath = path.join(root, relative);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

export function writeChart(root: string, name: string, files: Record<string, string> = {}): string {
  writeFile(root, path.join(name, "Chart.yaml"), `apiVersion: v2\nname: ${path.basename(name)}\nversion: 0.1.0\n`);
  for (const [relative, content] of Object.entries(files)) {
    writeFile(root, path.join(name, relative), content);
  }
  return path.join(root, name);
}

export interface CapturedOutput {
  /** console.log lines */
  logs: string[];
  /** console.error lines */
  errors: string[];
  /** raw process.stdout writes */
  stdout: string[];
  /** raw process.stderr writes */
  stderr: string[];
}

/**
 * Silence and record console and process output until vi.restoreAllMocks()
 */
export function captureOutput(): CapturedOutput {
  const captured: CapturedOutput = { logs: [], errors: [], stdout: [], stderr: [] };
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    captured.logs.push(args.map((arg) => String(arg)).join(" "));
  });
  vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    captured.errors.push(args.map((arg) => String(arg)).join(" "));
  });
  vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    captured.stdout.push(String(chunk));
    return true;
  });
  vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    captured.stderr.push(String(chunk));
    return true;
  });
  return captured;
}
