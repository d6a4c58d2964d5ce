import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { HelmClient, ToolRunResult } from '../src/chart/helm.js';

export function toolResult(exitCode = 0, output = ''): ToolRunResult {
  return { success: exitCode === 0, exitCode, output, stdout: output };
}

export interface HelmCall {
  command: 'dependency update' | 'lint' | 'template';
  chartPath: string;
  args: readonly string[];
}

/**
 * In-process HelmClient that records calls and returns canned results
 */
export class FakeHelm implements HelmClient {
  readonly calls: HelmCall[] = [];
  dependencyResult: ToolRunResult | Error = toolResult();
  lintResults = new Map<string, ToolRunResult | Error>();
  templateResult: ToolRunResult = toolResult(0, 'kind: ConfigMap\n');
  /** Invoked while `helm dependency update` is "running" */
  onDependencyUpdate?: (chartPath: string, repositoryCache: string) => void;

  async updateDependencies(chartPath: string, repositoryCache: string): Promise<ToolRunResult> {
    this.calls.push({ command: 'dependency update', chartPath, args: [repositoryCache] });
    this.onDependencyUpdate?.(chartPath, repositoryCache);
    if (this.dependencyResult instanceof Error) {
      throw this.dependencyResult;
    }
    return this.dependencyResult;
  }

  async lint(chartPath: string, valuesFiles: readonly string[]): Promise<ToolRunResult> {
    this.calls.push({ command: 'lint', chartPath, args: valuesFiles });
    const result = this.lintResults.get(chartPath) ?? toolResult();
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }

  async template(releaseName: string, chartPath: string, valuesFiles: readonly string[]): Promise<ToolRunResult> {
    this.calls.push({ command: 'template', chartPath, args: [releaseName, ...valuesFiles] });
    return this.templateResult;
  }
}

export function makeTempDir(prefix = 'chartcheck-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Write a chart directory; keys of `files` are paths relative to the chart
 */
export function writeChart(
  root: string,
  name: string,
  files: Record<string, string> = {},
  manifest = `apiVersion: v2\nname: ${name}\nversion: 0.1.0\n`
): string {
  const chartDir = path.join(root, name);
  fs.mkdirSync(chartDir, { recursive: true });
  fs.writeFileSync(path.join(chartDir, 'Chart.yaml'), manifest);
  for (const [relative, content] of Object.entries(files)) {
    const filePath = path.join(chartDir, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
  return chartDir;
}
