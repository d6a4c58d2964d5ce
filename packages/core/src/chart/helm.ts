/**
 * Helm subprocess collaborator
 *
 * The scanner treats helm as a black box: each call reports whether it
 * succeeded and hands back its raw output.
 */

import { spawn } from 'node:child_process';
import { ExternalToolError } from '../errors.js';

/**
 * Marker helm puts on lines that describe a failure
 */
export const ERROR_MARKER = '[ERROR]';

export interface ToolRunResult {
  success: boolean;
  exitCode: number;
  /** stdout followed by stderr */
  output: string;
  stdout: string;
}

export interface HelmClient {
  updateDependencies(chartPath: string, repositoryCache: string): Promise<ToolRunResult>;
  lint(chartPath: string, valuesFiles: readonly string[]): Promise<ToolRunResult>;
  template(releaseName: string, chartPath: string, valuesFiles: readonly string[]): Promise<ToolRunResult>;
}

export interface HelmCliOptions {
  /** helm executable, defaults to `helm` on PATH */
  binary?: string;
  cwd?: string;
}

/**
 * HelmClient backed by the helm binary
 *
 * A non-zero exit is a normal result; only a process that cannot be started
 * rejects, with ExternalToolError.
 */
export class HelmCli implements HelmClient {
  private readonly binary: string;
  private readonly cwd?: string;

  constructor(options: HelmCliOptions = {}) {
    this.binary = options.binary ?? 'helm';
    this.cwd = options.cwd;
  }

  updateDependencies(chartPath: string, repositoryCache: string): Promise<ToolRunResult> {
    return this.run(['dependency', 'update', '--repository-cache', repositoryCache, chartPath]);
  }

  lint(chartPath: string, valuesFiles: readonly string[]): Promise<ToolRunResult> {
    return this.run(['lint', '--strict', chartPath, ...valuesArgs(valuesFiles)]);
  }

  template(releaseName: string, chartPath: string, valuesFiles: readonly string[]): Promise<ToolRunResult> {
    return this.run(['template', releaseName, chartPath, ...valuesArgs(valuesFiles)]);
  }

  private run(args: string[]): Promise<ToolRunResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.binary, args, { cwd: this.cwd, stdio: ['ignore', 'pipe', 'pipe'] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
      child.on('error', (err) => {
        reject(
          new ExternalToolError(`Error running ${this.binary} ${args[0] ?? ''}: ${err.message}`.trim(), {
            tool: this.binary,
            cause: err,
          })
        );
      });
      child.on('close', (code) => {
        const out = Buffer.concat(stdout).toString('utf8');
        const err = Buffer.concat(stderr).toString('utf8');
        const exitCode = code ?? 1;
        resolve({ success: exitCode === 0, exitCode, output: out + err, stdout: out });
      });
    });
  }
}

function valuesArgs(valuesFiles: readonly string[]): string[] {
  return valuesFiles.flatMap((file) => ['--values', file]);
}

/**
 * Lines of tool output that carry the error marker, verbatim
 */
export function parseErrorLogs(output: string): string[] {
  return output.split('\n').filter((line) => line.includes(ERROR_MARKER));
}
