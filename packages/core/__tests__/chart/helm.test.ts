import { describe, it, expect } from 'vitest';
import { HelmCli, parseErrorLogs } from '../../src/chart/helm.js';
import { ExternalToolError } from '../../src/errors.js';

describe('parseErrorLogs', () => {
  it('should keep only lines carrying the error marker, verbatim', () => {
    const output = [
      '==> Linting ./web',
      '[INFO] Chart.yaml: icon is recommended',
      '[ERROR] templates/: template: web/templates/a.yaml:3: unexpected EOF',
      '  [ERROR] values.yaml: unable to parse',
      '',
      'Error: 1 chart(s) linted, 1 chart(s) failed',
    ].join('\n');

    expect(parseErrorLogs(output)).toEqual([
      '[ERROR] templates/: template: web/templates/a.yaml:3: unexpected EOF',
      '  [ERROR] values.yaml: unable to parse',
    ]);
  });

  it('should return nothing for clean output', () => {
    expect(parseErrorLogs('1 chart(s) linted, 0 chart(s) failed\n')).toEqual([]);
  });
});

describe('HelmCli', () => {
  it('should reject with ExternalToolError when the binary cannot be started', async () => {
    const helm = new HelmCli({ binary: '/nonexistent/helm' });

    const error = await helm.lint('web', []).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error).toMatchObject({ tool: '/nonexistent/helm' });
    expect(error instanceof Error ? error.message : '').toMatch(/^Error running \/nonexistent\/helm lint: /);
  });

  it('should resolve a non-zero exit as an unsuccessful result', async () => {
    // the node binary treats "lint" as a script path that does not exist
    const helm = new HelmCli({ binary: process.execPath });

    const result = await helm.lint('web', []);

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(1);
    expect(result.output).toContain('Cannot find module');
  });
});
