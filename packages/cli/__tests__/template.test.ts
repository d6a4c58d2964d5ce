/**
 * chartcheck template command tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { run } from "../src/cli.js";
import { resetLogger } from "../src/utils/logger.js";
import {
  captureOutput,
  createTestDependencies,
  makeTempDir,
  writeChart,
  writeFile,
  type CapturedOutput,
} from "./helpers.js";

describe("chartcheck template command", () => {
  let tempDir: string;
  let captured: CapturedOutput;

  beforeEach(() => {
    tempDir = makeTempDir();
    process.exitCode = undefined;
    captured = captureOutput();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
    fs.rmSync(tempDir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it("should print the rendered manifests", async () => {
    const chart = writeChart(tempDir, "web");
    const deps = createTestDependencies(tempDir);

    await run(["node", "chartcheck", "template", chart], deps);

    expect(captured.logs).toEqual(["# release web\nkind: ConfigMap"]);
    expect(deps.helm.rendered).toEqual([{ releaseName: "web", chartPath: chart, valuesFiles: [] }]);
    expect(process.exitCode).toBe(0);
  });

  it("should append every chart to the output file", async () => {
    const api = writeChart(tempDir, "api");
    const web = writeChart(tempDir, "web");
    const outputFile = writeFile(tempDir, "out.yaml", "# existing\n");
    const deps = createTestDependencies(tempDir);

    await run(["node", "chartcheck", "template", api, web, "-o", "out.yaml"], deps);

    expect(fs.readFileSync(outputFile, "utf-8")).toBe(
      "# existing\n# release api\nkind: ConfigMap\n# release web\nkind: ConfigMap\n"
    );
    expect(captured.logs).toEqual([]);
  });

  it("should pass values files resolved against the working directory", async () => {
    const chart = writeChart(tempDir, "web");
    const deps = createTestDependencies(tempDir);

    await run(["node", "chartcheck", "template", chart, "-f", "prod.yaml"], deps);

    expect(deps.helm.rendered[0]?.valuesFiles).toEqual([path.join(tempDir, "prod.yaml")]);
  });

  it("should use an environment's values files", async () => {
    writeFile(tempDir, "chartcheck.yaml", "environments:\n  prod:\n    valuesFiles: [values/prod.yaml]\n");
    const chart = writeChart(tempDir, "web");
    const deps = createTestDependencies(tempDir);

    await run(
      ["node", "chartcheck", "-c", path.join(tempDir, "chartcheck.yaml"), "template", chart, "-e", "prod"],
      deps
    );

    expect(deps.helm.rendered[0]?.valuesFiles).toEqual([path.join(tempDir, "values", "prod.yaml")]);
  });

  it("should exit 3 for a chart name helm would reject", async () => {
    const chart = writeChart(tempDir, "Web_App");
    const deps = createTestDependencies(tempDir);

    await run(["node", "chartcheck", "template", chart], deps);

    expect(process.exitCode).toBe(3);
    expect(captured.errors.join("\n")).toContain(
      `[CONFIG_ERROR] Error rendering chart ${chart}: invalid release name: Web_App`
    );
    expect(deps.helm.rendered).toEqual([]);
  });

  it("should stop at the first chart that fails", async () => {
    const broken = writeChart(tempDir, "broken");
    const web = writeChart(tempDir, "web");
    const deps = createTestDependencies(tempDir);
    deps.helm.renderOutput = () => "";
    const template = deps.helm.template.bind(deps.helm);
    deps.helm.template = async (releaseName, chartPath, valuesFiles) => {
      const result = await template(releaseName, chartPath, valuesFiles);
      return releaseName === "broken" ? { ...result, success: false, exitCode: 1 } : result;
    };

    await run(["node", "chartcheck", "template", broken, web], deps);

    expect(process.exitCode).toBe(1);
    expect(captured.errors.join("\n")).toContain(
      `[EXTERNAL_TOOL_ERROR] Error rendering chart ${broken}: error running helm template: exit code 1`
    );
    expect(deps.helm.rendered.map((call) => call.releaseName)).toEqual(["broken"]);
  });
});
