import { HelmCli } from "@chartcheck/core";
import type { CliDependencies } from "./types.js";
import { findRepositoryRoot } from "./utils/git.js";

export function createDefaultDependencies(): CliDependencies {
  return {
    cwd: process.cwd(),
    env: process.env,
    createHelm: (binary) => new HelmCli({ binary }),
    findRepositoryRoot,
    interactive: process.stdout.isTTY === true,
  };
}
