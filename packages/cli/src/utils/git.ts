import { spawn } from "node:child_process";
import { errorMessage } from "@chartcheck/core";
import { debug } from "./logger.js";

/**
 * Top-level directory of the git repository containing `cwd`
 *
 * Outside a repository, or without git on PATH, there is none.
 */
export async function findRepositoryRoot(cwd: string): Promise<string | undefined> {
  try {
    const root = (await runGit(["rev-parse", "--show-toplevel"], cwd)).trim();
    return root.length > 0 ? root : undefined;
  } catch (err) {
    debug(`No git repository at ${cwd}: ${errorMessage(err)}`);
    return undefined;
  }
}

function runGit(args: string[], cwd: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn("git", args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", (err) => {
      reject(new Error(`failed to run git: ${err.message}`));
    });
    child.on("close", (code) => {
      if (code === 0) {
        resolve(Buffer.concat(stdout).toString("utf8"));
        return;
      }
      const message = Buffer.concat(stderr).toString("utf8").trim();
      reject(new Error(message || `git ${args.join(" ")} exited with code ${code ?? "unknown"}`));
    });
  });
}
