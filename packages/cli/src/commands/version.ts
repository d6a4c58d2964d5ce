import { Command } from "commander";
import { CLI_NAME, CLI_VERSION } from "../constants.js";

export function createVersionCommand(): Command {
  return new Command("version").description(`Print the ${CLI_NAME} version`).action(() => {
    console.log(`${CLI_NAME} version ${CLI_VERSION}`);
  });
}
