import type { EnvironmentConfig } from "../utils/config.js";
import { renderTable } from "./table.js";

export function formatEnvironments(environments: Readonly<Record<string, EnvironmentConfig>>): string {
  const names = Object.keys(environments).sort();
  if (names.length === 0) {
    return "No environments configured.";
  }

  const rows = names.map((name) => {
    const files = environments[name]?.valuesFiles ?? [];
    return [name, files.map((file) => `• ${file}`).join("\n")];
  });
  return renderTable(["Environment", "Values Files"], rows);
}
