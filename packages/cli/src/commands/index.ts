export { createScanCommand, discoverCharts, type ScanOptions } from "./scan.js";
export { createTemplateCommand, type TemplateOptions } from "./template.js";
export { createEnvironmentsCommand, listEnvironments } from "./environments.js";
export { createVersionCommand } from "./version.js";
