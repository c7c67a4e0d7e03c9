export { JsonReporter } from "./json-reporter.js";
export { TerminalReporter, type TerminalReporterOptions } from "./terminal-reporter.js";
export type { LaunchReporter } from "./types.js";
