import type { Logger } from "../types.js";

/** Default sink: progress to stdout, warnings to stderr. */
export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(`Warning: ${message}`),
};

/** Everything to stderr. Used where stdout carries a protocol (MCP stdio). */
export const stderrLogger: Logger = {
  info: (message) => process.stderr.write(`${message}\n`),
  warn: (message) => process.stderr.write(`Warning: ${message}\n`),
};
