// Main exports for the logging package

import pino from "pino";

export { createLogger, createNodeLogger, withSearchContext } from "./node.js";
export * from "./redaction.js";
export * from "./types.js";
export { pino };
