/**
 * Core module - Everything the CLI builds on
 */

export * from "./errors.js";

export * from "./symbols/index.js";
export * from "./rdf/index.js";
export * from "./sink/index.js";
export * from "./docs/index.js";
export * from "./extraction/index.js";
