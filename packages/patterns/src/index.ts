export * from "./errors.js";
export * from "./settings.js";
export * from "./pattern-set.js";
export * from "./config-file.js";
