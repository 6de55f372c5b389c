export * from "./types.js";
export * from "./colors.js";
export * from "./position.js";
export * from "./logger.js";
