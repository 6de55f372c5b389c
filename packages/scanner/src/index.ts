export * from "./types.js";
export * from "./classify.js";
export * from "./session.js";
export * from "./world-scan.js";
