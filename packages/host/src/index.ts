export * from "./store.js";
export * from "./db.js";
export * from "./engine.js";
export * from "./commands.js";
