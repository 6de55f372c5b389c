export * from "./diff.js";
export * from "./claim-markers.js";
export * from "./reconcile.js";
export * from "./maintenance.js";
export * from "./summary.js";
