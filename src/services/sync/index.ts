export * from "./reconcile.js";
export * from "./staff.js";
export * from "./classes.js";
export * from "./students.js";
export * from "./orchestrator.js";
export * from "./runtime.js";
