export * from "./approval.js";
export * from "./config.js";
export * from "./events.js";
export * from "./job.js";
export * from "./session.js";
