export { createServeCommand } from "./serve.js";
export { createJobsCommand, createJobCommand, createLogsCommand } from "./jobs.js";
export { createApprovalsCommand } from "./approvals.js";
export { createSessionsCommand } from "./sessions.js";
export { createConfigCommand } from "./config.js";
export { createHookCommand } from "./hook.js";
