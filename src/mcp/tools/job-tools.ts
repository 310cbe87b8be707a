/**
 * MCP Job Tools
 *
 * Implements submit_job, get_job, list_jobs, cancel_job, get_job_logs,
 * handle_control
 */

import { JobStatusSchema, type JobListFilter } from "../../types/job.js";
import {
  CancelJobInputSchema,
  GetJobLogsInputSchema,
  HandleControlInputSchema,
  JobIdInputSchema,
  ListJobsInputSchema,
  SubmitJobInputSchema,
} from "../types.js";
import type { RegisteredTool, ToolRegistryOptions } from "./index.js";
import { defineTool } from "./define-tool.js";
import { toJobInfo } from "./serializers.js";

/**
 * Create job tool handlers
 */
export function createJobTools(options: ToolRegistryOptions): RegisteredTool[] {
  const { orchestrator } = options;

  return [
    defineTool({
      name: "submit_job",
      description: "Queue an instruction for the coding agent in a session",
      inputSchema: {
        type: "object",
        properties: {
          sessionId: { type: "string", description: "Session to run the job in" },
          instruction: { type: "string", description: "Instruction for the coding agent" },
        },
        required: ["sessionId", "instruction"],
      },
      input: SubmitJobInputSchema,
      run: (input) => orchestrator.submitJob(input.sessionId, input.instruction),
    }),

    defineTool({
      name: "get_job",
      description: "Get the status and outcome of a job",
      inputSchema: {
        type: "object",
        properties: {
          jobId: { type: "string", description: "Job ID" },
        },
        required: ["jobId"],
      },
      input: JobIdInputSchema,
      run: (input) => toJobInfo(orchestrator.getJob(input.jobId)),
    }),

    defineTool({
      name: "list_jobs",
      description: "List jobs, newest first",
      inputSchema: {
        type: "object",
        properties: {
          sessionId: { type: "string", description: "Only jobs of this session" },
          statuses: {
            type: "array",
            items: { type: "string", enum: [...JobStatusSchema.options] },
            description: "Only jobs in these statuses",
          },
          limit: { type: "number", description: "Maximum jobs to return" },
        },
      },
      input: ListJobsInputSchema,
      run: (input) => {
        const filter: JobListFilter = {};
        if (input.sessionId !== undefined) {
          filter.sessionId = input.sessionId;
        }
        if (input.statuses !== undefined) {
          filter.statuses = input.statuses;
        }
        if (input.limit !== undefined) {
          filter.limit = input.limit;
        }
        const jobs = orchestrator.listJobs(filter);
        return { count: jobs.length, jobs: jobs.map(toJobInfo) };
      },
    }),

    defineTool({
      name: "cancel_job",
      description: "Cancel a queued, running or waiting job",
      inputSchema: {
        type: "object",
        properties: {
          jobId: { type: "string", description: "Job ID" },
          reason: { type: "string", description: "Why the job is canceled" },
        },
        required: ["jobId"],
      },
      input: CancelJobInputSchema,
      run: async (input) => toJobInfo(await orchestrator.cancelJob(input.jobId, input.reason ?? "Canceled by user")),
    }),

    defineTool({
      name: "get_job_logs",
      description: "Read the last lines of a job's raw agent output",
      inputSchema: {
        type: "object",
        properties: {
          jobId: { type: "string", description: "Job ID" },
          tail: { type: "number", description: "Number of trailing lines (default 50)" },
        },
        required: ["jobId"],
      },
      input: GetJobLogsInputSchema,
      run: (input) => orchestrator.getJobLogs(input.jobId, input.tail),
    }),

    defineTool({
      name: "handle_control",
      description: "Apply a tracker control token (pause, resume, cancel, approve, deny, summary, logs)",
      inputSchema: {
        type: "object",
        properties: {
          token: { type: "string", description: "Control token of the form action:jobId" },
        },
        required: ["token"],
      },
      input: HandleControlInputSchema,
      run: async (input) => {
        const result = await orchestrator.handleControl(input.token);
        return { action: result.action, message: result.message, job: toJobInfo(result.job) };
      },
    }),
  ];
}
