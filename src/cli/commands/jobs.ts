import { Command } from "commander";
import { join } from "node:path";
import pc from "picocolors";
import { loadConfig } from "../config/loader.js";
import { StateManager } from "../../core/state/state-manager.js";
import { jobLogPath, readLogTail } from "../../infra/job-log.js";
import { logger } from "../../infra/logger.js";
import { JobStatusSchema, type Job, type JobListFilter, type JobStatus } from "../../types/job.js";

const STATUS_COLORS: Record<JobStatus, (text: string) => string> = {
  queued: pc.dim,
  running: pc.cyan,
  waiting_approval: pc.yellow,
  done: pc.green,
  failed: pc.red,
  canceled: pc.gray,
};

export function formatStatus(status: JobStatus): string {
  return STATUS_COLORS[status](status);
}

function formatJobLine(job: Job): string {
  const instruction = job.instruction.length > 60 ? `${job.instruction.slice(0, 57)}...` : job.instruction;
  return `  ${pc.bold(job.id)}  ${formatStatus(job.status).padEnd(28)} ${pc.dim(job.sessionId)}  ${instruction}`;
}

function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

interface JobsOptions {
  session?: string;
  status?: string[];
  limit: string;
  json: boolean;
}

export function createJobsCommand(): Command {
  return new Command("jobs")
    .description("List jobs, newest first")
    .option("-s, --session <id>", "Only jobs of this session")
    .option("--status <statuses...>", "Only jobs in these statuses")
    .option("-n, --limit <count>", "Number of jobs to show", "20")
    .option("--json", "Output as JSON", false)
    .action((options: JobsOptions) => {
      const config = loadConfig();
      const store = new StateManager(config.dataDir);
      try {
        const filter: JobListFilter = { limit: parsePositiveInt(options.limit, "limit") };
        if (options.session) {
          filter.sessionId = options.session;
        }
        if (options.status) {
          filter.statuses = options.status.map((status) => JobStatusSchema.parse(status));
        }
        const jobs = store.listJobs(filter);

        if (options.json) {
          console.log(JSON.stringify(jobs, null, 2));
          return;
        }

        logger.header("agent-relay - Jobs");
        if (jobs.length === 0) {
          console.error(pc.dim("  No jobs found"));
          return;
        }
        for (const job of jobs) {
          console.error(formatJobLine(job));
        }
      } catch (error) {
        logger.error("Failed to list jobs", error);
        process.exitCode = 1;
      } finally {
        store.close();
      }
    });
}

function formatDate(date: Date | null): string {
  return date ? date.toISOString() : "-";
}

export function createJobCommand(): Command {
  return new Command("job")
    .description("Show one job and its state history")
    .argument("<id>", "Job ID")
    .option("--json", "Output as JSON", false)
    .action((id: string, options: { json: boolean }) => {
      const config = loadConfig();
      const store = new StateManager(config.dataDir);
      try {
        const job = store.requireJob(id);
        const transitions = store.getJobTransitions(id);

        if (options.json) {
          console.log(JSON.stringify({ ...job, transitions }, null, 2));
          return;
        }

        logger.header(`agent-relay - Job ${job.id}`);
        console.error(`  Status:      ${formatStatus(job.status)}`);
        console.error(`  Session:     ${job.sessionId}`);
        console.error(`  Instruction: ${job.instruction}`);
        console.error(`  Created:     ${formatDate(job.createdAt)}`);
        console.error(`  Started:     ${formatDate(job.startedAt)}`);
        console.error(`  Finished:    ${formatDate(job.finishedAt)}`);
        if (job.resultSummary) {
          console.error(`  Summary:     ${job.resultSummary}`);
        }
        if (job.error) {
          console.error(`  Error:       ${pc.red(job.error)}${job.errorType ? pc.dim(` (${job.errorType})`) : ""}`);
        }
        if (job.filesChanged && job.filesChanged.length > 0) {
          console.error(`  Files:       ${job.filesChanged.join(", ")}`);
        }

        if (transitions.length > 0) {
          console.error("");
          console.error(pc.bold("  History"));
          for (const t of transitions) {
            console.error(`  ${pc.dim(t.timestamp.toISOString())}  ${t.fromStatus} → ${t.toStatus}  ${pc.dim(t.reason)}`);
          }
        }
      } catch (error) {
        logger.error(`Failed to show job ${id}`, error);
        process.exitCode = 1;
      } finally {
        store.close();
      }
    });
}

export function createLogsCommand(): Command {
  return new Command("logs")
    .description("Print the tail of a job's raw agent output")
    .argument("<id>", "Job ID")
    .option("-t, --tail <lines>", "Number of lines", "50")
    .action((id: string, options: { tail: string }) => {
      const config = loadConfig();
      const store = new StateManager(config.dataDir);
      try {
        const tail = parsePositiveInt(options.tail, "tail");
        const job = store.requireJob(id);
        const path = job.logPath ?? jobLogPath(join(config.dataDir, "logs"), job.id);
        const result = readLogTail(path, tail, config.execution.maxLogBytes);

        if (result.truncated) {
          console.error(pc.dim(`(showing last ${tail} lines)`));
        }
        if (result.content) {
          console.log(result.content);
        } else {
          console.error(pc.dim("(no output)"));
        }
      } catch (error) {
        logger.error(`Failed to read logs for job ${id}`, error);
        process.exitCode = 1;
      } finally {
        store.close();
      }
    });
}
