import { closeSync, existsSync, fstatSync, mkdirSync, openSync, readSync, statSync, writeSync } from "node:fs";
import { dirname, join } from "node:path";
import { logger } from "./logger.js";
import { StoreError, toError } from "./errors.js";

/** Default cap for one job's log: 100 MiB */
export const DEFAULT_MAX_LOG_BYTES = 100 * 1024 * 1024;

const TAIL_CHUNK_BYTES = 64 * 1024;

export interface JobLogOptions {
  /** Directory holding all job logs */
  logDir: string;
  jobId: string;
  /** Bytes after which further writes are dropped */
  maxBytes?: number;
}

export interface LogTail {
  content: string;
  /** Earlier lines omitted, or the log reached its cap */
  truncated: boolean;
}

/**
 * Path of the log file for a job
 */
export function jobLogPath(logDir: string, jobId: string): string {
  return join(logDir, `${jobId}.log`);
}

/**
 * Append-only, size-capped log of one job's raw agent output.
 *
 * Lines are written verbatim. Once the cap is reached the part of the line
 * that fits is written and every later write is dropped silently.
 */
export class JobLog {
  readonly path: string;
  private readonly maxBytes: number;
  private fd: number | undefined;
  private bytesWritten: number;
  private capped = false;

  constructor(options: JobLogOptions) {
    this.path = jobLogPath(options.logDir, options.jobId);
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_LOG_BYTES;

    try {
      const dir = dirname(this.path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      this.fd = openSync(this.path, "a");
      this.bytesWritten = statSync(this.path).size;
    } catch (error) {
      throw new StoreError(`Failed to open job log: ${this.path}`, toError(error));
    }

    this.capped = this.bytesWritten >= this.maxBytes;
  }

  /**
   * Append one line (a newline is added)
   */
  appendLine(line: string): void {
    this.write(Buffer.from(`${line}\n`, "utf-8"));
  }

  /**
   * Whether writes are being dropped
   */
  isCapped(): boolean {
    return this.capped;
  }

  size(): number {
    return this.bytesWritten;
  }

  close(): void {
    if (this.fd === undefined) {
      return;
    }
    try {
      closeSync(this.fd);
    } catch (error) {
      logger.debug(`Failed to close job log ${this.path}: ${toError(error).message}`);
    }
    this.fd = undefined;
  }

  private write(data: Buffer): void {
    if (this.capped || this.fd === undefined) {
      return;
    }

    const remaining = this.maxBytes - this.bytesWritten;
    const chunk = data.length > remaining ? data.subarray(0, remaining) : data;

    try {
      writeSync(this.fd, chunk);
    } catch (error) {
      throw new StoreError(`Failed to write job log: ${this.path}`, toError(error));
    }

    this.bytesWritten += chunk.length;
    if (this.bytesWritten >= this.maxBytes) {
      this.capped = true;
      logger.debug(`Job log reached its cap of ${this.maxBytes} bytes: ${this.path}`);
    }
  }
}

/**
 * Read the last `tail` lines of a job log.
 *
 * Reads backwards from the end in chunks, so a large log costs only the
 * bytes its tail spans. A `tail` of 0 reads the whole log.
 */
export function readLogTail(path: string, tail: number, maxBytes = DEFAULT_MAX_LOG_BYTES): LogTail {
  if (!existsSync(path)) {
    return { content: "", truncated: false };
  }

  let fd: number;
  try {
    fd = openSync(path, "r");
  } catch (error) {
    throw new StoreError(`Failed to read job log: ${path}`, toError(error));
  }

  try {
    const size = fstatSync(fd).size;
    // The trailing break plus the one before the first kept line
    const wantedBreaks = tail > 0 ? tail + 2 : Number.POSITIVE_INFINITY;
    const chunks: Buffer[] = [];
    let position = size;
    let breaks = 0;

    while (position > 0 && breaks < wantedBreaks) {
      const length = Math.min(TAIL_CHUNK_BYTES, position);
      position -= length;
      const chunk = Buffer.alloc(length);
      readSync(fd, chunk, 0, length, position);
      chunks.unshift(chunk);
      breaks += countLineBreaks(chunk);
    }

    const lines = Buffer.concat(chunks).toString("utf-8").split("\n");
    if (lines[lines.length - 1] === "") {
      lines.pop();
    }
    // The first line is cut unless the read reached the start of the file
    if (position > 0) {
      lines.shift();
    }

    const kept = tail > 0 ? lines.slice(-tail) : lines;

    return {
      content: kept.join("\n"),
      truncated: position > 0 || kept.length < lines.length || size >= maxBytes,
    };
  } catch (error) {
    throw new StoreError(`Failed to read job log: ${path}`, toError(error));
  } finally {
    closeSync(fd);
  }
}

function countLineBreaks(chunk: Buffer): number {
  let count = 0;
  let index = chunk.indexOf(0x0a);
  while (index !== -1) {
    count++;
    index = chunk.indexOf(0x0a, index + 1);
  }
  return count;
}
