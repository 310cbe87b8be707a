import { logger } from "./logger.js";
import { errorMessage } from "./errors.js";

export type CleanupTaskType = "process" | "custom";

export interface CleanupTask {
  /** Unique identifier for this task */
  id: string;
  /** Type of cleanup task */
  type: CleanupTaskType;
  /** Description for logging */
  description: string;
  /** Process ID for process cleanup */
  pid?: number;
  /** The cleanup function to execute */
  cleanup: () => Promise<void>;
  /** Priority (higher = cleanup first, default: 0) */
  priority?: number;
  /** Creation timestamp */
  createdAt: Date;
}

export interface CleanupResult {
  success: string[];
  failed: Array<{ id: string; error: string }>;
}

/**
 * Manages cleanup tasks for resources that need to be released on shutdown
 *
 * Tracks resources that must be released when the server exits: live
 * agent processes (so a restart never leaves an orphan running against a
 * workspace) and the orchestrator itself. Cleanup runs on SIGINT/SIGTERM.
 *
 * Usage:
 * ```typescript
 * const taskId = registerProcessCleanup(child.pid);
 * // process exited normally
 * CleanupManager.getInstance().unregister(taskId);
 * ```
 */
export class CleanupManager {
  private static instance: CleanupManager;
  private readonly tasks = new Map<string, CleanupTask>();
  private handlersInstalled = false;
  private isRunning = false;

  private constructor() {}

  static getInstance(): CleanupManager {
    if (!CleanupManager.instance) {
      CleanupManager.instance = new CleanupManager();
    }
    return CleanupManager.instance;
  }

  /**
   * Register a cleanup task
   *
   * @returns The task ID
   */
  register(task: Omit<CleanupTask, "createdAt">): string {
    const fullTask: CleanupTask = {
      ...task,
      priority: task.priority ?? 0,
      createdAt: new Date(),
    };

    this.tasks.set(task.id, fullTask);
    logger.debug(`Registered cleanup task: ${task.id} (${task.type})`, {
      description: task.description,
    });

    return task.id;
  }

  /**
   * Unregister a cleanup task (when resource is properly cleaned up)
   */
  unregister(taskId: string): boolean {
    const deleted = this.tasks.delete(taskId);
    if (deleted) {
      logger.debug(`Unregistered cleanup task: ${taskId}`);
    }
    return deleted;
  }

  /**
   * Check if a task is registered
   */
  has(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  /**
   * Get all registered tasks
   */
  getTasks(): CleanupTask[] {
    return Array.from(this.tasks.values());
  }

  /**
   * Get count of registered tasks
   */
  getTaskCount(): number {
    return this.tasks.size;
  }

  /**
   * Run all cleanup tasks
   *
   * Tasks are executed in priority order (higher priority first).
   * Errors are collected but don't stop other tasks from running.
   */
  async runAll(): Promise<CleanupResult> {
    if (this.isRunning) {
      logger.warn("Cleanup already in progress");
      return { success: [], failed: [] };
    }

    this.isRunning = true;
    const result: CleanupResult = { success: [], failed: [] };

    try {
      // Sort by priority (higher first)
      const sortedTasks = Array.from(this.tasks.values()).sort(
        (a, b) => (b.priority ?? 0) - (a.priority ?? 0)
      );

      if (sortedTasks.length === 0) {
        return result;
      }

      logger.info(`Running ${sortedTasks.length} cleanup task(s)...`);

      for (const task of sortedTasks) {
        try {
          logger.debug(`Cleaning up: ${task.description}`);
          await task.cleanup();
          result.success.push(task.id);
          this.tasks.delete(task.id);
        } catch (error) {
          const errorMsg = error instanceof Error ? error.message : String(error);
          logger.warn(`Cleanup failed for ${task.id}: ${errorMsg}`);
          result.failed.push({ id: task.id, error: errorMsg });
        }
      }

      if (result.failed.length > 0) {
        logger.warn(`Cleanup completed with ${result.failed.length} failure(s)`);
      } else {
        logger.debug(`Cleanup completed successfully`);
      }
    } finally {
      this.isRunning = false;
    }

    return result;
  }

  /**
   * Install process exit handlers for automatic cleanup
   *
   * Called once by long-running commands (`serve`).
   */
  installShutdownHandlers(): void {
    if (this.handlersInstalled) {
      return;
    }

    const handleShutdown = async (signal: string): Promise<void> => {
      logger.info(`Received ${signal}, running cleanup...`);

      try {
        await this.runAll();
      } catch (error) {
        logger.error("Cleanup error during shutdown", error);
      }

      // Exit after cleanup
      process.exit(0);
    };

    process.on("SIGINT", () => void handleShutdown("SIGINT"));
    process.on("SIGTERM", () => void handleShutdown("SIGTERM"));

    this.handlersInstalled = true;
    logger.debug("Shutdown handlers installed");
  }

  /**
   * Clear all tasks without running them (useful for testing)
   */
  clear(): void {
    this.tasks.clear();
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

let taskIdCounter = 0;

function generateTaskId(prefix: string): string {
  return `${prefix}-${Date.now()}-${++taskIdCounter}`;
}

/**
 * Register a process for cleanup (will be killed on shutdown)
 *
 * @param pid - Process ID to kill
 * @param signal - Signal to send (default: SIGTERM)
 * @returns Task ID for unregistering
 */
export function registerProcessCleanup(
  pid: number,
  signal: globalThis.NodeJS.Signals = "SIGTERM"
): string {
  const taskId = generateTaskId("process");

  return CleanupManager.getInstance().register({
    id: taskId,
    type: "process",
    description: `Process ${pid}`,
    pid,
    priority: 20, // Highest priority - kill processes first
    cleanup: async () => {
      try {
        process.kill(pid, 0);
        process.kill(pid, signal);
      } catch (error) {
        logger.debug(`Process ${pid} already gone: ${errorMessage(error)}`);
      }
    },
  });
}

/**
 * Register a custom cleanup function
 *
 * @param id - Unique identifier for this cleanup
 * @param description - Human-readable description
 * @param cleanup - The cleanup function
 * @param priority - Priority (higher = runs first)
 * @returns Task ID for unregistering
 */
export function registerCustomCleanup(
  id: string,
  description: string,
  cleanup: () => Promise<void>,
  priority: number = 0
): string {
  return CleanupManager.getInstance().register({
    id,
    type: "custom",
    description,
    cleanup,
    priority,
  });
}
