import logger, { shutdownLogger } from "@/logger";

type CleanupTask = (signal: NodeJS.Signals) => void | Promise<void>;

export class ShutdownManager {
  private cleanupTasks: CleanupTask[] = [];
  private isShuttingDown = false;

  /** Hard ceiling for all cleanup tasks together. */
  public timeoutMs = 60000;

  constructor() {
    this.setupSignalHandlers();
  }

  registerCleanupTask(task: CleanupTask) {
    this.cleanupTasks.push(task);
  }

  private setupSignalHandlers() {
    const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

    signals.forEach((signal) => {
      process.once(signal, async () => {
        if (this.isShuttingDown) return;
        this.isShuttingDown = true;

        logger.info("[Shutdown]", `received ${signal}, finishing active recordings...`);

        try {
          await this.executeCleanupTasks(signal);
          logger.info("[Shutdown]", "cleanup completed, exiting");
          await shutdownLogger();
          process.exit(0);
        } catch (err) {
          logger.error("[Shutdown]", "cleanup failed", err);
          await shutdownLogger();
          process.exit(1);
        }
      });
    });
  }

  private async executeCleanupTasks(signal: NodeJS.Signals) {
    const timer = setTimeout(() => {
      logger.error("[Shutdown]", `cleanup exceeded ${this.timeoutMs}ms, forcing exit`);
      process.exit(1);
    }, this.timeoutMs);

    try {
      await Promise.all(
        this.cleanupTasks.map(async (task) => {
          try {
            await task(signal);
          } catch (err) {
            logger.error("[Shutdown]", "cleanup task error", err);
          }
        })
      );
    } finally {
      clearTimeout(timer);
    }
  }
}

export const shutdownManager = new ShutdownManager();
