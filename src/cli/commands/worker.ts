import { config } from "../../config.js";
import { closeConnection } from "../../db/connection.js";
import { logger } from "../../logger.js";
import { SyncScheduler, getOrchestrator } from "../../services/sync/index.js";

import type { Command } from "commander";

// ============================================================================
// Worker Command
// ============================================================================

export function registerWorkerCommand(program: Command): void {
  program
    .command("worker")
    .description("Run configured connectors on a schedule until stopped")
    .option(
      "-i, --interval <minutes>",
      "Minutes between runs of each connector",
      String(config.sync.intervalMinutes)
    )
    .option("--no-run-on-start", "Wait one interval before the first runs")
    .action(async (options: { interval: string; runOnStart: boolean }) => {
      const intervalMinutes = Number.parseInt(options.interval, 10);
      if (Number.isNaN(intervalMinutes) || intervalMinutes < 1) {
        console.error(`Invalid interval: ${options.interval}`);
        process.exitCode = 1;
        await closeConnection();
        return;
      }

      const orchestrator = getOrchestrator();
      if (orchestrator.connectorIds.length === 0) {
        console.error("No connectors configured");
        process.exitCode = 1;
        await closeConnection();
        return;
      }

      orchestrator.onRunOutcome((outcome) => {
        if (outcome.status === "Failed") {
          logger.error(
            { connector: outcome.connector, error: outcome.errorMessage },
            "Scheduled run failed"
          );
        }
      });

      const scheduler = new SyncScheduler(orchestrator, {
        intervalMinutes,
        runOnStart: options.runOnStart,
      });

      await new Promise<void>((resolve) => {
        const shutdown = (signal: NodeJS.Signals): void => {
          logger.info({ signal }, "Stopping worker");
          resolve();
        };
        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);
        scheduler.start();
      });

      await scheduler.stop();
      await closeConnection();
    });
}
