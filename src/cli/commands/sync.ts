import chalk from "chalk";
import ora from "ora";

import { db, closeConnection } from "../../db/connection.js";
import {
  RawStoreService,
  SyncCheckpointService,
  SyncFailureService,
  SyncRunService,
  getOrchestrator,
} from "../../services/sync/index.js";
import { SOURCE_IDS, isSourceId } from "../../types/index.js";
import {
  displayCheckpoints,
  displayFailures,
  displayPayloadHistory,
  displayRunResult,
  displayRuns,
} from "../utils/display.js";

import type { RunResult } from "../../services/sync/index.js";
import type { ConnectorId } from "../../types/index.js";
import type { Command } from "commander";

// ============================================================================
// Helpers
// ============================================================================

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseConnector(value: string): ConnectorId {
  const id = value.toUpperCase();
  if (!isSourceId(id)) {
    throw new Error(
      `Unknown connector "${value}". Expected one of: ${SOURCE_IDS.join(", ")}`
    );
  }
  return id;
}

function parseLimit(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isNaN(parsed) || parsed < 1 ? fallback : parsed;
}

function isFailedResult(result: RunResult): boolean {
  return result.status === "Failed";
}

// ============================================================================
// Sync Commands
// ============================================================================

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Ingest marketplace sales into the sales register")
    .addHelpText(
      "after",
      `
CONNECTORS:
  ${SOURCE_IDS.join(", ")}

A connector is available when its credentials are configured
(OZON_CLIENT_ID/OZON_API_KEY, WB_API_KEY, YM_API_KEY/YM_CAMPAIGN_ID).

Each run reprocesses pending failures first, then fetches from the stored
cursor minus the overlap window. Examples:

  sales-pipeline sync run wb_sales
  sales-pipeline sync all
  sales-pipeline sync failures --connector OZON_FBS
`
    );

  // sync run <connector>
  sync
    .command("run <connector>")
    .description("Run one connector now")
    .action(async (connectorArg: string) => {
      const spinner = ora(`Running ${connectorArg}...`).start();

      try {
        const connector = parseConnector(connectorArg);
        const orchestrator = getOrchestrator();
        if (!orchestrator.connectorIds.includes(connector)) {
          throw new Error(`Connector ${connector} has no credentials configured`);
        }

        orchestrator.setProgressCallback((progress) => {
          spinner.text = `${progress.connector}: ${progress.phase} (fetched ${String(progress.counts.fetched)}, parsed ${String(progress.counts.parsed)})`;
        });

        const result = await orchestrator.runConnector(connector);
        if (isFailedResult(result)) {
          spinner.fail(`${connector} run failed`);
          process.exitCode = 1;
        } else {
          spinner.succeed(`${connector} run finished`);
        }
        displayRunResult(result);
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // sync all
  sync
    .command("all")
    .description("Run every configured connector concurrently")
    .action(async () => {
      const spinner = ora("Running all connectors...").start();

      try {
        const orchestrator = getOrchestrator();
        if (orchestrator.connectorIds.length === 0) {
          spinner.warn("No connectors configured");
          return;
        }

        orchestrator.setProgressCallback((progress) => {
          spinner.text = `${progress.connector}: ${progress.phase}`;
        });

        const results = await orchestrator.runAll();
        if (results.some(isFailedResult)) {
          spinner.fail("Some connectors failed");
          process.exitCode = 1;
        } else {
          spinner.succeed("All connectors finished");
        }
        for (const result of results) {
          displayRunResult(result);
        }
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // sync status
  sync
    .command("status")
    .description("Show connector checkpoints and pending failures")
    .action(async () => {
      try {
        const checkpoints = await new SyncCheckpointService(db).list();
        const pending = await new SyncFailureService(db).countPending();
        const stored = await new RawStoreService(db).countBySource();

        if (checkpoints.length === 0) {
          console.log("No connector has run yet");
        } else {
          displayCheckpoints(checkpoints);
        }
        console.log(
          `\nPending failures: ${pending > 0 ? chalk.yellow(String(pending)) : "0"}`
        );
        if (stored.length > 0) {
          console.log(
            `Raw payloads: ${stored.map((s) => `${s.source} ${String(s.count)}`).join(", ")}`
          );
        }
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // sync runs
  sync
    .command("runs")
    .description("Show recent run outcomes")
    .option("-c, --connector <connector>", "Filter by connector")
    .option("-l, --limit <n>", "Number of runs", "20")
    .action(async (options: { connector?: string; limit?: string }) => {
      try {
        const runs = await new SyncRunService(db).list({
          connector:
            options.connector !== undefined
              ? parseConnector(options.connector)
              : undefined,
          limit: parseLimit(options.limit, 20),
        });

        if (runs.length === 0) {
          console.log("No runs recorded");
        } else {
          displayRuns(runs);
        }
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // sync failures
  sync
    .command("failures")
    .description("Show items that failed parsing or projection")
    .option("-c, --connector <connector>", "Filter by connector")
    .option("--all", "Include resolved failures")
    .option("-l, --limit <n>", "Number of failures", "50")
    .action(
      async (options: { connector?: string; all?: boolean; limit?: string }) => {
        try {
          const failures = await new SyncFailureService(db).list({
            connector:
              options.connector !== undefined
                ? parseConnector(options.connector)
                : undefined,
            status: options.all === true ? undefined : "PENDING",
            limit: parseLimit(options.limit, 50),
          });

          if (failures.length === 0) {
            console.log("No failures found");
          } else {
            displayFailures(failures);
          }
        } catch (error) {
          console.error(`Error: ${errorMessage(error)}`);
          process.exitCode = 1;
        } finally {
          await closeConnection();
        }
      }
    );

  // sync reset-cursor <connector>
  sync
    .command("reset-cursor <connector>")
    .description("Move a connector cursor, e.g. to backfill a period")
    .option("--to <iso>", "New cursor (ISO-8601); omit to use the initial lookback")
    .action(async (connectorArg: string, options: { to?: string }) => {
      try {
        const connector = parseConnector(connectorArg);
        let cursor: string | null = null;
        if (options.to !== undefined) {
          const ms = Date.parse(options.to);
          if (Number.isNaN(ms)) {
            throw new Error(`Invalid date: ${options.to}`);
          }
          cursor = new Date(ms).toISOString();
        }

        await new SyncCheckpointService(db).setCursor(connector, cursor);
        console.log(
          `${connector} cursor set to ${cursor ?? "initial lookback window"}`
        );
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // sync payloads <connector> <businessKey>
  sync
    .command("payloads <connector> <businessKey>")
    .description("Show the stored versions of one marketplace document")
    .option("--body", "Print the body of the latest version")
    .action(
      async (
        connectorArg: string,
        businessKey: string,
        options: { body?: boolean }
      ) => {
        try {
          const connector = parseConnector(connectorArg);
          const history = await new RawStoreService(db).getHistory(
            connector,
            businessKey
          );
          const latest = history.at(-1);

          if (latest === undefined) {
            console.log(`No payloads stored for ${connector} ${businessKey}`);
            return;
          }
          displayPayloadHistory(history);
          if (options.body === true) {
            console.log(JSON.stringify(latest.body, null, 2));
          }
        } catch (error) {
          console.error(`Error: ${errorMessage(error)}`);
          process.exitCode = 1;
        } finally {
          await closeConnection();
        }
      }
    );

  // sync payload <id>
  sync
    .command("payload <id>")
    .description("Print one stored payload, e.g. the one behind a failure")
    .action(async (id: string) => {
      try {
        const payload = await new RawStoreService(db).getById(id);
        if (payload === null) {
          console.error(`Payload ${id} not found`);
          process.exitCode = 1;
          return;
        }
        console.log(
          chalk.cyan(
            `${payload.source} ${payload.businessKey} v${String(payload.documentVersion)} fetched ${payload.fetchedAt}`
          )
        );
        console.log(JSON.stringify(payload.body, null, 2));
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
