/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { SyncFailureRow, SyncRunRow } from "../../db/types.js";
import type { LeaseInfo } from "../../services/sync/checkpoints.js";
import type { RunResult } from "../../services/sync/orchestrator.js";
import type {
  Checkpoint,
  DailyStat,
  MarketplaceStat,
  RawPayload,
  StoredSalesRegisterEntry,
} from "../../types/index.js";

function formatAmount(value: number | null): string {
  return value === null ? chalk.gray("-") : value.toFixed(2);
}

function formatTime(value: string | null): string {
  return value === null ? chalk.gray("never") : value.replace("T", " ").slice(0, 19);
}

function colorStatus(status: string): string {
  switch (status) {
    case "Committed":
    case "RESOLVED":
      return chalk.green(status);
    case "PartiallyFailed":
    case "Skipped":
    case "PENDING":
      return chalk.yellow(status);
    case "Failed":
      return chalk.red(status);
    default:
      return status;
  }
}

/**
 * Display register lines in a formatted table
 */
export function displayRegisterTable(entries: StoredSalesRegisterEntry[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Date"),
      chalk.cyan("MP"),
      chalk.cyan("Document"),
      chalk.cyan("Line"),
      chalk.cyan("SKU"),
      chalk.cyan("Qty"),
      chalk.cyan("Price"),
      chalk.cyan("Amount"),
      chalk.cyan("Cur"),
    ],
    colWidths: [12, 6, 24, 20, 20, 6, 12, 12, 6],
    wordWrap: true,
  });

  for (const entry of entries) {
    table.push([
      entry.saleDate,
      entry.marketplace,
      entry.documentNo,
      entry.lineId,
      entry.sellerSku ?? chalk.gray("-"),
      String(entry.qty),
      formatAmount(entry.priceEffective),
      formatAmount(entry.amountLine),
      entry.currencyCode ?? "",
    ]);
  }

  console.log(table.toString());
}

export function displayDailyStats(stats: DailyStat[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Date"),
      chalk.cyan("MP"),
      chalk.cyan("Lines"),
      chalk.cyan("Qty"),
      chalk.cyan("Amount"),
    ],
  });

  for (const row of stats) {
    table.push([
      row.saleDate,
      row.marketplace,
      String(row.lines),
      String(row.qty),
      formatAmount(row.amount),
    ]);
  }

  console.log(table.toString());
}

export function displayMarketplaceStats(stats: MarketplaceStat[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("MP"),
      chalk.cyan("Lines"),
      chalk.cyan("Documents"),
      chalk.cyan("Qty"),
      chalk.cyan("Amount"),
      chalk.cyan("First sale"),
      chalk.cyan("Last sale"),
    ],
  });

  for (const row of stats) {
    table.push([
      row.marketplace,
      String(row.lines),
      String(row.documents),
      String(row.qty),
      formatAmount(row.amount),
      row.firstSaleDate ?? "-",
      row.lastSaleDate ?? "-",
    ]);
  }

  console.log(table.toString());
}

/**
 * Display connector checkpoints
 */
export function displayCheckpoints(
  checkpoints: (Checkpoint & LeaseInfo)[]
): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Connector"),
      chalk.cyan("Cursor"),
      chalk.cyan("Last run"),
      chalk.cyan("Status"),
      chalk.cyan("Last success"),
      chalk.cyan("Lease"),
    ],
  });

  for (const cp of checkpoints) {
    table.push([
      chalk.bold(cp.connector),
      formatTime(cp.cursor),
      formatTime(cp.lastRunAt),
      cp.lastRunStatus === null ? chalk.gray("-") : colorStatus(cp.lastRunStatus),
      formatTime(cp.lastSuccessAt),
      cp.lockedBy ?? chalk.gray("free"),
    ]);
  }

  console.log(table.toString());
}

export function displayRuns(runs: SyncRunRow[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Started"),
      chalk.cyan("Connector"),
      chalk.cyan("Status"),
      chalk.cyan("Fetched"),
      chalk.cyan("Reproc."),
      chalk.cyan("Upserted"),
      chalk.cyan("Failed"),
      chalk.cyan("Error"),
    ],
    colWidths: [21, 11, 17, 9, 9, 10, 8, 40],
    wordWrap: true,
  });

  for (const run of runs) {
    table.push([
      formatTime(run.started_at),
      run.connector,
      colorStatus(run.status),
      String(run.fetched),
      String(run.reprocessed),
      String(run.upserted),
      run.failed > 0 ? chalk.red(String(run.failed)) : "0",
      run.error_message ?? "",
    ]);
  }

  console.log(table.toString());
}

export function displayFailures(failures: SyncFailureRow[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Connector"),
      chalk.cyan("Key"),
      chalk.cyan("Stage"),
      chalk.cyan("Attempts"),
      chalk.cyan("Status"),
      chalk.cyan("Error"),
    ],
    colWidths: [11, 26, 9, 10, 10, 60],
    wordWrap: true,
  });

  for (const failure of failures) {
    table.push([
      failure.connector,
      failure.business_key,
      failure.stage,
      String(failure.attempts),
      colorStatus(failure.status),
      failure.error_message,
    ]);
  }

  console.log(table.toString());
}

/**
 * One summary line per finished or skipped run
 */
export function displayRunResult(result: RunResult): void {
  if (result.status === "Skipped") {
    console.log(
      `  ${chalk.bold(result.connector)}: ${colorStatus(result.status)} (${result.reason})`
    );
    return;
  }

  const { counts } = result;
  console.log(
    `  ${chalk.bold(result.connector)}: ${colorStatus(result.status)} ` +
      `fetched=${String(counts.fetched)} reprocessed=${String(counts.reprocessed)} ` +
      `parsed=${String(counts.parsed)} projected=${String(counts.projected)} ` +
      `upserted=${String(counts.upserted)} failed=${String(counts.failed)}`
  );
  if (result.errorMessage !== null) {
    console.log(chalk.red(`    ${result.errorMessage}`));
  }
}

/**
 * Stored versions of one business key
 */
export function displayPayloadHistory(payloads: RawPayload[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Version"),
      chalk.cyan("Fetched At"),
      chalk.cyan("Id"),
      chalk.cyan("Hash"),
    ],
    colWidths: [9, 21, 38, 18],
  });

  for (const payload of payloads) {
    table.push([
      String(payload.documentVersion),
      formatTime(payload.fetchedAt),
      payload.id,
      payload.contentHash.slice(0, 16),
    ]);
  }

  console.log(table.toString());
}
