import ora from "ora";

import { db, closeConnection } from "../../db/connection.js";
import { SalesRegisterService } from "../../services/sync/register.js";
import { isMarketplace, isStatusNorm } from "../../types/index.js";
import {
  displayDailyStats,
  displayMarketplaceStats,
  displayRegisterTable,
} from "../utils/display.js";

import type { SalesRegisterFilters } from "../../types/index.js";
import type { Command } from "commander";

interface QueryOptions {
  from?: string;
  to?: string;
  marketplace?: string;
  document?: string;
  sku?: string;
  item?: string;
  barcode?: string;
  status?: string;
  limit?: string;
  offset?: string;
  json?: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toFilters(options: QueryOptions): SalesRegisterFilters {
  const filters: SalesRegisterFilters = {
    dateFrom: options.from,
    dateTo: options.to,
    documentNo: options.document,
    sellerSku: options.sku,
    mpItemId: options.item,
    barcode: options.barcode,
  };

  if (options.marketplace !== undefined) {
    const marketplace = options.marketplace.toUpperCase();
    if (!isMarketplace(marketplace)) {
      throw new Error(`Unknown marketplace: ${options.marketplace}`);
    }
    filters.marketplace = marketplace;
  }
  if (options.status !== undefined) {
    const status = options.status.toUpperCase();
    if (!isStatusNorm(status)) {
      throw new Error(`Unknown status: ${options.status}`);
    }
    filters.statusNorm = status;
  }
  if (options.limit !== undefined) {
    filters.limit = Number.parseInt(options.limit, 10);
  }
  if (options.offset !== undefined) {
    filters.offset = Number.parseInt(options.offset, 10);
  }

  return filters;
}

// ============================================================================
// Register Commands
// ============================================================================

export function registerRegisterCommand(program: Command): void {
  const register = program
    .command("register")
    .description("Query the sales register");

  register
    .command("query")
    .description("List register lines")
    .option("--from <date>", "Sale date from (YYYY-MM-DD)")
    .option("--to <date>", "Sale date to (YYYY-MM-DD)")
    .option("-m, --marketplace <mp>", "OZON, WB or YM")
    .option("-d, --document <no>", "Document number")
    .option("--sku <sku>", "Seller SKU")
    .option("--item <id>", "Marketplace item id")
    .option("--barcode <barcode>", "Barcode")
    .option("--status <status>", "Normalized status")
    .option("-l, --limit <n>", "Page size", "50")
    .option("--offset <n>", "Offset", "0")
    .option("--json", "Print JSON instead of a table")
    .action(async (options: QueryOptions) => {
      const spinner = ora("Querying sales register...").start();

      try {
        const page = await new SalesRegisterService(db).query(toFilters(options));
        spinner.stop();

        if (options.json === true) {
          console.log(JSON.stringify(page, null, 2));
          return;
        }
        if (page.items.length === 0) {
          console.log("No register lines found");
          return;
        }
        displayRegisterTable(page.items);
        console.log(
          `\nShowing ${String(page.offset + 1)}-${String(page.offset + page.items.length)} of ${String(page.total)}`
        );
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  register
    .command("stats")
    .description("Show totals per marketplace, or per day with --daily")
    .option("--daily", "Group by sale date")
    .option("--from <date>", "Sale date from (YYYY-MM-DD)")
    .option("--to <date>", "Sale date to (YYYY-MM-DD)")
    .option("-m, --marketplace <mp>", "OZON, WB or YM")
    .action(async (options: QueryOptions & { daily?: boolean }) => {
      try {
        const service = new SalesRegisterService(db);
        if (options.daily === true) {
          const { dateFrom, dateTo, marketplace } = toFilters(options);
          displayDailyStats(
            await service.dailyStats({ dateFrom, dateTo, marketplace })
          );
        } else {
          displayMarketplaceStats(await service.marketplaceStats());
        }
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
