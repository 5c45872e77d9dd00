/**
 * Connector registry
 */

import { OzonClient } from "../../../marketplaces/ozon.js";
import { WildberriesClient } from "../../../marketplaces/wildberries.js";
import { YandexMarketClient } from "../../../marketplaces/yandex-market.js";
import { syncLogger } from "../../../logger.js";
import { OzonPostingsConnector } from "./ozon-postings.js";
import { WbSalesConnector } from "./wb-sales.js";
import { YmOrdersConnector } from "./ym-orders.js";

import type { SourceConnector } from "./types.js";
import type { AppConfig } from "../../../config.js";
import type { ConnectorId } from "../../../types/index.js";

export type { ConnectorOptions, FetchResult, SourceConnector } from "./types.js";
export { OzonPostingsConnector } from "./ozon-postings.js";
export { WbSalesConnector } from "./wb-sales.js";
export { YmOrdersConnector } from "./ym-orders.js";

/**
 * Build the connectors that have credentials and are enabled.
 */
export function buildConnectors(
  appConfig: Pick<AppConfig, "ozon" | "wildberries" | "yandexMarket" | "sync">
): Map<ConnectorId, SourceConnector> {
  const { sync } = appConfig;
  const options = {
    overlapMinutes: sync.overlapMinutes,
    initialLookbackDays: sync.initialLookbackDays,
    statusHorizonDays: sync.statusHorizonDays,
    maxPages: sync.maxPages,
  };

  const candidates: SourceConnector[] = [];
  if (appConfig.ozon) {
    const client = new OzonClient(appConfig.ozon);
    candidates.push(new OzonPostingsConnector("FBS", client, options));
    candidates.push(new OzonPostingsConnector("FBO", client, options));
  }
  if (appConfig.wildberries) {
    candidates.push(
      new WbSalesConnector(new WildberriesClient(appConfig.wildberries), options)
    );
  }
  if (appConfig.yandexMarket) {
    candidates.push(
      new YmOrdersConnector(new YandexMarketClient(appConfig.yandexMarket), options)
    );
  }

  const enabled = sync.enabledConnectors;
  const connectors = new Map<ConnectorId, SourceConnector>();
  for (const connector of candidates) {
    if (enabled === null || enabled.includes(connector.id)) {
      connectors.set(connector.id, connector);
    }
  }

  syncLogger.debug({ connectors: [...connectors.keys()] }, "Connectors configured");
  return connectors;
}
