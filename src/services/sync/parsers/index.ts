/**
 * Document parsers: one pure function per source
 */

import { parseOzonPosting } from "./ozon.js";
import { parseWbSale } from "./wildberries.js";
import { parseYmOrder } from "./yandex-market.js";

import type { Document, RawPayload } from "../../../types/index.js";

export function parseDocument(raw: RawPayload): Document {
  switch (raw.source) {
    case "OZON_FBS":
    case "OZON_FBO":
      return parseOzonPosting(raw);
    case "WB_SALES":
      return parseWbSale(raw);
    case "YM_ORDERS":
      return parseYmOrder(raw);
  }
}

export { parseOzonPosting } from "./ozon.js";
export { parseWbSale, detectWbEventType } from "./wildberries.js";
export { parseYmOrder } from "./yandex-market.js";
export { parseSourceDate, toSaleDate } from "./dates.js";
export { normalizeOzonStatus, normalizeYmStatus } from "./status.js";
