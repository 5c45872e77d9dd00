import type { StatusNorm } from "../../../types/index.js";

// ============================================================================
// Ozon
// ============================================================================

const OZON_STATUS_MAP = new Map<string, StatusNorm>([
  ["acceptance_in_progress", "PROCESSING"],
  ["arbitration", "PROCESSING"],
  ["client_arbitration", "PROCESSING"],
  ["sent_by_seller", "IN_DELIVERY"],
  ["driver_pickup", "IN_DELIVERY"],
  ["delivering", "IN_DELIVERY"],
  ["delivered", "DELIVERED"],
  ["cancelled", "CANCELLED"],
  ["canceled", "CANCELLED"],
  ["not_accepted", "CANCELLED"],
  ["returned", "RETURNED"],
]);

export function normalizeOzonStatus(status: string): StatusNorm {
  const key = status.trim().toLowerCase();
  if (key.startsWith("awaiting_")) {
    return "PROCESSING";
  }
  return OZON_STATUS_MAP.get(key) ?? "UNKNOWN";
}

// ============================================================================
// Yandex Market
// ============================================================================

const YM_STATUS_MAP = new Map<string, StatusNorm>([
  ["DELIVERED", "DELIVERED"],
  ["PICKUP", "DELIVERED"],
  ["RECEIVED", "DELIVERED"],
  ["PROCESSING", "PROCESSING"],
  ["PENDING", "PROCESSING"],
  ["RESERVATION", "PROCESSING"],
  ["UNPAID", "PROCESSING"],
  ["DELIVERY", "IN_DELIVERY"],
  ["RETURNED", "RETURNED"],
  ["PARTIALLY_RETURNED", "RETURNED"],
]);

export function normalizeYmStatus(status: string): StatusNorm {
  const key = status.trim().toUpperCase();
  if (key.startsWith("CANCELLED")) {
    return "CANCELLED";
  }
  return YM_STATUS_MAP.get(key) ?? "UNKNOWN";
}
