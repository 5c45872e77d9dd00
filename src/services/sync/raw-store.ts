/**
 * Raw Store - Append-only copy of every marketplace record
 *
 * Each record is kept exactly as received together with a content hash.
 * The document version of a business key is assigned here: unchanged
 * content keeps the latest version, changed content bumps it.
 */

import { createHash, randomUUID } from "node:crypto";

import { dbLogger } from "../../logger.js";
import { isSourceId } from "../../types/index.js";

import type { Database, RawPayloadRow } from "../../db/types.js";
import type {
  FetchedPayload,
  RawPayload,
  SourceId,
} from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Hash Computation
// ============================================================================

/**
 * Serialize JSON with object keys sorted so equal content hashes equally.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value) ?? "null";
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, v]) => `${JSON.stringify(key)}:${canonicalJson(v)}`);
  return `{${entries.join(",")}}`;
}

export function computeContentHash(body: unknown): string {
  return createHash("sha256").update(canonicalJson(body)).digest("hex");
}

// ============================================================================
// Row Mapping
// ============================================================================

function toRawPayload(row: RawPayloadRow): RawPayload {
  if (!isSourceId(row.source)) {
    throw new Error(`Unknown source "${row.source}" on raw payload ${row.id}`);
  }
  return {
    id: row.id,
    source: row.source,
    documentType: row.document_type,
    businessKey: row.business_key,
    fetchedAt: row.fetched_at,
    body: JSON.parse(row.body),
    contentHash: row.content_hash,
    documentVersion: row.document_version,
  };
}

// ============================================================================
// Raw Store Service
// ============================================================================

export class RawStoreService {
  constructor(private db: Kysely<Database>) {}

  /**
   * Persist fetched payloads in order, returning the stored records.
   *
   * A payload identical in (source, document type, business key, fetch time)
   * to one already stored resolves to the existing record.
   */
  async append(payloads: FetchedPayload[]): Promise<RawPayload[]> {
    const stored: RawPayload[] = [];

    for (const payload of payloads) {
      stored.push(await this.appendOne(payload));
    }

    if (payloads.length > 0) {
      dbLogger.debug({ count: stored.length }, "Raw payloads appended");
    }

    return stored;
  }

  private async appendOne(payload: FetchedPayload): Promise<RawPayload> {
    const contentHash = computeContentHash(payload.body);

    return await this.db.transaction().execute(async (trx) => {
      const latest = await trx
        .selectFrom("raw_payloads")
        .select(["content_hash", "document_version"])
        .where("source", "=", payload.source)
        .where("business_key", "=", payload.businessKey)
        .orderBy("document_version", "desc")
        .limit(1)
        .executeTakeFirst();

      let documentVersion = 1;
      if (latest) {
        documentVersion =
          latest.content_hash === contentHash
            ? latest.document_version
            : latest.document_version + 1;
      }

      const id = randomUUID();
      await trx
        .insertInto("raw_payloads")
        .values({
          id,
          source: payload.source,
          document_type: payload.documentType,
          business_key: payload.businessKey,
          fetched_at: payload.fetchedAt,
          body: JSON.stringify(payload.body),
          content_hash: contentHash,
          document_version: documentVersion,
          created_at: new Date().toISOString(),
        })
        .onConflict((oc) =>
          oc
            .columns(["source", "document_type", "business_key", "fetched_at"])
            .doNothing()
        )
        .execute();

      const row = await trx
        .selectFrom("raw_payloads")
        .selectAll()
        .where("source", "=", payload.source)
        .where("document_type", "=", payload.documentType)
        .where("business_key", "=", payload.businessKey)
        .where("fetched_at", "=", payload.fetchedAt)
        .executeTakeFirstOrThrow();

      return toRawPayload(row);
    });
  }

  async getById(id: string): Promise<RawPayload | null> {
    const row = await this.db
      .selectFrom("raw_payloads")
      .selectAll()
      .where("id", "=", id)
      .executeTakeFirst();

    return row ? toRawPayload(row) : null;
  }

  async getByIds(ids: string[]): Promise<RawPayload[]> {
    if (ids.length === 0) {
      return [];
    }
    const rows = await this.db
      .selectFrom("raw_payloads")
      .selectAll()
      .where("id", "in", ids)
      .execute();

    // Keep the caller's order
    const byId = new Map(rows.map((row) => [row.id, toRawPayload(row)]));
    return ids.flatMap((id) => {
      const payload = byId.get(id);
      return payload ? [payload] : [];
    });
  }

  /**
   * Full history of one business key, oldest first.
   */
  async getHistory(source: SourceId, businessKey: string): Promise<RawPayload[]> {
    const rows = await this.db
      .selectFrom("raw_payloads")
      .selectAll()
      .where("source", "=", source)
      .where("business_key", "=", businessKey)
      .orderBy("fetched_at", "asc")
      .orderBy("id", "asc")
      .execute();

    return rows.map(toRawPayload);
  }

  async countBySource(): Promise<{ source: string; count: number }[]> {
    const rows = await this.db
      .selectFrom("raw_payloads")
      .select((eb) => ["source", eb.fn.countAll<number | string>().as("count")])
      .groupBy("source")
      .orderBy("source")
      .execute();

    return rows.map((row) => ({ source: row.source, count: Number(row.count) }));
  }
}
