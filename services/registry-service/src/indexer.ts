import type { FastifyBaseLogger } from "fastify";
import { buildServiceAuthHeaders, type StoredRegistryEvent } from "@certreg/shared";

export type IndexerStatus = "PUBLISHED" | "SKIPPED" | "FAILED";

const INDEXER_TIMEOUT_MS = 3000;

/**
 * Best-effort push of a committed event to an external indexer. The event is
 * already durable in the registry log, so failures are logged, not thrown.
 */
export async function tryPublishRegistryEvent(
  indexerUrl: string | undefined,
  record: StoredRegistryEvent,
  serviceAuthToken: string | undefined,
  log: Pick<FastifyBaseLogger, "warn">,
): Promise<IndexerStatus> {
  if (!indexerUrl) return "SKIPPED";

  try {
    const authHeaders = buildServiceAuthHeaders(serviceAuthToken);
    const response = await fetch(`${indexerUrl.replace(/\/$/, "")}/ingest/registry-event`, {
      method: "POST",
      headers: { ...authHeaders, "content-type": "application/json" },
      body: JSON.stringify(record),
      signal: AbortSignal.timeout(INDEXER_TIMEOUT_MS),
    });
    if (!response.ok) {
      log.warn({ seq: record.seq, statusCode: response.status }, "indexer rejected registry event");
      return "FAILED";
    }
    return "PUBLISHED";
  } catch (error) {
    log.warn(
      { seq: record.seq, err: error instanceof Error ? error.message : String(error) },
      "indexer unreachable",
    );
    return "FAILED";
  }
}
