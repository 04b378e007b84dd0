/**
 * @mirrorline/event-store — Event and state codec.
 *
 * Wire formats:
 * - Payload body: UTF-8 JSON of the payload with `_schemaVersion` embedded.
 *   Older versions are upcast through the catalog on read.
 * - State document: JSON-safe form of a ReplicaState with map entries
 *   sorted by key, so equal states serialize identically.
 *
 * Decoding failures are MalformedEventError (records) or
 * ReplicationError("MALFORMED_SNAPSHOT") (state documents).
 */

import { z } from "zod";
import type {
  ConfigPayload,
  LogRecord,
  ReplicaEvent,
  ReplicaState,
} from "@mirrorline/types";
import { EMPTY_SEQUENCE } from "@mirrorline/types";
import type { EventCatalog } from "./catalog.js";
import {
  CatalogError,
  getSchemaVersion,
  stripSchemaVersion,
  withSchemaVersion,
} from "./catalog.js";
import { ConfigPayloadSchema, createConfigCatalog } from "./config-events.js";
import { MalformedEventError, ReplicationError } from "./errors.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

// =============================================================================
// Event codec
// =============================================================================

/**
 * Encodes payloads for the log and decodes records read back from it.
 */
export class EventCodec {
  private readonly _catalog: EventCatalog;

  constructor(catalog: EventCatalog = createConfigCatalog()) {
    this._catalog = catalog;
  }

  /**
   * Serialize a payload at its current schema version.
   */
  encodePayload(payload: ConfigPayload): Uint8Array {
    const schema = this._catalog.getSchema(payload.type);
    if (schema === undefined) {
      throw new MalformedEventError(`Cannot encode unregistered payload type "${payload.type}"`);
    }
    return encoder.encode(JSON.stringify(withSchemaVersion(payload, schema.version)));
  }

  /**
   * Parse, upcast and validate a payload body.
   *
   * @throws MalformedEventError on any failure
   */
  decodePayload(
    body: Uint8Array,
    partitionKey?: string,
    sequenceNumber?: number,
  ): ConfigPayload {
    const fail = (reason: string, cause?: unknown): MalformedEventError =>
      new MalformedEventError(
        sequenceNumber !== undefined
          ? `Malformed event at sequence ${sequenceNumber}: ${reason}`
          : `Malformed event: ${reason}`,
        partitionKey,
        sequenceNumber,
        cause,
      );

    let raw: unknown;
    try {
      raw = JSON.parse(decoder.decode(body));
    } catch (err) {
      throw fail("body is not UTF-8 JSON", err);
    }

    if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
      throw fail("body is not a JSON object");
    }

    const stored = raw as Record<string, unknown>;
    const type = stored.type;
    if (typeof type !== "string" || !this._catalog.has(type)) {
      throw fail(`unknown payload type ${JSON.stringify(type)}`);
    }

    let migrated: Record<string, unknown>;
    try {
      migrated = this._catalog.migrate(
        type,
        stripSchemaVersion(stored),
        getSchemaVersion(stored),
      );
    } catch (err) {
      if (err instanceof CatalogError) {
        throw fail(err.message, err);
      }
      throw err;
    }

    const parsed = ConfigPayloadSchema.safeParse(migrated);
    if (!parsed.success) {
      throw fail(parsed.error.issues.map((i) => `${i.path.join(".") || "payload"}: ${i.message}`).join("; "));
    }
    if (!this._catalog.validate(type, parsed.data)) {
      throw fail(`payload rejected by the "${type}" schema`);
    }
    return parsed.data;
  }

  /**
   * Decode a transport record into an event.
   *
   * @throws MalformedEventError carrying the record's sequence number
   */
  decodeRecord(record: LogRecord): ReplicaEvent {
    return {
      partitionKey: record.partitionKey,
      sequenceNumber: record.sequenceNumber,
      enqueuedAt: record.enqueuedAt,
      payload: this.decodePayload(record.body, record.partitionKey, record.sequenceNumber),
    };
  }
}

// =============================================================================
// State codec
// =============================================================================

export const StateDocumentSchema = z.object({
  asOfSequenceNumber: z.number().int().min(EMPTY_SEQUENCE),
  defaultMarkup: z.number().finite().nullable(),
  markups: z.array(z.tuple([z.string().min(1), z.number().finite().positive()])),
  brands: z.array(z.tuple([z.string().min(1), z.string()])),
});

/**
 * Serialized form of a ReplicaState.
 */
export type StateDocument = z.infer<typeof StateDocumentSchema>;

/**
 * Convert a state into its JSON-safe document.
 */
export function encodeState(state: ReplicaState): StateDocument {
  return {
    asOfSequenceNumber: state.asOfSequenceNumber,
    defaultMarkup: state.defaultMarkup,
    markups: sortedEntries(state.markups),
    brands: sortedEntries(state.brands),
  };
}

/**
 * Validate a document and rebuild the state it describes.
 *
 * @throws ReplicationError("MALFORMED_SNAPSHOT")
 */
export function decodeState(document: unknown): ReplicaState {
  const parsed = StateDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new ReplicationError(
      "MALFORMED_SNAPSHOT",
      `Invalid state document: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
    );
  }
  const doc = parsed.data;
  return Object.freeze({
    asOfSequenceNumber: doc.asOfSequenceNumber,
    defaultMarkup: doc.defaultMarkup,
    markups: new Map(doc.markups),
    brands: new Map(doc.brands),
  });
}

function sortedEntries<V>(map: ReadonlyMap<string, V>): [string, V][] {
  return [...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}
