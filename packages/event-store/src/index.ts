/**
 * @mirrorline/event-store — Storage tiers and wire formats for the replica.
 *
 * Provides:
 * - The replication error taxonomy
 * - EventCodec and the state document codec, with an EventCatalog for
 *   schema versioning and migration
 * - BlobStore (in-memory and file) and the SnapshotStoreClient on top of it
 * - ArchiveReader over capture batches, and the capture batch writer
 * - LiveLogReader with in-process and JSONL-file log services
 *
 * @packageDocumentation
 */

// Errors
export type { ReplicationErrorCode, SnapshotWriteErrorCode } from "./errors.js";
export {
  ReplicationError,
  TransientTransportError,
  RangeUnavailableError,
  SequenceGapError,
  SnapshotWriteError,
  MalformedEventError,
  isTransient,
} from "./errors.js";

// Catalog & schema versioning
export type { EventSchema, EventMigration } from "./catalog.js";
export {
  EventCatalog,
  CatalogError,
  SCHEMA_VERSION_FIELD,
  withSchemaVersion,
  getSchemaVersion,
  stripSchemaVersion,
} from "./catalog.js";
export {
  CONFIG_EVENTS,
  ConfigPayloadSchema,
  createConfigCatalog,
} from "./config-events.js";

// Codec
export type { StateDocument } from "./codec.js";
export { EventCodec, encodeState, decodeState, StateDocumentSchema } from "./codec.js";

// Blob store
export type { BlobStore } from "./blob-store.js";
export { InMemoryBlobStore, FileBlobStore, validateBlobKey } from "./blob-store.js";

// Snapshot store
export type {
  StoredSnapshot,
  LoadedSnapshot,
  SkippedSnapshot,
  SnapshotLoadResult,
  SnapshotStoreOptions,
} from "./snapshot-store.js";
export {
  SnapshotStoreClient,
  computeSnapshotHash,
  verifySnapshotIntegrity,
  padSequence,
  partitionSegment,
  SEQUENCE_KEY_WIDTH,
} from "./snapshot-store.js";

// Archive
export type { ArchiveReader, BlobArchiveOptions } from "./archive-reader.js";
export { BlobArchiveReader, writeCaptureBatch } from "./archive-reader.js";

// Live log
export type { LiveLogReader } from "./live-log.js";
export { InMemoryPartitionedLog } from "./live-log.js";
export type { JsonlPartitionedLogOptions } from "./jsonl-log.js";
export { JsonlPartitionedLog } from "./jsonl-log.js";

// Record lines
export { recordToLine, lineToRecord, parseRecordLines } from "./record-lines.js";
