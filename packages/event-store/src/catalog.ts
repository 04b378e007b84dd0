/**
 * @mirrorline/event-store — Event Catalog & Schema Versioning.
 *
 * Registry of payload types with:
 * - Schema versions (each payload type tracks its current version)
 * - Migration hooks (transform a v1 payload to the v2 shape)
 * - Read-time upcasting (old records remain decodable)
 *
 * Evolution policy:
 * - Records are immutable once appended; migration happens only on read
 * - New versions are additive where possible (new fields with defaults)
 * - Renames and reshapes ship with a one-step migration from the previous version
 * - A payload from a newer producer is passed through and must still validate
 */

// =============================================================================
// Event Schema Definition
// =============================================================================

/**
 * Defines a versioned payload schema.
 */
export interface EventSchema {
  /** Payload type string (e.g., "markup.updated") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  /** Human-readable description of this event */
  readonly description: string;

  /**
   * Validate a payload against the current schema version.
   */
  validate(payload: unknown): boolean;
}

/**
 * Migration function that moves a payload one version forward.
 *
 * Migrations are applied sequentially: v1 → v2 → v3 → ...
 */
export type EventMigration = (
  payload: Record<string, unknown>,
) => Record<string, unknown>;

interface CatalogEntry {
  readonly schema: EventSchema;

  /** Migrations indexed by source version (e.g., migrations[1] = v1→v2) */
  readonly migrations: Map<number, EventMigration>;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of payload types.
 *
 * Usage:
 * ```ts
 * const catalog = new EventCatalog();
 *
 * catalog.register({
 *   type: "markup.updated",
 *   version: 2,
 *   description: "Category markup rate changed",
 *   validate: (p) => MarkupUpdatedSchema.safeParse(p).success,
 * });
 *
 * catalog.registerMigration("markup.updated", 1, (payload) => ({
 *   type: payload.type,
 *   category: payload.productType,
 *   rate: payload.price,
 * }));
 * ```
 */
export class EventCatalog {
  private readonly _entries = new Map<string, CatalogEntry>();

  /**
   * Register a payload schema.
   *
   * Re-registering the same version is a no-op; a new version replaces the
   * schema and keeps the migrations already registered.
   */
  register(schema: EventSchema): void {
    const existing = this._entries.get(schema.type);

    if (existing !== undefined) {
      if (existing.schema.version === schema.version) {
        return;
      }

      this._entries.set(schema.type, {
        schema,
        migrations: existing.migrations,
      });
      return;
    }

    this._entries.set(schema.type, {
      schema,
      migrations: new Map(),
    });
  }

  /**
   * Register a migration from one version to the next.
   *
   * @param fromVersion - The source version (migration transforms fromVersion → fromVersion+1)
   * @throws CatalogError if the type is not registered
   */
  registerMigration(
    eventType: string,
    fromVersion: number,
    migration: EventMigration,
  ): void {
    const entry = this._entries.get(eventType);
    if (entry === undefined) {
      throw new CatalogError(
        `Cannot register migration for unknown event type "${eventType}"`,
      );
    }

    entry.migrations.set(fromVersion, migration);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._entries.get(eventType)?.schema;
  }

  has(eventType: string): boolean {
    return this._entries.has(eventType);
  }

  /**
   * List all registered payload types, sorted.
   */
  listTypes(): readonly string[] {
    return [...this._entries.keys()].sort();
  }

  /**
   * Migrate a payload to the current schema version.
   *
   * @param fromVersion - The version the payload was written at
   * @throws CatalogError if the type is unknown or a migration step is missing
   */
  migrate(
    eventType: string,
    payload: Record<string, unknown>,
    fromVersion: number,
  ): Record<string, unknown> {
    const entry = this._entries.get(eventType);
    if (entry === undefined) {
      throw new CatalogError(`Unknown event type "${eventType}"`);
    }

    const targetVersion = entry.schema.version;

    // Same version, or written by a newer producer: pass through
    if (fromVersion >= targetVersion) {
      return payload;
    }

    let current = payload;
    for (let v = fromVersion; v < targetVersion; v++) {
      const migration = entry.migrations.get(v);
      if (migration === undefined) {
        throw new CatalogError(
          `Missing migration for "${eventType}" from version ${v} to ${v + 1}`,
        );
      }
      current = migration(current);
    }

    return current;
  }

  /**
   * Validate a payload against its registered schema.
   *
   * @returns true if valid, false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const entry = this._entries.get(eventType);
    if (entry === undefined) {
      return false;
    }
    return entry.schema.validate(payload);
  }

  get size(): number {
    return this._entries.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error thrown by catalog operations.
 */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

// =============================================================================
// Versioned Payload Helpers
// =============================================================================

/** Field carrying the schema version inside a serialized payload. */
export const SCHEMA_VERSION_FIELD = "_schemaVersion";

/**
 * Embed the schema version in a payload for serialization.
 */
export function withSchemaVersion(
  payload: object,
  schemaVersion: number,
): Record<string, unknown> {
  return { ...payload, [SCHEMA_VERSION_FIELD]: schemaVersion };
}

/**
 * Extract the schema version from a serialized payload.
 *
 * Returns 1 when no version is embedded (records written before
 * versioning was introduced).
 */
export function getSchemaVersion(payload: Readonly<Record<string, unknown>>): number {
  const version = payload[SCHEMA_VERSION_FIELD];
  if (typeof version === "number" && Number.isInteger(version) && version > 0) {
    return version;
  }
  return 1;
}

/**
 * Remove the embedded schema version.
 */
export function stripSchemaVersion(
  payload: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
  const { [SCHEMA_VERSION_FIELD]: _version, ...rest } = payload;
  return rest;
}
