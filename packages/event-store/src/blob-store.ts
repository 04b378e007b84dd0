/**
 * @mirrorline/event-store — Blob Store.
 *
 * Key → bytes storage used for snapshots and capture archives.
 * Keys are slash-separated relative paths ("snapshots/0/0000000000000409.json").
 *
 * Implementations:
 * - InMemoryBlobStore for tests and development
 * - FileBlobStore mapping keys onto a directory tree
 */

import type { Dirent } from "node:fs";
import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { ReplicationError } from "./errors.js";

/**
 * Blob store interface.
 */
export interface BlobStore {
  /** Write (or replace) a blob. */
  put(key: string, data: Uint8Array): Promise<void>;

  /** Read a blob, or undefined when absent. */
  get(key: string): Promise<Uint8Array | undefined>;

  /** All keys starting with `prefix`, sorted. */
  list(prefix: string): Promise<readonly string[]>;

  /** Delete a blob. Deleting a missing key is a no-op. */
  delete(key: string): Promise<void>;
}

/**
 * Reject keys that could escape the store or are not relative paths.
 */
export function validateBlobKey(key: string): void {
  const segments = key.split("/");
  if (
    key.length === 0 ||
    segments.some((s) => s.length === 0 || s === "." || s === "..") ||
    key.includes("\\")
  ) {
    throw new ReplicationError("INVALID_ARGUMENT", `Invalid blob key "${key}"`);
  }
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

/**
 * In-memory blob store.
 *
 * Copies bytes on the way in and out so callers cannot alias stored data.
 */
export class InMemoryBlobStore implements BlobStore {
  private readonly _blobs = new Map<string, Uint8Array>();

  async put(key: string, data: Uint8Array): Promise<void> {
    validateBlobKey(key);
    this._blobs.set(key, new Uint8Array(data));
  }

  async get(key: string): Promise<Uint8Array | undefined> {
    const data = this._blobs.get(key);
    return data === undefined ? undefined : new Uint8Array(data);
  }

  async list(prefix: string): Promise<readonly string[]> {
    return [...this._blobs.keys()].filter((k) => k.startsWith(prefix)).sort();
  }

  async delete(key: string): Promise<void> {
    this._blobs.delete(key);
  }

  /** Number of stored blobs. */
  get size(): number {
    return this._blobs.size;
  }
}

// =============================================================================
// File-Based Implementation
// =============================================================================

/**
 * File-based blob store.
 *
 * Each key is a file under `baseDir`. Writes go to a temporary sibling and
 * are renamed into place, so readers never see a half-written blob.
 */
export class FileBlobStore implements BlobStore {
  private readonly _baseDir: string;

  constructor(baseDir: string) {
    this._baseDir = baseDir;
  }

  get baseDir(): string {
    return this._baseDir;
  }

  async put(key: string, data: Uint8Array): Promise<void> {
    const path = this._path(key);
    await mkdir(dirname(path), { recursive: true });
    const tmp = `${path}.${process.pid}.${Date.now()}.tmp`;
    await writeFile(tmp, data);
    await rename(tmp, path);
  }

  async get(key: string): Promise<Uint8Array | undefined> {
    try {
      return new Uint8Array(await readFile(this._path(key)));
    } catch (err) {
      if (isNotFound(err)) {
        return undefined;
      }
      throw err;
    }
  }

  async list(prefix: string): Promise<readonly string[]> {
    // Walk only the deepest directory the prefix names
    const slash = prefix.lastIndexOf("/");
    const dirKey = slash >= 0 ? prefix.slice(0, slash) : "";
    const root = dirKey === "" ? this._baseDir : join(this._baseDir, ...dirKey.split("/"));

    const keys: string[] = [];
    await this._walk(root, dirKey, keys);
    return keys.filter((k) => k.startsWith(prefix)).sort();
  }

  async delete(key: string): Promise<void> {
    await rm(this._path(key), { force: true });
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _path(key: string): string {
    validateBlobKey(key);
    return join(this._baseDir, ...key.split("/"));
  }

  private async _walk(dir: string, dirKey: string, out: string[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (isNotFound(err)) {
        return;
      }
      throw err;
    }

    for (const entry of entries) {
      const key = dirKey === "" ? entry.name : `${dirKey}/${entry.name}`;
      if (entry.isDirectory()) {
        await this._walk(join(dir, entry.name), key, out);
      } else if (entry.isFile() && !entry.name.endsWith(".tmp")) {
        out.push(key);
      }
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
