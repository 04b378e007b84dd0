/**
 * @mirrorline/event-store — File-based JSONL partitioned log.
 *
 * A durable development transport: one `.jsonl` file per partition, one
 * record per line. Producers append with fsync; readers tail the file by
 * polling.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before returning
 * - Partial lines (torn writes) are ignored until completed
 * - Retention rewrites the file to a temporary sibling and renames it
 *
 * File format:
 * {"partitionKey":"0","sequenceNumber":0,"enqueuedAt":"...","body":"<base64>"}
 * A retention marker line {"floor":N} records the floor once every record
 * below N has been expired.
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from "node:fs";
import { open, readFile } from "node:fs/promises";
import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { isSequenceNumber } from "@mirrorline/types";
import type { LogRecord } from "@mirrorline/types";
import { ReplicationError, TransientTransportError } from "./errors.js";
import type { LiveLogReader } from "./live-log.js";
import { lineToRecord, parseRecordLines, recordToLine } from "./record-lines.js";
import { partitionSegment } from "./snapshot-store.js";

/**
 * Options for creating a JsonlPartitionedLog.
 */
export interface JsonlPartitionedLogOptions {
  /** Directory holding one file per partition */
  readonly directory: string;

  /** How often an idle subscription re-reads its file. Default: 250 */
  readonly pollIntervalMs?: number;

  /** Clock for enqueuedAt. Default: system time */
  readonly now?: () => Date;
}

interface PartitionScan {
  readonly floor: number;
  readonly head: number;
  readonly records: LogRecord[];
}

/**
 * Partitioned log stored as JSONL files.
 */
export class JsonlPartitionedLog implements LiveLogReader {
  private readonly _directory: string;
  private readonly _pollIntervalMs: number;
  private readonly _now: () => Date;

  constructor(options: JsonlPartitionedLogOptions) {
    this._directory = options.directory;
    this._pollIntervalMs = options.pollIntervalMs ?? 250;
    this._now = options.now ?? (() => new Date());
    mkdirSync(this._directory, { recursive: true });
  }

  /**
   * Path of the file backing a partition.
   */
  filePath(partitionKey: string): string {
    return join(this._directory, `${partitionSegment(partitionKey)}.jsonl`);
  }

  // ─── Producer side ──────────────────────────────────────────────────

  /**
   * Append a record body.
   *
   * @returns the sequence number assigned
   */
  append(partitionKey: string, body: Uint8Array): number {
    const { head } = this._scanSync(partitionKey);
    const record: LogRecord = {
      partitionKey,
      sequenceNumber: head,
      enqueuedAt: this._now().toISOString(),
      body,
    };

    this._writeAndSync(this.filePath(partitionKey), recordToLine(record));
    return head;
  }

  /**
   * Expire every record below `sequenceNumber`.
   */
  expireBefore(partitionKey: string, sequenceNumber: number): void {
    const scan = this._scanSync(partitionKey);
    const target = Math.min(sequenceNumber, scan.head);
    if (target <= scan.floor) {
      return;
    }

    const kept = scan.records.filter((r) => r.sequenceNumber >= target);
    const content =
      JSON.stringify({ floor: target }) + "\n" + kept.map(recordToLine).join("");

    const path = this.filePath(partitionKey);
    const tmp = `${path}.tmp`;
    writeFileSync(tmp, content, "utf-8");
    renameSync(tmp, path);
  }

  // ─── Reader contract ────────────────────────────────────────────────

  async oldestAvailableSequence(partitionKey: string): Promise<number> {
    let content: string;
    try {
      content = await readFile(this.filePath(partitionKey), "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        return 0;
      }
      throw new TransientTransportError(
        `Could not read log file for partition "${partitionKey}"`,
        partitionKey,
        err,
      );
    }
    return scanContent(content).floor;
  }

  async *subscribe(
    partitionKey: string,
    fromSequenceInclusive: number,
    signal?: AbortSignal,
  ): AsyncGenerator<LogRecord> {
    if (!isSequenceNumber(fromSequenceInclusive)) {
      throw new ReplicationError(
        "INVALID_ARGUMENT",
        `Invalid subscription start ${fromSequenceInclusive}`,
        partitionKey,
      );
    }

    const path = this.filePath(partitionKey);
    let cursor = fromSequenceInclusive;
    let inode: number | undefined;
    let offset = 0;
    let remainder = "";
    let decoder = new TextDecoder();

    while (signal?.aborted !== true) {
      let text = "";
      try {
        const handle = await open(path, "r");
        try {
          const stats = await handle.stat();
          if (stats.ino !== inode || stats.size < offset) {
            // New or rewritten file: read it from the start
            inode = stats.ino;
            offset = 0;
            remainder = "";
            decoder = new TextDecoder();
          }
          if (stats.size > offset) {
            const buffer = Buffer.alloc(stats.size - offset);
            const { bytesRead } = await handle.read(buffer, 0, buffer.length, offset);
            offset += bytesRead;
            text = decoder.decode(buffer.subarray(0, bytesRead), { stream: true });
          }
        } finally {
          await handle.close();
        }
      } catch (err) {
        if (!isNotFound(err)) {
          throw new TransientTransportError(
            `Could not tail log file for partition "${partitionKey}"`,
            partitionKey,
            err,
          );
        }
      }

      const lines = (remainder + text).split("\n");
      remainder = lines.pop() ?? "";

      let delivered = false;
      for (const line of lines) {
        const record = lineToRecord(line);
        if (record === undefined || record.sequenceNumber < cursor) {
          continue;
        }
        if (signal?.aborted === true) {
          return;
        }
        // Records below the floor are gone; resume at the oldest retained
        cursor = record.sequenceNumber + 1;
        delivered = true;
        yield record;
      }

      if (!delivered) {
        await pause(this._pollIntervalMs, signal);
      }
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _scanSync(partitionKey: string): PartitionScan {
    const path = this.filePath(partitionKey);
    if (!existsSync(path)) {
      return { floor: 0, head: 0, records: [] };
    }
    return scanContent(readFileSync(path, "utf-8"));
  }

  /**
   * Write data to the file and fsync for durability.
   */
  private _writeAndSync(path: string, data: string): void {
    const fd = openSync(path, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function scanContent(content: string): PartitionScan {
  const records = parseRecordLines(content);
  const marker = readFloorMarker(content);

  const first = records[0];
  const last = records[records.length - 1];

  return {
    floor: first?.sequenceNumber ?? marker ?? 0,
    head: last !== undefined ? last.sequenceNumber + 1 : marker ?? 0,
    records,
  };
}

function readFloorMarker(content: string): number | undefined {
  const newline = content.indexOf("\n");
  const firstLine = (newline === -1 ? content : content.slice(0, newline)).trim();
  if (!firstLine.startsWith('{"floor":')) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(firstLine);
    if (parsed !== null && typeof parsed === "object" && "floor" in parsed) {
      const floor = parsed.floor;
      return isSequenceNumber(floor) ? floor : undefined;
    }
  } catch {
    // Torn marker line; fall through to "no marker"
  }
  return undefined;
}

async function pause(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted === true) {
      return;
    }
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
