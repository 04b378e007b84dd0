/**
 * @mirrorline/event-store — JSONL record format.
 *
 * Shared by capture archives and the JSONL live log. One record per line:
 * {"partitionKey":"0","sequenceNumber":410,"enqueuedAt":"...","body":"<base64>"}
 */

import { z } from "zod";
import type { LogRecord } from "@mirrorline/types";

const RecordLineSchema = z.object({
  partitionKey: z.string().min(1),
  sequenceNumber: z.number().int().min(0),
  enqueuedAt: z.string(),
  body: z.string(),
});

/**
 * Serialize a record as one JSONL line (including the trailing newline).
 */
export function recordToLine(record: LogRecord): string {
  return (
    JSON.stringify({
      partitionKey: record.partitionKey,
      sequenceNumber: record.sequenceNumber,
      enqueuedAt: record.enqueuedAt,
      body: Buffer.from(record.body).toString("base64"),
    }) + "\n"
  );
}

/**
 * Parse one JSONL line.
 *
 * @returns undefined for blank, partial or corrupt lines
 */
export function lineToRecord(line: string): LogRecord | undefined {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    // Partial line from a torn write
    return undefined;
  }

  const parsed = RecordLineSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }

  return {
    partitionKey: parsed.data.partitionKey,
    sequenceNumber: parsed.data.sequenceNumber,
    enqueuedAt: parsed.data.enqueuedAt,
    body: new Uint8Array(Buffer.from(parsed.data.body, "base64")),
  };
}

/**
 * Parse every well-formed line of a JSONL document.
 */
export function parseRecordLines(content: string): LogRecord[] {
  const records: LogRecord[] = [];
  for (const line of content.split("\n")) {
    const record = lineToRecord(line);
    if (record !== undefined) {
      records.push(record);
    }
  }
  return records;
}
