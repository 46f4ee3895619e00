import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { IdentityDirectoryError, errorMessage } from "../lib/errors.ts";

/** One row of the people CSV: review-host email to Slack handle */
export type IdentityRecord = {
  email: string;
  slack: string;
};

export interface IdentityDirectory {
  /** Exact, case-sensitive lookup. Unknown emails resolve to undefined. */
  resolve(email: string): string | undefined;
  size(): number;
  /** Rows ignored because their email was already present */
  duplicates(): number;
}

const csvRowsSchema = z.array(z.record(z.string(), z.string().optional()));

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

/**
 * Parse the people CSV. The header row names the columns; only `email` and
 * `slack` are read, and rows missing either are skipped.
 */
export function parseIdentityCsv(content: string): IdentityRecord[] {
  let rows: unknown;
  try {
    rows = parse(content, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err) {
    throw new IdentityDirectoryError(`Failed to parse identity CSV: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const records: IdentityRecord[] = [];
  for (const row of csvRowsSchema.parse(rows)) {
    const email = row.email;
    const slack = row.slack;
    if (email === undefined || slack === undefined || isBlank(email) || isBlank(slack)) continue;
    records.push({ email, slack });
  }
  return records;
}

/** Build a directory from records. The first record for an email wins. */
export function createIdentityDirectory(records: Iterable<IdentityRecord>): IdentityDirectory {
  const handles = new Map<string, string>();
  let duplicateCount = 0;

  for (const record of records) {
    if (handles.has(record.email)) {
      duplicateCount++;
      continue;
    }
    handles.set(record.email, record.slack);
  }

  return {
    resolve(email: string): string | undefined {
      return handles.get(email);
    },
    size(): number {
      return handles.size;
    },
    duplicates(): number {
      return duplicateCount;
    },
  };
}

export async function loadIdentityDirectory(path: string): Promise<IdentityDirectory> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (err) {
    throw new IdentityDirectoryError(
      `Failed to read identity CSV from "${path}": ${errorMessage(err)}`,
      { cause: err },
    );
  }
  return createIdentityDirectory(parseIdentityCsv(content));
}
