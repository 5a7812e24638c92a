/**
 * NDJSON table helpers. Atomic writes (write temp -> rename).
 * In-process mutex per table so overlapping handlers don't corrupt writes.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';

const tableLocks = new Map<string, Promise<void>>();

/** Serialize writes per table path. */
export async function withTableLock<T>(tableFile: string, fn: () => Promise<T>): Promise<T> {
  const prev = tableLocks.get(tableFile) ?? Promise.resolve();
  let release: () => void = () => undefined;
  const next = new Promise<void>((resolve) => {
    release = resolve;
  });
  tableLocks.set(tableFile, next);
  await prev;
  try {
    return await fn();
  } finally {
    release();
    if (tableLocks.get(tableFile) === next) tableLocks.delete(tableFile);
  }
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/** Rows that fail the schema are skipped with a warning; a missing file reads as empty. */
export async function readNdjson<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return [];
    throw err;
  }
  const rows: T[] = [];
  const lines = raw.split('\n').map((l) => l.trim()).filter(Boolean);
  for (const [lineNo, line] of lines.entries()) {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      console.warn('[file_store] unreadable row skipped', { file: path.basename(filePath), line: lineNo + 1 });
      continue;
    }
    const parsed = schema.safeParse(json);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      console.warn('[file_store] invalid row skipped', { file: path.basename(filePath), line: lineNo + 1 });
    }
  }
  return rows;
}

export async function writeNdjsonAtomic(filePath: string, rows: readonly unknown[]): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const payload = rows.map((r) => JSON.stringify(r)).join('\n') + (rows.length ? '\n' : '');
  const tmpPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
  await fs.writeFile(tmpPath, payload, 'utf-8');
  await fs.rename(tmpPath, filePath);
}

export function tablePath(dataDir: string, tableName: string): string {
  return path.join(dataDir, 'tables', `${tableName}.ndjson`);
}
