/**
 * Apps ledger persistence: read the whole file, mutate, write the whole file
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import type { LedgerEntry } from '../types/ledger.js';
import { PersistenceError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { isRecord } from '../utils/guards.js';

const LedgerEntrySchema = z
  .object({
    name: z.string(),
    uid: z.string(),
    version: z.string(),
    updated_time: z.string().optional(),
  })
  .passthrough();

const LedgerSchema = z.array(LedgerEntrySchema);

const INDENT = 4;

async function readRaw(ledgerPath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(ledgerPath, 'utf-8');
  } catch (err) {
    const reason = (err as NodeJS.ErrnoException).code === 'ENOENT' ? 'not found' : errorMessage(err);
    throw new PersistenceError(`Apps file '${ledgerPath}' ${reason}`, {
      path: ledgerPath,
      operation: 'read',
      cause: err,
    });
  }

  try {
    return JSON.parse(content);
  } catch (err) {
    throw new PersistenceError(`Invalid JSON in '${ledgerPath}'`, {
      path: ledgerPath,
      operation: 'parse',
      cause: err,
    });
  }
}

/**
 * Read and validate the ledger
 */
export async function readLedger(ledgerPath: string): Promise<LedgerEntry[]> {
  const raw = await readRaw(ledgerPath);
  const parsed = LedgerSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PersistenceError(`Invalid apps file '${ledgerPath}': ${issue.path.join('.')} ${issue.message}`, {
      path: ledgerPath,
      operation: 'parse',
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export async function writeLedger(ledgerPath: string, entries: unknown[]): Promise<void> {
  const tempFile = `${ledgerPath}.tmp`;
  try {
    await fs.writeFile(tempFile, JSON.stringify(entries, null, INDENT), 'utf-8');
    await fs.rename(tempFile, ledgerPath);
  } catch (err) {
    throw new PersistenceError(`Failed to write '${ledgerPath}': ${errorMessage(err)}`, {
      path: ledgerPath,
      operation: 'write',
      cause: err,
    });
  }
}

function hasUid(value: unknown, uid: string): value is Record<string, unknown> {
  return isRecord(value) && value.uid === uid;
}

/**
 * Record a new version for the first entry matching `uid`. Works on the raw
 * JSON so other entries, unknown fields and key order survive the rewrite.
 */
export async function updateLedger(
  ledgerPath: string,
  uid: string,
  newVersion: string,
  updatedTime: string,
  logger: Logger,
): Promise<boolean> {
  try {
    const raw = await readRaw(ledgerPath);
    if (!Array.isArray(raw)) {
      throw new PersistenceError(`Invalid apps file '${ledgerPath}': expected an array`, {
        path: ledgerPath,
        operation: 'parse',
      });
    }

    const entry = raw.find((candidate: unknown) => hasUid(candidate, uid));
    if (!hasUid(entry, uid)) {
      logger.warn(`App ${uid} not found in ${ledgerPath}`);
      return false;
    }

    entry.version = newVersion;
    entry.updated_time = updatedTime;
    await writeLedger(ledgerPath, raw);

    logger.info(`Updated ${ledgerPath} with new version for ${uid}: ${newVersion}`);
    return true;
  } catch (err) {
    logger.error(`Error updating apps file: ${errorMessage(err)}`);
    return false;
  }
}
